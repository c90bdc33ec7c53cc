import { NextFunction, Request, Response } from 'express';
import { ApiFailure } from '../lib/errors.js';
import { logger } from '../utils/logger.js';

function hasType(err: unknown): err is { type: unknown } {
  return typeof err === 'object' && err !== null && 'type' in err;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (hasType(err) && err.type === 'entity.too.large') {
    return res.status(413).json({ success: false, error: { message: 'Payload too large', type: 'PAYLOAD_TOO_LARGE' } });
  }
  if (hasType(err) && err.type === 'entity.parse.failed') {
    return res.status(400).json({ success: false, error: { message: 'Malformed JSON body', type: 'VALIDATION' } });
  }
  if (err instanceof ApiFailure) {
    return res.status(mapStatus(err.type)).json(err.toResponse());
  }
  logger.error({ err }, 'Unhandled error');
  const message = err instanceof Error ? err.message : 'Internal Server Error';
  return res.status(500).json({ success: false, error: { message, type: 'INTERNAL_ERROR' } });
}

export function mapStatus(type: string): number {
  switch (type) {
  case 'VALIDATION': return 400;
  case 'MISSING_IDEMPOTENCY_KEY': return 400;
  case 'NOT_FOUND': return 404;
  case 'UNKNOWN_TOOL': return 404;
  case 'INSUFFICIENT_FUNDS': return 422;
  default: return 500;
  }
}
