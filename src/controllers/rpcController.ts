import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { ApiFailure } from '../lib/errors.js';
import { logger } from '../utils/logger.js';
import type { ToolRegistry } from '../services/tools.js';
import type { ApiSuccess } from '../types/payment.js';

const callSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
  _meta: z.record(z.unknown()).optional()
});

export function listToolsHandler(registry: ToolRegistry) {
  return (_req: Request, res: Response) => {
    const body: ApiSuccess = { success: true, message: 'Tools', info: { variant: registry.variant, tools: registry.list() } };
    res.json(body);
  };
}

export function callToolHandler(registry: ToolRegistry) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const parsed = callSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: { message: parsed.error.message, type: 'VALIDATION' } });
    }
    const { name, arguments: args, _meta: meta } = parsed.data;
    const log = logger.child({ variant: registry.variant, tool: name });

    try {
      const result = await registry.call(name, args ?? {}, meta ?? {});
      log.info({ status: 'ok' }, 'Tool call completed');
      const body: ApiSuccess = { success: true, message: `${name} completed`, info: result };
      return res.json(body);
    } catch (err) {
      if (err instanceof ApiFailure) {
        log.warn({ status: 'rejected', type: err.type, category: err.category }, err.message);
      }
      return next(err);
    }
  };
}
