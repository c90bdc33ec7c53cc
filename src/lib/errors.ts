import type { ApiError } from '../types/payment.js';

export type FailureType =
  | 'NOT_FOUND'
  | 'MISSING_IDEMPOTENCY_KEY'
  | 'VALIDATION'
  | 'UNKNOWN_TOOL'
  | 'INSUFFICIENT_FUNDS';

export type FailureCategory = 'caller' | 'business';

const categories: Record<FailureType, FailureCategory> = {
  NOT_FOUND: 'caller',
  MISSING_IDEMPOTENCY_KEY: 'caller',
  VALIDATION: 'caller',
  UNKNOWN_TOOL: 'caller',
  INSUFFICIENT_FUNDS: 'business'
};

/**
 * Failure surfaced to the RPC caller as `{ success: false, error }`.
 * Caller errors mean the request itself was wrong; business rejections mean
 * the request was well formed but the ledger refused it.
 */
export class ApiFailure extends Error {
  readonly type: FailureType;
  readonly category: FailureCategory;

  constructor(type: FailureType, message: string) {
    super(message);
    this.name = 'ApiFailure';
    this.type = type;
    this.category = categories[type];
  }

  toResponse(): ApiError {
    return { success: false, error: { message: this.message, type: this.type } };
  }
}

export function accountNotFound(accountId: string): ApiFailure {
  return new ApiFailure('NOT_FOUND', `Account ${accountId} not found`);
}
