import { ApiFailure, accountNotFound } from '../lib/errors.js';
import type { IdempotencyStore } from '../lib/idempotencyStore.js';
import type { AlternatingLatency } from '../lib/latency.js';
import { logger } from '../utils/logger.js';
import type { PaymentRequest, PaymentResult, Transaction } from '../types/payment.js';
import type { Ledger } from './ledger.js';

export interface PaymentOperation {
  readonly idempotent: boolean;
  makePayment(req: PaymentRequest, idempotencyKey?: string): Promise<PaymentResult>;
}

function toTransaction(req: PaymentRequest): Transaction {
  return {
    counterpartyIban: req.iban,
    counterpartyBic: req.bic,
    amountMinorUnits: req.amountMinorUnits,
    currency: req.currency
  };
}

function validatePayment(ledger: Ledger, req: PaymentRequest): void {
  if (!ledger.hasAccount(req.accountId)) throw accountNotFound(req.accountId);
  if (!Number.isInteger(req.amountMinorUnits) || req.amountMinorUnits <= 0) {
    throw new ApiFailure('VALIDATION', `amountMinorUnits must be a positive integer, got ${req.amountMinorUnits}`);
  }
  if (!req.iban || !req.bic || !req.currency) {
    throw new ApiFailure('VALIDATION', 'iban, bic and currency must be non-empty');
  }
}

/**
 * Payment guarded by a caller-supplied idempotency key. The first request
 * under a key debits the account; later requests under the same key are
 * pure reads that report `already_processed`.
 */
export class IdempotentPaymentService implements PaymentOperation {
  readonly idempotent = true;

  constructor(
    private readonly deps: {
      ledger: Ledger;
      store: IdempotencyStore;
      latency: AlternatingLatency;
    }
  ) {}

  async makePayment(req: PaymentRequest, idempotencyKey?: string): Promise<PaymentResult> {
    const { ledger, store, latency } = this.deps;
    if (!ledger.hasAccount(req.accountId)) throw accountNotFound(req.accountId);
    if (!idempotencyKey) {
      throw new ApiFailure(
        'MISSING_IDEMPOTENCY_KEY',
        'Missing required _meta.io.modelcontextprotocol/idempotency-key for idempotent operation.'
      );
    }
    validatePayment(ledger, req);
    const key = idempotencyKey;

    const applied = await store.withKeyLock(key, () => {
      if (store.isProcessed(key)) return false;
      // Throws INSUFFICIENT_FUNDS before the key is marked
      ledger.applyPayment(req.accountId, toTransaction(req));
      store.markProcessed(key);
      return true;
    });

    if (!applied) {
      logger.info({ key, accountId: req.accountId }, 'Idempotent replay prevented');
      return {
        status: 'already_processed',
        message: 'Request with this idempotency key has already been processed.'
      };
    }

    logger.info({ key, accountId: req.accountId, amount: req.amountMinorUnits }, 'Payment applied');
    await latency.afterApply();
    return { status: 'processed', message: 'Payment applied once with idempotency protection.' };
  }
}

/**
 * Deliberately unprotected payment: every accepted call debits, so a client
 * retrying after a timeout is charged twice.
 */
export class NonIdempotentPaymentService implements PaymentOperation {
  readonly idempotent = false;

  constructor(private readonly deps: { ledger: Ledger; latency: AlternatingLatency }) {}

  async makePayment(req: PaymentRequest): Promise<PaymentResult> {
    const { ledger, latency } = this.deps;
    validatePayment(ledger, req);
    ledger.applyPayment(req.accountId, toTransaction(req));
    logger.info({ accountId: req.accountId, amount: req.amountMinorUnits }, 'Payment applied');
    await latency.afterApply();
    return {
      status: 'processed',
      message: 'This server is intentionally non-idempotent and will charge twice on retry.'
    };
  }
}
