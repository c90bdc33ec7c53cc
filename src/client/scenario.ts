import chalk from 'chalk';
import { randomUUID } from 'node:crypto';
import { IDEMPOTENCY_META_KEY, type PaymentRequest } from '../types/payment.js';
import { ScenarioPrinter } from './printer.js';
import {
  RpcClient,
  type BalanceResult,
  type PaymentCallResult,
  type ToolCallResult,
  type TransactionsResult
} from './rpcClient.js';

export interface ScenarioOptions {
  useIdempotencyKey: boolean;
  payment: PaymentRequest;
  firstTimeoutMs: number;
  retryTimeoutMs: number;
  idempotencyKey?: string;
}

export interface ScenarioReport {
  initialBalance: ToolCallResult<BalanceResult>;
  firstAttempt: ToolCallResult<PaymentCallResult>;
  retry: ToolCallResult<PaymentCallResult>;
  finalBalance: ToolCallResult<BalanceResult>;
  finalTransactions: ToolCallResult<TransactionsResult>;
}

/**
 * Reads the balance, pays once with a short timeout, retries the identical
 * call with a long timeout, then reads the final state back.
 */
export async function runScenario(
  client: RpcClient,
  opts: ScenarioOptions,
  printer: ScenarioPrinter = new ScenarioPrinter()
): Promise<ScenarioReport> {
  const kind = opts.useIdempotencyKey ? 'idempotent 🔐' : 'non-idempotent ⚠️';
  printer.banner(`Demo against ${kind} server`);

  const { accountId } = opts.payment;
  const initialBalance = await client.getBalance(accountId);
  printer.result('💰', 'Initial balance', initialBalance);

  // Same key on both attempts, that is what makes the retry recognisable
  const meta = opts.useIdempotencyKey
    ? { [IDEMPOTENCY_META_KEY]: opts.idempotencyKey ?? randomUUID() }
    : undefined;

  printer.step('Calling makePayment (first attempt, expect timeout)...', '⏱️', chalk.yellow);
  const firstAttempt = await client.makePayment(opts.payment, { meta, timeoutMs: opts.firstTimeoutMs });
  if (firstAttempt.kind === 'ok') printer.step('First call returned before timeout.', '⚠️', chalk.yellow);
  printer.result('🧾', 'First makePayment result', firstAttempt);

  printer.step('Retrying makePayment with same arguments...', '🔁');
  const retry = await client.makePayment(opts.payment, { meta, timeoutMs: opts.retryTimeoutMs });
  printer.result('🧾', 'Second makePayment result', retry);

  printer.step('Getting final state...', '📊');
  const finalBalance = await client.getBalance(accountId);
  const finalTransactions = await client.getTransactions(accountId);
  printer.result('💰', 'Final balance', finalBalance);
  printer.result('📜', 'Final transactions', finalTransactions);

  return { initialBalance, firstAttempt, retry, finalBalance, finalTransactions };
}
