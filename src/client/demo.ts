import { PRIMARY_ACCOUNT_ID } from '../config/accounts.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { RpcClient } from './rpcClient.js';
import { runScenario } from './scenario.js';

const payment = {
  accountId: PRIMARY_ACCOUNT_ID,
  iban: 'DE00TEST0000000000000000',
  bic: 'TESTDEFFXXX',
  amountMinorUnits: 25_00,
  currency: 'EUR'
};

async function main(): Promise<void> {
  const targets = [
    { baseURL: env.NON_IDEMPOTENT_URL, useIdempotencyKey: false },
    { baseURL: env.IDEMPOTENT_URL, useIdempotencyKey: true }
  ];
  for (const { baseURL, useIdempotencyKey } of targets) {
    await runScenario(new RpcClient({ baseURL }), {
      useIdempotencyKey,
      payment,
      firstTimeoutMs: env.CLIENT_FIRST_TIMEOUT_MS,
      retryTimeoutMs: env.CLIENT_RETRY_TIMEOUT_MS
    });
  }
}

main().catch(err => {
  logger.error({ err }, 'Demo failed');
  process.exitCode = 1;
});
