import { createPaymentServer } from './app.js';
import { env } from './config/env.js';
import { logger } from './utils/logger.js';
import type { ServerVariant } from './types/payment.js';

const instances: Array<{ variant: ServerVariant; port: number }> = [
  { variant: 'non-idempotent', port: env.NON_IDEMPOTENT_PORT },
  { variant: 'idempotent', port: env.IDEMPOTENT_PORT }
];

for (const { variant, port } of instances) {
  const serverUrl = `http://${env.HOST}:${port}`;
  const { app, store } = createPaymentServer({
    variant,
    serverUrl,
    delayMs: env.SIMULATED_DELAY_MS,
    rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE,
    idempotencyTtlMs: env.IDEMPOTENCY_TTL_MS,
    idempotencyMaxKeys: env.IDEMPOTENCY_MAX_KEYS
  });
  store?.startSweeper();

  app.listen(port, env.HOST, () => {
    logger.info({ variant, port }, 'Server started');
    logger.info(`Docs: ${serverUrl}/docs`);
  });
}
