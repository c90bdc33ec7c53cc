import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.string().default('info'),
  HOST: z.string().default('127.0.0.1'),
  NON_IDEMPOTENT_PORT: z.coerce.number().int().positive().default(8000),
  IDEMPOTENT_PORT: z.coerce.number().int().positive().default(8001),
  SIMULATED_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  // 0 keeps idempotency keys for the lifetime of the process
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().nonnegative().default(0),
  IDEMPOTENCY_MAX_KEYS: z.coerce.number().int().nonnegative().default(0),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),
  CLIENT_FIRST_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  CLIENT_RETRY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  NON_IDEMPOTENT_URL: z.string().url().default('http://127.0.0.1:8000'),
  IDEMPOTENT_URL: z.string().url().default('http://127.0.0.1:8001')
});

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  console.error('Invalid environment variables', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
