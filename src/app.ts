import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { seedAccounts } from './config/accounts.js';
import { buildSwaggerSpec } from './docs/swagger.js';
import { IdempotencyStore } from './lib/idempotencyStore.js';
import { AlternatingLatency, type Sleep } from './lib/latency.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createRpcRouter } from './routes/rpcRoutes.js';
import { Ledger, type SeedAccount } from './services/ledger.js';
import { IdempotentPaymentService, NonIdempotentPaymentService, type PaymentOperation } from './services/paymentService.js';
import { buildPaymentTools, type ToolRegistry } from './services/tools.js';
import type { ServerVariant } from './types/payment.js';

export interface PaymentServerOptions {
  variant: ServerVariant;
  delayMs: number;
  rateLimitPerMinute: number;
  serverUrl?: string;
  seed?: readonly SeedAccount[];
  sleep?: Sleep;
  idempotencyTtlMs?: number;
  idempotencyMaxKeys?: number;
}

export interface PaymentServer {
  app: Express;
  ledger: Ledger;
  latency: AlternatingLatency;
  registry: ToolRegistry;
  // Only present on the idempotent variant
  store?: IdempotencyStore;
}

export function createPaymentServer(opts: PaymentServerOptions): PaymentServer {
  const ledger = new Ledger(opts.seed ?? seedAccounts);
  const latency = new AlternatingLatency({ delayMs: opts.delayMs, sleep: opts.sleep });

  let store: IdempotencyStore | undefined;
  let payments: PaymentOperation;
  if (opts.variant === 'idempotent') {
    store = new IdempotencyStore({ ttlMs: opts.idempotencyTtlMs, maxKeys: opts.idempotencyMaxKeys });
    payments = new IdempotentPaymentService({ ledger, store, latency });
  } else {
    payments = new NonIdempotentPaymentService({ ledger, latency });
  }
  const registry = buildPaymentTools({ ledger, payments });

  const app = express();
  app.use(helmet());
  app.use(cors({ origin: '*' }));
  app.use(express.json({ limit: '100kb' }));

  if (opts.serverUrl) {
    const spec = buildSwaggerSpec(opts.variant, opts.serverUrl);
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(spec));
  }

  app.get('/healthz', (_req: Request, res: Response) => res.json({ status: 'ok', variant: opts.variant }));
  app.use(createRpcRouter(registry, opts.rateLimitPerMinute));
  app.use(errorHandler);

  return { app, ledger, latency, registry, store };
}
