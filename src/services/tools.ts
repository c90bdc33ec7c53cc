import { z } from 'zod';
import { ApiFailure } from '../lib/errors.js';
import { IDEMPOTENCY_META_KEY, type RequestMeta, type ServerVariant } from '../types/payment.js';
import type { Ledger } from './ledger.js';
import type { PaymentOperation } from './paymentService.js';

export interface ToolAnnotations {
  readOnlyHint?: boolean;
  idempotentHint?: boolean;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  annotations: ToolAnnotations;
}

export interface RegisteredTool extends ToolDescriptor {
  call(args: unknown, meta: RequestMeta): Promise<unknown>;
}

function defineTool<S extends z.ZodTypeAny, R>(def: ToolDescriptor & {
  input: S;
  handler: (args: z.infer<S>, meta: RequestMeta) => Promise<R> | R;
}): RegisteredTool {
  return {
    name: def.name,
    description: def.description,
    annotations: def.annotations,
    async call(args, meta) {
      const parsed = def.input.safeParse(args ?? {});
      if (!parsed.success) throw new ApiFailure('VALIDATION', parsed.error.message);
      return def.handler(parsed.data, meta);
    }
  };
}

// UUIDs compare case-insensitively; the ledger keys on the lowercase form
const accountId = z.string().uuid().transform(id => id.toLowerCase());

const accountArgs = z.object({
  accountId
});

const paymentArgs = z.object({
  accountId,
  iban: z.string().min(1),
  bic: z.string().min(1),
  amountMinorUnits: z.number().int().positive(),
  currency: z.string().min(1).max(8)
});

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(readonly variant: ServerVariant) {}

  register(tool: RegisteredTool): this {
    this.tools.set(tool.name, tool);
    return this;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description, annotations }) => ({ name, description, annotations }));
  }

  async call(name: string, args: unknown, meta: RequestMeta = {}): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) throw new ApiFailure('UNKNOWN_TOOL', `Unknown tool ${name}`);
    return tool.call(args, meta);
  }
}

export function buildPaymentTools(deps: { ledger: Ledger; payments: PaymentOperation }): ToolRegistry {
  const { ledger, payments } = deps;
  const registry = new ToolRegistry(payments.idempotent ? 'idempotent' : 'non-idempotent');

  registry.register(defineTool({
    name: 'getBalance',
    description: 'Return the current balance in minor units for the specified account.',
    annotations: { readOnlyHint: true },
    input: accountArgs,
    handler: args => ({ balanceMinorUnits: ledger.getBalance(args.accountId) })
  }));

  registry.register(defineTool({
    name: 'getTransactions',
    description: 'Return the list of processed transactions for the specified account.',
    annotations: { readOnlyHint: true },
    input: accountArgs,
    handler: args => ({ transactions: ledger.getTransactions(args.accountId) })
  }));

  registry.register(defineTool({
    name: 'makePayment',
    description: payments.idempotent
      ? `Debit the account once per idempotency key passed in _meta["${IDEMPOTENCY_META_KEY}"]. Replays report already_processed.`
      : 'Debit the account on every call. Retries are charged again.',
    annotations: { readOnlyHint: false, idempotentHint: payments.idempotent },
    input: paymentArgs,
    handler: (args, meta) => {
      const key = meta[IDEMPOTENCY_META_KEY];
      return payments.makePayment(args, typeof key === 'string' ? key : undefined);
    }
  }));

  return registry;
}
