import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { PaymentRequest, RequestMeta } from '../types/payment.js';

export interface RpcClientConfig {
  baseURL: string;
  timeout?: number;
}

export interface CallOptions {
  meta?: RequestMeta;
  /** Client-side deadline. The server keeps running the call after it passes. */
  timeoutMs?: number;
}

export type ToolCallResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'error'; type: string; message: string; status: number }
  | { kind: 'timeout'; timeoutMs: number };

const envelopeSchema = z.union([
  z.object({ success: z.literal(true), message: z.string(), info: z.unknown() }),
  z.object({ success: z.literal(false), error: z.object({ message: z.string(), type: z.string() }) })
]);

export const balanceSchema = z.object({ balanceMinorUnits: z.number().int() });

export const transactionsSchema = z.object({
  transactions: z.array(z.object({
    counterpartyIban: z.string(),
    counterpartyBic: z.string(),
    amountMinorUnits: z.number().int(),
    currency: z.string()
  }))
});

export const paymentResultSchema = z.object({
  status: z.enum(['processed', 'already_processed']),
  message: z.string()
});

export type BalanceResult = z.infer<typeof balanceSchema>;
export type TransactionsResult = z.infer<typeof transactionsSchema>;
export type PaymentCallResult = z.infer<typeof paymentResultSchema>;

function isTimeout(err: unknown): boolean {
  return axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT');
}

/**
 * Client for the payment tools. Every call is a fresh HTTP request, and a
 * timed-out call is simply abandoned.
 */
export class RpcClient {
  private http: AxiosInstance;
  private defaultTimeout: number;

  constructor(config: RpcClientConfig) {
    this.defaultTimeout = config.timeout ?? 30000;
    this.http = axios.create({
      baseURL: config.baseURL,
      headers: { 'Content-Type': 'application/json' },
      // Structured errors arrive as JSON bodies with a non-2xx status
      validateStatus: () => true
    });
  }

  async callTool<T>(
    name: string,
    args: object,
    schema: z.ZodType<T>,
    opts: CallOptions = {}
  ): Promise<ToolCallResult<T>> {
    const timeoutMs = opts.timeoutMs ?? this.defaultTimeout;
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        '/rpc/tools/call',
        { name, arguments: args, ...(opts.meta ? { _meta: opts.meta } : {}) },
        { timeout: timeoutMs }
      );
    } catch (err) {
      if (isTimeout(err)) return { kind: 'timeout', timeoutMs };
      throw err;
    }

    const envelope = envelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      return { kind: 'error', type: 'MALFORMED_RESPONSE', message: envelope.error.message, status: response.status };
    }
    if (!envelope.data.success) {
      return { kind: 'error', ...envelope.data.error, status: response.status };
    }
    const value = schema.safeParse(envelope.data.info);
    if (!value.success) {
      return { kind: 'error', type: 'MALFORMED_RESPONSE', message: value.error.message, status: response.status };
    }
    return { kind: 'ok', value: value.data };
  }

  getBalance(accountId: string, opts?: CallOptions): Promise<ToolCallResult<BalanceResult>> {
    return this.callTool('getBalance', { accountId }, balanceSchema, opts);
  }

  getTransactions(accountId: string, opts?: CallOptions): Promise<ToolCallResult<TransactionsResult>> {
    return this.callTool('getTransactions', { accountId }, transactionsSchema, opts);
  }

  makePayment(req: PaymentRequest, opts?: CallOptions): Promise<ToolCallResult<PaymentCallResult>> {
    return this.callTool('makePayment', req, paymentResultSchema, opts);
  }
}
