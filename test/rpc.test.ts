import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createPaymentServer } from '../src/app.js';
import { IDEMPOTENCY_META_KEY, type ServerVariant } from '../src/types/payment.js';
import { ACCOUNT_ID, UNKNOWN_ACCOUNT_ID, instantSleep, payment, seed } from './_helpers.js';

function server(variant: ServerVariant, rateLimitPerMinute = 100) {
  return createPaymentServer({ variant, delayMs: 5_000, sleep: instantSleep(), rateLimitPerMinute, seed });
}

function call(app: ReturnType<typeof server>['app'], body: object) {
  return request(app).post('/rpc/tools/call').send(body);
}

describe('RPC transport', () => {
  it('reports health with the variant', async () => {
    const { app } = server('idempotent');
    const res = await request(app).get('/healthz');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', variant: 'idempotent' });
  });

  it('lists tools with their annotations', async () => {
    const protectedList = await request(server('idempotent').app).get('/rpc/tools');
    const plainList = await request(server('non-idempotent').app).get('/rpc/tools');

    const names = protectedList.body.info.tools.map((t: { name: string }) => t.name);
    expect(names).toEqual(['getBalance', 'getTransactions', 'makePayment']);
    expect(protectedList.body.info.tools[2].annotations).toEqual({ readOnlyHint: false, idempotentHint: true });
    expect(plainList.body.info.tools[2].annotations).toEqual({ readOnlyHint: false, idempotentHint: false });
    expect(plainList.body.info.variant).toBe('non-idempotent');
  });

  it('returns a balance in the success envelope', async () => {
    const { app } = server('idempotent');
    const res = await call(app, { name: 'getBalance', arguments: { accountId: ACCOUNT_ID } });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, message: 'getBalance completed', info: { balanceMinorUnits: 10_000 } });
  });

  it('resolves an account id regardless of letter case', async () => {
    const { app, ledger } = server('non-idempotent');

    const balance = await call(app, { name: 'getBalance', arguments: { accountId: ACCOUNT_ID.toUpperCase() } });
    expect(balance.status).toBe(200);
    expect(balance.body.info).toEqual({ balanceMinorUnits: 10_000 });

    const paid = await call(app, { name: 'makePayment', arguments: { ...payment, accountId: ACCOUNT_ID.toUpperCase() } });
    expect(paid.body.info.status).toBe('processed');
    expect(ledger.getBalance(ACCOUNT_ID)).toBe(7_500);
  });

  it('maps an unknown account to 404 NOT_FOUND', async () => {
    const { app } = server('non-idempotent');
    const res = await call(app, { name: 'getTransactions', arguments: { accountId: UNKNOWN_ACCOUNT_ID } });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: { message: `Account ${UNKNOWN_ACCOUNT_ID} not found`, type: 'NOT_FOUND' }
    });
  });

  it('rejects malformed arguments, envelopes and JSON with 400', async () => {
    const { app } = server('idempotent');

    const badId = await call(app, { name: 'getBalance', arguments: { accountId: 'not-a-uuid' } });
    expect(badId.status).toBe(400);
    expect(badId.body.error.type).toBe('VALIDATION');

    const noName = await call(app, { arguments: {} });
    expect(noName.status).toBe(400);
    expect(noName.body.error.type).toBe('VALIDATION');

    const broken = await request(app).post('/rpc/tools/call').set('Content-Type', 'application/json').send('{');
    expect(broken.status).toBe(400);
    expect(broken.body).toEqual({ success: false, error: { message: 'Malformed JSON body', type: 'VALIDATION' } });
  });

  it('maps an unknown tool to 404 UNKNOWN_TOOL', async () => {
    const { app } = server('idempotent');
    const res = await call(app, { name: 'transfer', arguments: {} });
    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ message: 'Unknown tool transfer', type: 'UNKNOWN_TOOL' });
  });

  it('requires the idempotency key in request metadata', async () => {
    const { app, ledger } = server('idempotent');

    const missing = await call(app, { name: 'makePayment', arguments: payment });
    expect(missing.status).toBe(400);
    expect(missing.body.error.type).toBe('MISSING_IDEMPOTENCY_KEY');

    // A key in the business arguments is not request metadata
    const misplaced = await call(app, { name: 'makePayment', arguments: { ...payment, [IDEMPOTENCY_META_KEY]: 'key-1' } });
    expect(misplaced.status).toBe(400);
    expect(misplaced.body.error.type).toBe('MISSING_IDEMPOTENCY_KEY');
    expect(ledger.getBalance(ACCOUNT_ID)).toBe(10_000);
  });

  it('applies a protected payment once across a replay', async () => {
    const { app } = server('idempotent');
    const body = { name: 'makePayment', arguments: payment, _meta: { [IDEMPOTENCY_META_KEY]: 'key-1' } };

    const first = await call(app, body);
    const second = await call(app, body);
    expect(first.body.info.status).toBe('processed');
    expect(second.body.info.status).toBe('already_processed');

    const balance = await call(app, { name: 'getBalance', arguments: { accountId: ACCOUNT_ID } });
    const log = await call(app, { name: 'getTransactions', arguments: { accountId: ACCOUNT_ID } });
    expect(balance.body.info).toEqual({ balanceMinorUnits: 7_500 });
    expect(log.body.info.transactions).toEqual([
      { counterpartyIban: payment.iban, counterpartyBic: payment.bic, amountMinorUnits: 2_500, currency: 'EUR' }
    ]);
  });

  it('ignores metadata entries other than the idempotency key', async () => {
    const { app, ledger } = server('idempotent');
    const res = await call(app, {
      name: 'makePayment',
      arguments: payment,
      _meta: { [IDEMPOTENCY_META_KEY]: 'key-1', progressToken: 1 }
    });
    expect(res.status).toBe(200);
    expect(res.body.info.status).toBe('processed');
    expect(ledger.getBalance(ACCOUNT_ID)).toBe(7_500);
  });

  it('treats a non-string idempotency key as missing', async () => {
    const { app } = server('idempotent');
    const res = await call(app, { name: 'makePayment', arguments: payment, _meta: { [IDEMPOTENCY_META_KEY]: 42 } });
    expect(res.status).toBe(400);
    expect(res.body.error.type).toBe('MISSING_IDEMPOTENCY_KEY');
  });

  it('applies an unprotected payment on every call', async () => {
    const { app, ledger } = server('non-idempotent');
    const body = { name: 'makePayment', arguments: payment };

    expect((await call(app, body)).body.info.status).toBe('processed');
    expect((await call(app, body)).body.info.status).toBe('processed');
    expect(ledger.getBalance(ACCOUNT_ID)).toBe(5_000);
    expect(ledger.getTransactions(ACCOUNT_ID)).toHaveLength(2);
  });

  it('maps insufficient funds to 422', async () => {
    const { app } = server('idempotent');
    const res = await call(app, {
      name: 'makePayment',
      arguments: { ...payment, amountMinorUnits: 50_000 },
      _meta: { [IDEMPOTENCY_META_KEY]: 'key-1' }
    });
    expect(res.status).toBe(422);
    expect(res.body.error).toEqual({
      message: 'Insufficient funds: balance 10000 cannot cover payment of 50000',
      type: 'INSUFFICIENT_FUNDS'
    });
  });

  it('rate limits tool calls', async () => {
    const { app } = server('non-idempotent', 2);
    const body = { name: 'getBalance', arguments: { accountId: ACCOUNT_ID } };

    expect((await call(app, body)).status).toBe(200);
    expect((await call(app, body)).status).toBe(200);
    const limited = await call(app, body);
    expect(limited.status).toBe(429);
    expect(limited.body).toEqual({ success: false, error: { message: 'Too many requests', type: 'RATE_LIMIT' } });
  });
});
