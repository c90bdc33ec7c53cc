import { IDEMPOTENCY_META_KEY, type ServerVariant } from '../types/payment.js';

export function buildSwaggerSpec(variant: ServerVariant, serverUrl: string) {
  const idempotent = variant === 'idempotent';
  return {
    openapi: '3.0.3',
    info: {
      title: idempotent ? 'Idempotent Payments Demo' : 'Non-Idempotent Payments Demo',
      version: '1.0.0',
      description: idempotent
        ? `Payment tools over RPC. makePayment requires _meta["${IDEMPOTENCY_META_KEY}"] and applies once per key.`
        : 'Payment tools over RPC. makePayment is deliberately non-idempotent: retries are charged again.'
    },
    servers: [
      { url: serverUrl, description: 'Local' }
    ],
    components: {
      schemas: {
        ToolCallRequest: {
          type: 'object',
          required: ['name'],
          properties: {
            name: { type: 'string', enum: ['getBalance', 'getTransactions', 'makePayment'] },
            arguments: {
              type: 'object',
              example: {
                accountId: '3f1c2a9e-8b47-4d2a-9c61-5e0f7a2b4c13',
                iban: 'DE00TEST0000000000000000',
                bic: 'TESTDEFFXXX',
                amountMinorUnits: 2500,
                currency: 'EUR'
              }
            },
            _meta: {
              type: 'object',
              description: 'Request metadata. Carries the idempotency key for the protected server.',
              additionalProperties: { type: 'string' },
              example: idempotent ? { [IDEMPOTENCY_META_KEY]: 'example-key-1' } : {}
            }
          }
        },
        Transaction: {
          type: 'object',
          properties: {
            counterpartyIban: { type: 'string' },
            counterpartyBic: { type: 'string' },
            amountMinorUnits: { type: 'integer', example: 2500 },
            currency: { type: 'string', example: 'EUR' }
          }
        },
        ToolCallSuccess: {
          type: 'object',
          properties: {
            success: { type: 'boolean', example: true },
            message: { type: 'string', example: 'makePayment completed' },
            info: {
              oneOf: [
                { type: 'object', properties: { balanceMinorUnits: { type: 'integer', example: 7500 } } },
                { type: 'object', properties: { transactions: { type: 'array', items: { $ref: '#/components/schemas/Transaction' } } } },
                {
                  type: 'object',
                  properties: {
                    status: { type: 'string', enum: ['processed', 'already_processed'] },
                    message: { type: 'string' }
                  }
                }
              ]
            }
          }
        },
        ApiError: {
          type: 'object',
          properties: {
            success: { type: 'boolean', example: false },
            error: {
              type: 'object',
              properties: {
                message: { type: 'string' },
                type: { type: 'string', example: 'INSUFFICIENT_FUNDS' }
              }
            }
          }
        }
      }
    },
    paths: {
      '/healthz': {
        get: {
          summary: 'Health check',
          responses: { '200': { description: 'OK' } }
        }
      },
      '/rpc/tools': {
        get: {
          summary: 'List tools with their annotations',
          responses: { '200': { description: 'Tool list' } }
        }
      },
      '/rpc/tools/call': {
        post: {
          summary: 'Call a tool',
          requestBody: {
            required: true,
            content: { 'application/json': { schema: { $ref: '#/components/schemas/ToolCallRequest' } } }
          },
          responses: {
            '200': { description: 'Tool result', content: { 'application/json': { schema: { $ref: '#/components/schemas/ToolCallSuccess' } } } },
            '400': { description: 'VALIDATION or MISSING_IDEMPOTENCY_KEY', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } },
            '404': { description: 'NOT_FOUND or UNKNOWN_TOOL', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } },
            '422': { description: 'INSUFFICIENT_FUNDS', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } },
            '429': { description: 'RATE_LIMIT', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } }
          }
        }
      }
    }
  };
}
