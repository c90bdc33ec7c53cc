export interface Transaction {
  counterpartyIban: string;
  counterpartyBic: string;
  amountMinorUnits: number;
  currency: string;
}

export interface Account {
  id: string;
  balanceMinorUnits: number;
  transactions: Transaction[];
}

export interface PaymentRequest {
  accountId: string;
  iban: string;
  bic: string;
  amountMinorUnits: number;
  currency: string;
}

export type PaymentStatus = 'processed' | 'already_processed';

export interface PaymentResult {
  status: PaymentStatus;
  message: string;
}

export type ServerVariant = 'idempotent' | 'non-idempotent';

// Request-level metadata travelling beside the tool arguments
export type RequestMeta = Record<string, unknown>;

export const IDEMPOTENCY_META_KEY = 'io.modelcontextprotocol/idempotency-key';

export interface ApiSuccess<T = unknown> {
  success: true;
  message: string;
  info?: T;
}

export interface ApiError {
  success: false;
  error: {
    message: string;
    type: string;
  };
}

