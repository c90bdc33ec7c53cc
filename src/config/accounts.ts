import type { SeedAccount } from '../services/ledger.js';

export const PRIMARY_ACCOUNT_ID = '3f1c2a9e-8b47-4d2a-9c61-5e0f7a2b4c13';
export const SECONDARY_ACCOUNT_ID = '9a7e5d21-4c3b-4f8e-a2d6-0b1c9e8f7a54';

export const seedAccounts: readonly SeedAccount[] = [
  { id: PRIMARY_ACCOUNT_ID, balanceMinorUnits: 100_00 },
  { id: SECONDARY_ACCOUNT_ID, balanceMinorUnits: 200_00 }
];
