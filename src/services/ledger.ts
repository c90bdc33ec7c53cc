import { ApiFailure, accountNotFound } from '../lib/errors.js';
import type { Account, Transaction } from '../types/payment.js';

export interface SeedAccount {
  id: string;
  balanceMinorUnits: number;
}

/**
 * In-memory account store. Balances only change through a debit that is
 * paired with a transaction append in the same synchronous step, so reads
 * never see one without the other.
 */
export class Ledger {
  private readonly accounts = new Map<string, Account>();

  constructor(seed: readonly SeedAccount[] = []) {
    for (const s of seed) this.openAccount(s.id, s.balanceMinorUnits);
  }

  openAccount(id: string, balanceMinorUnits: number): void {
    if (!Number.isInteger(balanceMinorUnits) || balanceMinorUnits < 0) {
      throw new ApiFailure('VALIDATION', `Opening balance must be a non-negative integer, got ${balanceMinorUnits}`);
    }
    const key = id.toLowerCase();
    if (this.accounts.has(key)) {
      throw new ApiFailure('VALIDATION', `Account ${id} already exists`);
    }
    this.accounts.set(key, { id: key, balanceMinorUnits, transactions: [] });
  }

  hasAccount(id: string): boolean {
    return this.accounts.has(id.toLowerCase());
  }

  getBalance(accountId: string): number {
    return this.require(accountId).balanceMinorUnits;
  }

  getTransactions(accountId: string): readonly Transaction[] {
    return this.require(accountId).transactions.map(tx => ({ ...tx }));
  }

  debit(accountId: string, amountMinorUnits: number): void {
    const account = this.require(accountId);
    if (account.balanceMinorUnits - amountMinorUnits < 0) {
      throw new ApiFailure(
        'INSUFFICIENT_FUNDS',
        `Insufficient funds: balance ${account.balanceMinorUnits} cannot cover payment of ${amountMinorUnits}`
      );
    }
    account.balanceMinorUnits -= amountMinorUnits;
  }

  recordTransaction(accountId: string, tx: Transaction): void {
    this.require(accountId).transactions.push(Object.freeze({ ...tx }));
  }

  // Debit and append without yielding to the event loop in between.
  applyPayment(accountId: string, tx: Transaction): void {
    this.debit(accountId, tx.amountMinorUnits);
    this.recordTransaction(accountId, tx);
  }

  private require(accountId: string): Account {
    const account = this.accounts.get(accountId.toLowerCase());
    if (!account) throw accountNotFound(accountId);
    return account;
  }
}
