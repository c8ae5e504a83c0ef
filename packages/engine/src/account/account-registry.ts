import type { AccountSnapshot, ClientId } from '@ledgerflow/core';

import { Account } from './account.js';

/**
 * Client id → Account. Accounts are created lazily on first reference and never removed.
 * Enumeration order is unspecified.
 */
export class AccountRegistry {
  private readonly accounts = new Map<ClientId, Account>();

  getOrCreate(clientId: ClientId): Account {
    let account = this.accounts.get(clientId);
    if (!account) {
      account = new Account(clientId);
      this.accounts.set(clientId, account);
    }
    return account;
  }

  snapshots(): AccountSnapshot[] {
    return Array.from(this.accounts.values(), (account) => account.snapshot());
  }

  get size(): number {
    return this.accounts.size;
  }
}
