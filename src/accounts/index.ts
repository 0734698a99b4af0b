/**
 * Shared platform accounts
 *
 * Each account gets exactly one permit. Fetches that use the same account run
 * one at a time, in arrival order; fetches of different accounts (or without
 * an account) never wait on each other.
 */

import type { PlatformAccount } from '../sources';
import { getLogger, Mutex } from '../utils';

const logger = getLogger('Accounts');

export class AccountHandle {
  readonly account: PlatformAccount;
  private permit = new Mutex();

  constructor(account: PlatformAccount) {
    this.account = account;
  }

  get name(): string {
    return this.account.name;
  }

  /**
   * Run `task` while holding this account's permit
   */
  async withPermit<T>(
    task: (account: PlatformAccount) => Promise<T>,
    holder?: string
  ): Promise<T> {
    if (this.permit.isLocked) {
      logger.debug(
        `Waiting for account '${this.name}' (${this.permit.waiting} ahead)`,
        holder ? { subscription: holder } : undefined
      );
    }
    return this.permit.runExclusive(() => task(this.account));
  }
}

export class AccountPool {
  private handles = new Map<string, AccountHandle>();

  constructor(accounts: Iterable<PlatformAccount>) {
    for (const account of accounts) {
      this.handles.set(account.name, new AccountHandle(account));
    }
  }

  get(name: string): AccountHandle | undefined {
    return this.handles.get(name);
  }

  get size(): number {
    return this.handles.size;
  }
}
