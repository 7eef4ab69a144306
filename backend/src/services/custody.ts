import { getAddress, type Address } from "viem";

// ============================================
// Custody contract
// ============================================

/**
 * Moves the funding token between a user's external balance and the engine's
 * vault. Both calls either complete or reject without moving anything.
 */
export interface Custody {
  transferIn(from: Address, amount: bigint): Promise<void>;
  transferOut(to: Address, amount: bigint): Promise<void>;
}

export class CustodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CustodyError";
  }
}

// ============================================
// In-process ledger
// ============================================

/**
 * Ledger custody: external balances per account plus a single vault balance.
 * Used in demo mode and as the stand-in for tests.
 */
export class LedgerCustody implements Custody {
  private readonly balances = new Map<Address, bigint>();
  private vault = 0n;
  private readonly frozen = new Set<Address>();

  credit(account: Address, amount: bigint): bigint {
    if (amount <= 0n) {
      throw new CustodyError("Credit amount must be positive");
    }
    const key = getAddress(account);
    const next = this.balanceOf(key) + amount;
    this.balances.set(key, next);
    return next;
  }

  /**
   * Block every transfer to or from an account, e.g. a revoked approval.
   */
  freeze(account: Address): void {
    this.frozen.add(getAddress(account));
  }

  unfreeze(account: Address): void {
    this.frozen.delete(getAddress(account));
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  vaultBalance(): bigint {
    return this.vault;
  }

  async transferIn(from: Address, amount: bigint): Promise<void> {
    const key = getAddress(from);
    this.assertTransferable(key, amount);

    const balance = this.balanceOf(key);
    if (balance < amount) {
      throw new CustodyError(`Insufficient balance: ${balance} < ${amount}`);
    }

    this.balances.set(key, balance - amount);
    this.vault += amount;
  }

  async transferOut(to: Address, amount: bigint): Promise<void> {
    const key = getAddress(to);
    this.assertTransferable(key, amount);

    if (this.vault < amount) {
      throw new CustodyError(`Insufficient vault balance: ${this.vault} < ${amount}`);
    }

    this.vault -= amount;
    this.balances.set(key, this.balanceOf(key) + amount);
  }

  private assertTransferable(account: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new CustodyError("Transfer amount must be positive");
    }
    if (this.frozen.has(account)) {
      throw new CustodyError(`Transfers for ${account} are blocked`);
    }
  }
}
