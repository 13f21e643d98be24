import type { Address } from "viem";
import { ACK, fail, type Result } from "../result.js";

/**
 * Atomic value-transfer primitive of the host ledger. A failed transfer
 * has no partial effect.
 */
export interface ValueTransfer {
  balanceOf(account: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): Result<void>;
}

/** Balance map standing in for the host ledger. */
export class InMemoryValueLedger implements ValueTransfer {
  private readonly balances = new Map<Address, bigint>();

  constructor(seed: Iterable<readonly [Address, bigint]> = []) {
    for (const [account, amount] of seed) {
      this.credit(account, amount);
    }
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  credit(account: Address, amount: bigint): bigint {
    if (amount < 0n) {
      throw new RangeError(`Cannot credit a negative amount (${amount})`);
    }
    const next = this.balanceOf(account) + amount;
    this.balances.set(account, next);
    return next;
  }

  transfer(from: Address, to: Address, amount: bigint): Result<void> {
    if (amount <= 0n) {
      return fail("InvalidParameter", `Transfer amount must be positive, got ${amount}`);
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      return fail(
        "InsufficientFunds",
        `${from} holds ${available}, needs ${amount}`,
      );
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return ACK;
  }
}
