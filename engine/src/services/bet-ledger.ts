import type { Address } from "viem";
import type { Bet, BetKey } from "../../../shared/types.js";
import { fail, ok, type Result } from "../result.js";
import type { Clock } from "./clock.js";
import type { ConfigStore } from "./config-store.js";
import type { MarketRegistry } from "./registry.js";
import type { ValueTransfer } from "./value-ledger.js";

/** Map key for a (market, user) pair. Addresses arrive checksummed. */
export function betKeyId({ marketId, user }: BetKey): string {
  return `${marketId}/${user}`;
}

/**
 * Per-(market, user) stakes. Repeated bets add to the amount but replace
 * the prediction outright; the stored direction is always the latest one.
 */
export class BetLedger {
  private readonly bets = new Map<string, Bet>();

  constructor(
    private readonly registry: MarketRegistry,
    private readonly config: ConfigStore,
    private readonly clock: Clock,
    private readonly value: ValueTransfer,
    readonly escrow: Address,
  ) {}

  placeBet(
    marketId: number,
    prediction: boolean,
    amount: bigint,
    caller: Address,
  ): Result<Bet> {
    const found = this.registry.get(marketId);
    if (!found.ok) return found;
    const market = found.value;
    if (caller === this.escrow) {
      return fail("Unauthorized", "The escrow account cannot place bets");
    }

    const key: BetKey = { marketId, user: caller };
    const existing = this.bets.get(betKeyId(key));
    const stake = existing?.amount ?? 0n;
    const { minBet, maxBet } = this.config;

    if (amount <= 0n) {
      return fail("InvalidBet", `Bet amount must be positive, got ${amount}`);
    }
    if (amount < minBet) {
      return fail("BetTooLow", `Bet of ${amount} is below the minimum of ${minBet}`);
    }
    if (amount > maxBet) {
      return fail("BetTooHigh", `Bet of ${amount} exceeds the maximum of ${maxBet}`);
    }
    if (stake + amount > maxBet) {
      return fail(
        "BetTooHigh",
        `Stake of ${stake} plus ${amount} exceeds the maximum of ${maxBet}`,
      );
    }

    const now = this.clock.blockHeight();
    if (now >= market.closeBlock) {
      return fail("MarketClosed", `Market ${marketId} closed at block ${market.closeBlock}`);
    }
    if (market.outcome !== null) {
      return fail("MarketAlreadyResolved", `Market ${marketId} is already resolved`);
    }

    const balance = this.value.balanceOf(caller);
    if (balance < amount) {
      return fail("InsufficientFunds", `${caller} holds ${balance}, needs ${amount}`);
    }

    const moved = this.value.transfer(caller, this.escrow, amount);
    if (!moved.ok) return moved;

    const bet: Bet = { ...key, amount: stake + amount, prediction };
    this.bets.set(betKeyId(key), bet);
    return ok({ ...bet });
  }

  get(key: BetKey): Result<Bet> {
    const bet = this.bets.get(betKeyId(key));
    if (!bet) {
      return fail("BetNotFound", `No bet by ${key.user} on market ${key.marketId}`);
    }
    return ok({ ...bet });
  }

  betsFor(marketId: number): Bet[] {
    return [...this.bets.values()]
      .filter((b) => b.marketId === marketId)
      .map((b) => ({ ...b }));
  }

  /** Total stake still held in escrow for a market. */
  outstanding(marketId: number): bigint {
    return this.betsFor(marketId).reduce((sum, b) => sum + b.amount, 0n);
  }

  remove(key: BetKey): boolean {
    return this.bets.delete(betKeyId(key));
  }
}
