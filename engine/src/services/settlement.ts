import type { Address } from "viem";
import type { Bet, Market } from "../../../shared/types.js";
import { fail, ok, type Result } from "../result.js";
import type { BetLedger } from "./bet-ledger.js";
import type { Clock } from "./clock.js";
import type { MarketRegistry } from "./registry.js";
import type { ValueTransfer } from "./value-ledger.js";

interface Position {
  market: Market;
  bet: Bet;
}

/**
 * Resolves markets and pays stakes back out of escrow.
 *
 * Winners recover exactly their principal; losing stakes stay in escrow.
 * Markets that reach expiry unresolved are refunded in full. A bet leaves
 * the ledger only after its payout transfer has gone through.
 */
export class SettlementEngine {
  constructor(
    private readonly registry: MarketRegistry,
    private readonly ledger: BetLedger,
    private readonly clock: Clock,
    private readonly value: ValueTransfer,
  ) {}

  /** Any caller may resolve an eligible market. */
  resolve(marketId: number, outcome: boolean): Result<void> {
    const found = this.registry.get(marketId);
    if (!found.ok) return found;
    const market = found.value;
    const now = this.clock.blockHeight();

    if (market.outcome !== null) {
      return fail("MarketAlreadyResolved", `Market ${marketId} is already resolved`);
    }
    if (now < market.closeBlock) {
      return fail(
        "MarketNotClosed",
        `Market ${marketId} closes at block ${market.closeBlock} (now ${now})`,
      );
    }
    if (now >= market.expiryBlock) {
      return fail("MarketExpired", `Market ${marketId} expired at block ${market.expiryBlock}`);
    }

    return this.registry.recordOutcome(marketId, outcome);
  }

  claim(marketId: number, caller: Address): Result<bigint> {
    const position = this.position(marketId, caller);
    if (!position.ok) return position;
    const { market, bet } = position.value;

    if (market.outcome === null) {
      return fail("MarketNotResolved", `Market ${marketId} has not been resolved`);
    }
    if (this.clock.blockHeight() >= market.expiryBlock) {
      return fail(
        "MarketExpired",
        `Claims on market ${marketId} closed at block ${market.expiryBlock}`,
      );
    }
    if (bet.prediction !== market.outcome) {
      return fail("BetLost", `Bet by ${caller} on market ${marketId} did not win`);
    }

    return this.payOut(bet);
  }

  refund(marketId: number, caller: Address): Result<bigint> {
    const position = this.position(marketId, caller);
    if (!position.ok) return position;
    const { market, bet } = position.value;
    const now = this.clock.blockHeight();

    if (now < market.expiryBlock) {
      return fail(
        "MarketNotExpired",
        `Market ${marketId} expires at block ${market.expiryBlock} (now ${now})`,
      );
    }
    if (market.outcome !== null) {
      return fail(
        "MarketAlreadyResolved",
        `Market ${marketId} was resolved; resolved markets are not refundable`,
      );
    }

    return this.payOut(bet);
  }

  private position(marketId: number, user: Address): Result<Position> {
    const market = this.registry.get(marketId);
    if (!market.ok) return market;
    const bet = this.ledger.get({ marketId, user });
    if (!bet.ok) return bet;
    return ok({ market: market.value, bet: bet.value });
  }

  private payOut(bet: Bet): Result<bigint> {
    const moved = this.value.transfer(this.ledger.escrow, bet.user, bet.amount);
    if (!moved.ok) return moved;
    this.ledger.remove(bet);
    return ok(bet.amount);
  }
}
