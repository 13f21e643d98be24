import type { Address } from "viem";
import type { Market } from "../../../shared/types.js";
import { ACK, fail, ok, type Result } from "../result.js";
import type { Clock } from "./clock.js";
import type { ConfigStore } from "./config-store.js";

/**
 * Owns every market record and hands out ids from a single counter.
 * Ids start at 1 and are never reused, even after cleanup.
 */
export class MarketRegistry {
  private readonly markets = new Map<number, Market>();
  private lastAllocatedId = 0;

  constructor(
    private readonly config: ConfigStore,
    private readonly clock: Clock,
  ) {}

  create(description: string, closeBlock: number, creator: Address): Result<number> {
    const { limits } = this.config;
    const now = this.clock.blockHeight();

    const length = [...description].length;
    if (length < limits.minDescriptionLength || length > limits.maxDescriptionLength) {
      return fail(
        "InvalidParameter",
        `Description must be ${limits.minDescriptionLength}-${limits.maxDescriptionLength} characters, got ${length}`,
      );
    }

    const earliest = now + limits.minCloseDelay;
    const latest = now + limits.maxCloseDelay;
    if (!Number.isSafeInteger(closeBlock) || closeBlock < earliest || closeBlock > latest) {
      return fail(
        "InvalidCloseBlock",
        `Close block must be within [${earliest}, ${latest}], got ${closeBlock}`,
      );
    }

    const expiryBlock = closeBlock + this.config.expiryPeriod;
    if (expiryBlock <= closeBlock || expiryBlock - now > limits.maxExpiryDelay) {
      return fail(
        "InvalidParameter",
        `Expiry block ${expiryBlock} must follow close block ${closeBlock} by at most ${limits.maxExpiryDelay} blocks from now`,
      );
    }

    const id = ++this.lastAllocatedId;
    this.markets.set(id, {
      id,
      description,
      outcome: null,
      closeBlock,
      expiryBlock,
      creator,
      createdAt: now,
    });
    return ok(id);
  }

  get(marketId: number): Result<Market> {
    const market = this.markets.get(marketId);
    if (!market) return fail("NotFound", `Market ${marketId} not found`);
    return ok({ ...market });
  }

  list(): Market[] {
    return [...this.markets.values()].map((m) => ({ ...m }));
  }

  lastId(): number {
    return this.lastAllocatedId;
  }

  /** Records the outcome; lifecycle checks belong to the caller. */
  recordOutcome(marketId: number, outcome: boolean): Result<void> {
    const market = this.markets.get(marketId);
    if (!market) return fail("NotFound", `Market ${marketId} not found`);
    if (market.outcome !== null) {
      return fail("MarketAlreadyResolved", `Market ${marketId} is already resolved`);
    }
    this.markets.set(marketId, { ...market, outcome });
    return ACK;
  }

  /**
   * Deletes an expired market on behalf of its creator. Outstanding bets
   * are left in place and can no longer be claimed or refunded.
   */
  cleanup(marketId: number, caller: Address): Result<void> {
    const market = this.markets.get(marketId);
    if (!market) return fail("NotFound", `Market ${marketId} not found`);
    const now = this.clock.blockHeight();
    if (now < market.expiryBlock) {
      return fail(
        "MarketNotExpired",
        `Market ${marketId} expires at block ${market.expiryBlock} (now ${now})`,
      );
    }
    if (caller !== market.creator) {
      return fail("Unauthorized", `Only the creator of market ${marketId} may clean it up`);
    }
    this.markets.delete(marketId);
    return ACK;
  }
}
