import type { Address } from "viem";
import {
  getMarketPhase,
  type Bet,
  type Limits,
  type Market,
  type MarketPhase,
  type Settings,
} from "../../../shared/types.js";
import { ok, type Result } from "../result.js";
import { BetLedger } from "./bet-ledger.js";
import type { Clock } from "./clock.js";
import { ConfigStore } from "./config-store.js";
import { MarketRegistry } from "./registry.js";
import { SettlementEngine } from "./settlement.js";
import type { ValueTransfer } from "./value-ledger.js";

export type EngineLogger = Pick<Console, "log" | "warn">;

export interface EngineOptions {
  settings: Settings;
  limits: Limits;
  clock: Clock;
  value: ValueTransfer;
  /** Account that holds staked value between bet and payout */
  escrow: Address;
  name?: string;
  logger?: EngineLogger;
}

/**
 * Entry point for every public operation.
 *
 * Operations are synchronous and run to completion one at a time: each
 * validates, moves value, then mutates. A failed call changes nothing.
 */
export class EscrowEngine {
  readonly config: ConfigStore;
  readonly registry: MarketRegistry;
  readonly ledger: BetLedger;
  readonly settlement: SettlementEngine;
  readonly clock: Clock;
  readonly name: string;
  private readonly logger: EngineLogger;

  constructor(options: EngineOptions) {
    this.clock = options.clock;
    this.name = options.name ?? "escrow";
    this.logger = options.logger ?? console;
    this.config = new ConfigStore(options.settings, options.limits);
    this.registry = new MarketRegistry(this.config, this.clock);
    this.ledger = new BetLedger(
      this.registry,
      this.config,
      this.clock,
      options.value,
      options.escrow,
    );
    this.settlement = new SettlementEngine(
      this.registry,
      this.ledger,
      this.clock,
      options.value,
    );
  }

  // ─── Markets ───────────────────────────────────────────────────────────────

  createMarket(caller: Address, description: string, closeBlock: number): Result<number> {
    const result = this.registry.create(description, closeBlock, caller);
    if (result.ok) {
      const expiry = closeBlock + this.config.expiryPeriod;
      this.info(`Market #${result.value} created by ${caller} (close ${closeBlock}, expiry ${expiry})`);
    }
    return result;
  }

  placeBet(caller: Address, marketId: number, prediction: boolean, amount: bigint): Result<Bet> {
    const result = this.ledger.placeBet(marketId, prediction, amount, caller);
    if (result.ok) {
      this.info(
        `Bet on #${marketId} by ${caller}: +${amount} ${prediction ? "YES" : "NO"} (stake ${result.value.amount})`,
      );
    }
    return result;
  }

  resolveMarket(caller: Address, marketId: number, outcome: boolean): Result<void> {
    const result = this.settlement.resolve(marketId, outcome);
    if (result.ok) {
      this.info(`Market #${marketId} resolved ${outcome ? "YES" : "NO"} by ${caller}`);
    }
    return result;
  }

  claimWinnings(caller: Address, marketId: number): Result<bigint> {
    const result = this.settlement.claim(marketId, caller);
    if (result.ok) this.info(`Claim on #${marketId}: ${result.value} paid to ${caller}`);
    return result;
  }

  refundExpiredBet(caller: Address, marketId: number): Result<bigint> {
    const result = this.settlement.refund(marketId, caller);
    if (result.ok) this.info(`Refund on #${marketId}: ${result.value} returned to ${caller}`);
    return result;
  }

  cleanupExpiredMarket(caller: Address, marketId: number): Result<void> {
    const bets = this.ledger.betsFor(marketId);
    const result = this.registry.cleanup(marketId, caller);
    if (!result.ok) return result;

    this.info(`Market #${marketId} cleaned up by ${caller}`);
    if (bets.length > 0) {
      const stranded = bets.reduce((sum, b) => sum + b.amount, 0n);
      this.logger.warn(
        `[${this.name}] Market #${marketId} removed with ${bets.length} open bet(s) holding ${stranded}; they can no longer be claimed or refunded`,
      );
    }
    return result;
  }

  // ─── Administration ────────────────────────────────────────────────────────

  setExpiryPeriod(caller: Address, value: number): Result<void> {
    return this.audit(this.config.setExpiryPeriod(caller, value), `Expiry period set to ${value}`);
  }

  setMinBetAmount(caller: Address, value: bigint): Result<void> {
    return this.audit(this.config.setMinBet(caller, value), `Minimum bet set to ${value}`);
  }

  setMaxBetAmount(caller: Address, value: bigint): Result<void> {
    return this.audit(this.config.setMaxBet(caller, value), `Maximum bet set to ${value}`);
  }

  transferOwnership(caller: Address, newOwner: Address): Result<void> {
    return this.audit(
      this.config.transferOwnership(caller, newOwner),
      `Ownership transferred from ${caller} to ${newOwner}`,
    );
  }

  // ─── Reads ─────────────────────────────────────────────────────────────────

  getMarket(marketId: number): Result<Market> {
    return this.registry.get(marketId);
  }

  listMarkets(): Market[] {
    return this.registry.list();
  }

  getMarketPhase(marketId: number): Result<MarketPhase> {
    const market = this.registry.get(marketId);
    if (!market.ok) return market;
    return ok(getMarketPhase(market.value, this.clock.blockHeight()));
  }

  getBet(marketId: number, user: Address): Result<Bet> {
    return this.ledger.get({ marketId, user });
  }

  getMarketStake(marketId: number): bigint {
    return this.ledger.outstanding(marketId);
  }

  getLastMarketId(): number {
    return this.registry.lastId();
  }

  getSettings(): Settings {
    return this.config.snapshot();
  }

  getOwner(): Address {
    return this.config.owner;
  }

  getMinBetAmount(): bigint {
    return this.config.minBet;
  }

  getMaxBetAmount(): bigint {
    return this.config.maxBet;
  }

  getExpiryPeriod(): number {
    return this.config.expiryPeriod;
  }

  getBlockHeight(): number {
    return this.clock.blockHeight();
  }

  private audit(result: Result<void>, message: string): Result<void> {
    if (result.ok) this.info(message);
    return result;
  }

  private info(message: string): void {
    this.logger.log(`[${this.name}] ${message}`);
  }
}
