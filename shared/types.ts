import type { Address } from "viem";

// ─── Ledger records ──────────────────────────────────────────────────────────

export interface Market {
  id: number;
  description: string;
  /** `null` until the market is resolved */
  outcome: boolean | null;
  closeBlock: number;
  expiryBlock: number;
  creator: Address;
  /** Block height at which the market was created */
  createdAt: number;
}

export interface BetKey {
  marketId: number;
  user: Address;
}

export interface Bet extends BetKey {
  amount: bigint;
  prediction: boolean;
}

export interface Settings {
  owner: Address;
  minBet: bigint;
  maxBet: bigint;
  expiryPeriod: number;
}

export interface Limits {
  minCloseDelay: number;
  maxCloseDelay: number;
  maxExpiryDelay: number;
  minDescriptionLength: number;
  maxDescriptionLength: number;
  minExpiryPeriod: number;
  maxExpiryPeriod: number;
  betCeiling: bigint;
}

// ─── Lifecycle ───────────────────────────────────────────────────────────────

export type MarketPhase = "open" | "closed" | "resolved" | "expired";

export function getMarketPhase(market: Market, blockHeight: number): MarketPhase {
  if (market.outcome !== null) return "resolved";
  if (blockHeight >= market.expiryBlock) return "expired";
  if (blockHeight >= market.closeBlock) return "closed";
  return "open";
}

// ─── Wire format (amounts as decimal strings) ────────────────────────────────

export interface MarketView {
  id: number;
  description: string;
  outcome: boolean | null;
  closeBlock: number;
  expiryBlock: number;
  creator: string;
  createdAt: number;
  phase: MarketPhase;
  outstanding: string;
}

export interface BetView {
  marketId: number;
  user: string;
  amount: string;
  prediction: boolean;
}

export interface SettingsView {
  owner: string;
  minBet: string;
  maxBet: string;
  expiryPeriod: number;
}
