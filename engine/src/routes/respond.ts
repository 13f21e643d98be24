import type { Context } from "hono";
import type { Address } from "viem";
import {
  getMarketPhase,
  type Bet,
  type BetView,
  type Market,
  type MarketView,
  type Settings,
  type SettingsView,
} from "../../../shared/types.js";
import type { EngineError, ErrorKind } from "../result.js";
import { callerSchema } from "../validation.js";

const STATUS_BY_KIND = {
  validation: 400,
  funds: 402,
  authorization: 403,
  resource: 404,
  lifecycle: 409,
} as const satisfies Record<ErrorKind, number>;

export function failure(c: Context, error: EngineError) {
  return c.json(
    { error: error.code, kind: error.kind, message: error.message },
    STATUS_BY_KIND[error.kind],
  );
}

export function invalid(c: Context, details: object) {
  return c.json({ error: "Invalid request", details }, 400);
}

/** Identity of the principal making the call, supplied by the host. */
export function readCaller(c: Context): Address | null {
  const parsed = callerSchema.safeParse(c.req.header("x-caller"));
  return parsed.success ? parsed.data : null;
}

export function missingCaller(c: Context) {
  return c.json({ error: "Missing caller", details: "x-caller must be an address" }, 401);
}

/** Request body as JSON, or `undefined` when it is absent or malformed. */
export async function readBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

// ─── Views ───────────────────────────────────────────────────────────────────

export function toMarketView(market: Market, blockHeight: number, outstanding: bigint): MarketView {
  return {
    ...market,
    phase: getMarketPhase(market, blockHeight),
    outstanding: outstanding.toString(),
  };
}

export function toBetView(bet: Bet): BetView {
  return { ...bet, amount: bet.amount.toString() };
}

export function toSettingsView(settings: Settings): SettingsView {
  return {
    owner: settings.owner,
    minBet: settings.minBet.toString(),
    maxBet: settings.maxBet.toString(),
    expiryPeriod: settings.expiryPeriod,
  };
}
