import { Hono } from "hono";
import type { EscrowEngine } from "../services/escrow-engine.js";
import {
  createMarketSchema,
  marketIdSchema,
  placeBetSchema,
  resolveMarketSchema,
  callerSchema,
} from "../validation.js";
import {
  failure,
  invalid,
  missingCaller,
  readBody,
  readCaller,
  toBetView,
  toMarketView,
} from "./respond.js";

export function marketRoutes(engine: EscrowEngine): Hono {
  const routes = new Hono();

  routes.get("/markets", (c) => {
    const height = engine.getBlockHeight();
    const markets = engine
      .listMarkets()
      .map((m) => toMarketView(m, height, engine.getMarketStake(m.id)));
    return c.json({ count: markets.length, lastId: engine.getLastMarketId(), markets });
  });

  routes.get("/markets/:id", (c) => {
    const id = marketIdSchema.safeParse(c.req.param("id"));
    if (!id.success) return invalid(c, id.error.flatten());

    const market = engine.getMarket(id.data);
    if (!market.ok) return failure(c, market.error);
    return c.json(
      toMarketView(market.value, engine.getBlockHeight(), engine.getMarketStake(id.data)),
    );
  });

  routes.post("/markets", async (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const parsed = createMarketSchema.safeParse(await readBody(c));
    if (!parsed.success) return invalid(c, parsed.error.flatten());

    const result = engine.createMarket(caller, parsed.data.description, parsed.data.closeBlock);
    if (!result.ok) return failure(c, result.error);
    return c.json({ marketId: result.value }, 201);
  });

  routes.delete("/markets/:id", (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const id = marketIdSchema.safeParse(c.req.param("id"));
    if (!id.success) return invalid(c, id.error.flatten());

    const result = engine.cleanupExpiredMarket(caller, id.data);
    if (!result.ok) return failure(c, result.error);
    return c.json({ ok: true });
  });

  // ─── Bets ──────────────────────────────────────────────────────────────────

  routes.get("/markets/:id/bets/:user", (c) => {
    const id = marketIdSchema.safeParse(c.req.param("id"));
    if (!id.success) return invalid(c, id.error.flatten());
    const user = callerSchema.safeParse(c.req.param("user"));
    if (!user.success) return invalid(c, user.error.flatten());

    const bet = engine.getBet(id.data, user.data);
    if (!bet.ok) return failure(c, bet.error);
    return c.json(toBetView(bet.value));
  });

  routes.post("/markets/:id/bets", async (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const id = marketIdSchema.safeParse(c.req.param("id"));
    if (!id.success) return invalid(c, id.error.flatten());
    const parsed = placeBetSchema.safeParse(await readBody(c));
    if (!parsed.success) return invalid(c, parsed.error.flatten());

    const result = engine.placeBet(caller, id.data, parsed.data.prediction, parsed.data.amount);
    if (!result.ok) return failure(c, result.error);
    return c.json(toBetView(result.value), 201);
  });

  // ─── Settlement ────────────────────────────────────────────────────────────

  routes.post("/markets/:id/resolve", async (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const id = marketIdSchema.safeParse(c.req.param("id"));
    if (!id.success) return invalid(c, id.error.flatten());
    const parsed = resolveMarketSchema.safeParse(await readBody(c));
    if (!parsed.success) return invalid(c, parsed.error.flatten());

    const result = engine.resolveMarket(caller, id.data, parsed.data.outcome);
    if (!result.ok) return failure(c, result.error);
    return c.json({ ok: true, outcome: parsed.data.outcome });
  });

  routes.post("/markets/:id/claim", (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const id = marketIdSchema.safeParse(c.req.param("id"));
    if (!id.success) return invalid(c, id.error.flatten());

    const result = engine.claimWinnings(caller, id.data);
    if (!result.ok) return failure(c, result.error);
    return c.json({ ok: true, amount: result.value.toString() });
  });

  routes.post("/markets/:id/refund", (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const id = marketIdSchema.safeParse(c.req.param("id"));
    if (!id.success) return invalid(c, id.error.flatten());

    const result = engine.refundExpiredBet(caller, id.data);
    if (!result.ok) return failure(c, result.error);
    return c.json({ ok: true, amount: result.value.toString() });
  });

  return routes;
}
