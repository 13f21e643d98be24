import { Hono } from "hono";
import type { EscrowEngine } from "../services/escrow-engine.js";
import {
  amountSettingSchema,
  blockSettingSchema,
  transferOwnershipSchema,
} from "../validation.js";
import {
  failure,
  invalid,
  missingCaller,
  readBody,
  readCaller,
  toSettingsView,
} from "./respond.js";

export function configRoutes(engine: EscrowEngine): Hono {
  const routes = new Hono();

  routes.get("/config", (c) => c.json(toSettingsView(engine.getSettings())));

  routes.put("/config/expiry-period", async (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const parsed = blockSettingSchema.safeParse(await readBody(c));
    if (!parsed.success) return invalid(c, parsed.error.flatten());

    const result = engine.setExpiryPeriod(caller, parsed.data.value);
    if (!result.ok) return failure(c, result.error);
    return c.json(toSettingsView(engine.getSettings()));
  });

  routes.put("/config/min-bet", async (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const parsed = amountSettingSchema.safeParse(await readBody(c));
    if (!parsed.success) return invalid(c, parsed.error.flatten());

    const result = engine.setMinBetAmount(caller, parsed.data.value);
    if (!result.ok) return failure(c, result.error);
    return c.json(toSettingsView(engine.getSettings()));
  });

  routes.put("/config/max-bet", async (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const parsed = amountSettingSchema.safeParse(await readBody(c));
    if (!parsed.success) return invalid(c, parsed.error.flatten());

    const result = engine.setMaxBetAmount(caller, parsed.data.value);
    if (!result.ok) return failure(c, result.error);
    return c.json(toSettingsView(engine.getSettings()));
  });

  routes.put("/config/owner", async (c) => {
    const caller = readCaller(c);
    if (!caller) return missingCaller(c);
    const parsed = transferOwnershipSchema.safeParse(await readBody(c));
    if (!parsed.success) return invalid(c, parsed.error.flatten());

    const result = engine.transferOwnership(caller, parsed.data.newOwner);
    if (!result.ok) return failure(c, result.error);
    return c.json(toSettingsView(engine.getSettings()));
  });

  return routes;
}
