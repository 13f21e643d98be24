import { Hono } from "hono";
import type { ManualClock } from "../services/clock.js";
import type { InMemoryValueLedger } from "../services/value-ledger.js";
import { callerSchema, fundSchema, mineSchema } from "../validation.js";
import { invalid, readBody } from "./respond.js";

export interface HostSimulation {
  clock: ManualClock;
  ledger: InMemoryValueLedger;
}

// Stand-ins for the host chain: block production and account funding.
export function chainRoutes({ clock, ledger }: HostSimulation): Hono {
  const routes = new Hono();

  routes.get("/chain/height", (c) => c.json({ height: clock.blockHeight() }));

  routes.post("/chain/mine", async (c) => {
    const parsed = mineSchema.safeParse((await readBody(c)) ?? {});
    if (!parsed.success) return invalid(c, parsed.error.flatten());
    try {
      return c.json({ height: clock.advance(parsed.data.blocks) });
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      return invalid(c, { formErrors: [err.message], fieldErrors: {} });
    }
  });

  routes.post("/chain/fund", async (c) => {
    const parsed = fundSchema.safeParse(await readBody(c));
    if (!parsed.success) return invalid(c, parsed.error.flatten());
    const balance = ledger.credit(parsed.data.account, parsed.data.amount);
    return c.json({ account: parsed.data.account, balance: balance.toString() });
  });

  routes.get("/chain/balances/:account", (c) => {
    const account = callerSchema.safeParse(c.req.param("account"));
    if (!account.success) return invalid(c, account.error.flatten());
    return c.json({
      account: account.data,
      balance: ledger.balanceOf(account.data).toString(),
    });
  });

  return routes;
}
