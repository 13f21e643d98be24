import { Hono } from "hono";
import type { EscrowEngine } from "../services/escrow-engine.js";

export function healthRoutes(engine: EscrowEngine): Hono {
  const routes = new Hono();

  routes.get("/health", (c) =>
    c.json({ status: "ok", engine: engine.name, blockHeight: engine.getBlockHeight() }),
  );

  return routes;
}
