import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { DEFAULT_LIMITS, getConfig, type EngineConfig } from "./config.js";
import { ManualClock } from "./services/clock.js";
import { EscrowEngine } from "./services/escrow-engine.js";
import { InMemoryValueLedger } from "./services/value-ledger.js";
import { chainRoutes, type HostSimulation } from "./routes/chain.js";
import { configRoutes } from "./routes/config.js";
import { healthRoutes } from "./routes/health.js";
import { marketRoutes } from "./routes/markets.js";

export function createApp(engine: EscrowEngine, host?: HostSimulation): Hono {
  const app = new Hono();

  app.route("/", healthRoutes(engine));
  app.route("/", configRoutes(engine));
  app.route("/", marketRoutes(engine));
  if (host) app.route("/", chainRoutes(host));

  return app;
}

/** Wires an engine to the in-process host chain. */
export function createSimulatedEngine(config: EngineConfig) {
  const clock = new ManualClock(config.genesisHeight);
  const ledger = new InMemoryValueLedger(config.ledgerSeed);
  const engine = new EscrowEngine({
    name: config.name,
    settings: {
      owner: config.owner,
      minBet: config.minBet,
      maxBet: config.maxBet,
      expiryPeriod: config.expiryPeriod,
    },
    limits: DEFAULT_LIMITS,
    clock,
    value: ledger,
    escrow: config.escrowAddress,
  });
  return { engine, host: { clock, ledger } satisfies HostSimulation };
}

// Only start server when run directly (not imported for tests)
const isDirectRun =
  process.argv[1]?.endsWith("index.ts") ||
  process.argv[1]?.endsWith("index.js");

if (isDirectRun) {
  const config = getConfig(process.env);
  const { engine, host } = createSimulatedEngine(config);
  const app = createApp(engine, host);

  console.log(
    `[${config.name}] Starting escrow engine on port ${config.port} (owner ${config.owner}, height ${config.genesisHeight})`,
  );
  serve({ fetch: app.fetch, port: config.port });
}
