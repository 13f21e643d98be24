import { describe, it, expect, beforeEach } from "vitest";
import type { Hono } from "hono";
import type { Address } from "viem";
import { createApp } from "../src/index.js";
import { ALICE, BOB, ESCROW, OWNER, setup } from "./helpers.js";

let app: Hono;

beforeEach(() => {
  const { engine, clock, ledger } = setup();
  app = createApp(engine, { clock, ledger });
});

function send(
  method: string,
  path: string,
  options: { caller?: Address; body?: unknown } = {},
) {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (options.caller) headers["x-caller"] = options.caller;
  return app.request(path, {
    method,
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  });
}

async function createMarket() {
  const res = await send("POST", "/markets", {
    caller: ALICE,
    body: { description: "Will X pass?", closeBlock: 1200 },
  });
  expect(res.status).toBe(201);
}

describe("GET /health", () => {
  it("reports the engine name and block height", async () => {
    const res = await send("GET", "/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", engine: "escrow", blockHeight: 1000 });
  });
});

describe("POST /markets", () => {
  it("requires a caller", async () => {
    const res = await send("POST", "/markets", {
      body: { description: "Will X pass?", closeBlock: 1200 },
    });
    expect(res.status).toBe(401);
    const data = await res.json();
    expect(data).toHaveProperty("error", "Missing caller");
  });

  it("rejects a malformed caller", async () => {
    const res = await app.request("/markets", {
      method: "POST",
      headers: { "Content-Type": "application/json", "x-caller": "alice" },
      body: JSON.stringify({ description: "Will X pass?", closeBlock: 1200 }),
    });
    expect(res.status).toBe(401);
  });

  it("rejects an invalid body", async () => {
    const res = await send("POST", "/markets", { caller: ALICE, body: { description: 5 } });
    expect(res.status).toBe(400);
    const data = await res.json();
    expect(data).toHaveProperty("error", "Invalid request");
    expect(data).toHaveProperty("details");
  });

  it("rejects a body that is not JSON", async () => {
    const res = await app.request("/markets", {
      method: "POST",
      headers: { "Content-Type": "application/json", "x-caller": ALICE },
      body: "{not json",
    });
    expect(res.status).toBe(400);
  });

  it("creates a market and returns its id", async () => {
    const res = await send("POST", "/markets", {
      caller: ALICE,
      body: { description: "Will X pass?", closeBlock: 1200 },
    });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ marketId: 1 });

    const market = await send("GET", "/markets/1");
    expect(market.status).toBe(200);
    expect(await market.json()).toEqual({
      id: 1,
      description: "Will X pass?",
      outcome: null,
      closeBlock: 1200,
      expiryBlock: 11_200,
      creator: ALICE,
      createdAt: 1000,
      phase: "open",
      outstanding: "0",
    });
  });

  it("maps a bad close block to 400 with its code", async () => {
    const res = await send("POST", "/markets", {
      caller: ALICE,
      body: { description: "Will X pass?", closeBlock: 1050 },
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "InvalidCloseBlock",
      kind: "validation",
      message: "Close block must be within [1100, 53560], got 1050",
    });
  });
});

describe("GET /markets", () => {
  it("lists markets with the last allocated id", async () => {
    await createMarket();
    await createMarket();
    const res = await send("GET", "/markets");
    const data = await res.json();
    expect(data.count).toBe(2);
    expect(data.lastId).toBe(2);
    expect(data.markets.map((m: { id: number }) => m.id)).toEqual([1, 2]);
  });

  it("returns 404 for an unknown market", async () => {
    const res = await send("GET", "/markets/7");
    expect(res.status).toBe(404);
    const data = await res.json();
    expect(data).toHaveProperty("error", "NotFound");
    expect(data).toHaveProperty("kind", "resource");
  });

  it("returns 400 for a non-numeric id", async () => {
    const res = await send("GET", "/markets/abc");
    expect(res.status).toBe(400);
  });
});

describe("bets", () => {
  it("accumulates stakes given as strings or numbers", async () => {
    await createMarket();

    const first = await send("POST", "/markets/1/bets", {
      caller: BOB,
      body: { prediction: true, amount: "50" },
    });
    expect(first.status).toBe(201);

    const second = await send("POST", "/markets/1/bets", {
      caller: BOB,
      body: { prediction: true, amount: 30 },
    });
    expect(await second.json()).toEqual({
      marketId: 1,
      user: BOB,
      amount: "80",
      prediction: true,
    });

    const bet = await send("GET", `/markets/1/bets/${BOB}`);
    expect(await bet.json()).toEqual({ marketId: 1, user: BOB, amount: "80", prediction: true });

    const balance = await send("GET", `/chain/balances/${BOB}`);
    expect(await balance.json()).toEqual({ account: BOB, balance: "9999920" });
  });

  it("maps a low bet to 400 BetTooLow", async () => {
    await createMarket();
    const res = await send("POST", "/markets/1/bets", {
      caller: BOB,
      body: { prediction: true, amount: "5" },
    });
    expect(res.status).toBe(400);
    const data = await res.json();
    expect(data).toHaveProperty("error", "BetTooLow");
  });

  it("maps an unfunded caller to 402", async () => {
    await createMarket();
    const stranger: Address = "0x6000000000000000000000000000000000000006";
    const res = await send("POST", "/markets/1/bets", {
      caller: stranger,
      body: { prediction: true, amount: "50" },
    });
    expect(res.status).toBe(402);
    const data = await res.json();
    expect(data).toHaveProperty("error", "InsufficientFunds");
  });

  it("rejects numeric amounts beyond the safe integer range", async () => {
    await createMarket();
    const res = await app.request("/markets/1/bets", {
      method: "POST",
      headers: { "Content-Type": "application/json", "x-caller": BOB },
      body: '{"prediction":true,"amount":9007199254740993}',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toHaveProperty("error", "Invalid request");
  });

  it("rejects a bet from the escrow account", async () => {
    await createMarket();
    const res = await send("POST", "/markets/1/bets", {
      caller: ESCROW,
      body: { prediction: true, amount: "50" },
    });
    expect(res.status).toBe(403);
    expect(await res.json()).toHaveProperty("error", "Unauthorized");
  });

  it("rejects negative amounts before they reach the engine", async () => {
    await createMarket();
    const res = await send("POST", "/markets/1/bets", {
      caller: BOB,
      body: { prediction: true, amount: -50 },
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toHaveProperty("error", "Invalid request");
  });
});

describe("settlement", () => {
  it("resolves after mining past the close block and pays the winner", async () => {
    await createMarket();
    await send("POST", "/markets/1/bets", { caller: BOB, body: { prediction: true, amount: "80" } });

    const early = await send("POST", "/markets/1/resolve", { caller: OWNER, body: { outcome: true } });
    expect(early.status).toBe(409);
    expect(await early.json()).toHaveProperty("error", "MarketNotClosed");

    const mined = await send("POST", "/chain/mine", { body: { blocks: 200 } });
    expect(await mined.json()).toEqual({ height: 1200 });

    const resolved = await send("POST", "/markets/1/resolve", { caller: OWNER, body: { outcome: true } });
    expect(resolved.status).toBe(200);
    expect(await resolved.json()).toEqual({ ok: true, outcome: true });

    const claim = await send("POST", "/markets/1/claim", { caller: BOB });
    expect(claim.status).toBe(200);
    expect(await claim.json()).toEqual({ ok: true, amount: "80" });

    const again = await send("POST", "/markets/1/claim", { caller: BOB });
    expect(again.status).toBe(404);
    expect(await again.json()).toHaveProperty("error", "BetNotFound");
  });

  it("refunds and cleans up an expired market", async () => {
    await createMarket();
    await send("POST", "/markets/1/bets", { caller: BOB, body: { prediction: false, amount: "40" } });
    await send("POST", "/chain/mine", { body: { blocks: 10_200 } });

    const refund = await send("POST", "/markets/1/refund", { caller: BOB });
    expect(await refund.json()).toEqual({ ok: true, amount: "40" });

    const denied = await send("DELETE", "/markets/1", { caller: BOB });
    expect(denied.status).toBe(403);

    const cleaned = await send("DELETE", "/markets/1", { caller: ALICE });
    expect(cleaned.status).toBe(200);
    expect((await send("GET", "/markets/1")).status).toBe(404);
  });
});

describe("config", () => {
  it("returns the settings with amounts as strings", async () => {
    const res = await send("GET", "/config");
    expect(await res.json()).toEqual({
      owner: OWNER,
      minBet: "10",
      maxBet: "1000",
      expiryPeriod: 10_000,
    });
  });

  it("refuses a non-owner and keeps the minimum", async () => {
    const res = await send("PUT", "/config/min-bet", { caller: BOB, body: { value: "20" } });
    expect(res.status).toBe(403);
    expect(await res.json()).toHaveProperty("error", "Unauthorized");

    const config = await send("GET", "/config");
    expect(await config.json()).toHaveProperty("minBet", "10");
  });

  it("lets the owner change every setting", async () => {
    await send("PUT", "/config/max-bet", { caller: OWNER, body: { value: "5000" } });
    await send("PUT", "/config/min-bet", { caller: OWNER, body: { value: 25 } });
    await send("PUT", "/config/expiry-period", { caller: OWNER, body: { value: 2000 } });
    const res = await send("PUT", "/config/owner", { caller: OWNER, body: { newOwner: ALICE } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      owner: ALICE,
      minBet: "25",
      maxBet: "5000",
      expiryPeriod: 2000,
    });
  });

  it("rejects a transfer to the current owner", async () => {
    const res = await send("PUT", "/config/owner", { caller: OWNER, body: { newOwner: OWNER } });
    expect(res.status).toBe(400);
    expect(await res.json()).toHaveProperty("error", "InvalidParameter");
  });
});

describe("chain simulation", () => {
  it("funds accounts", async () => {
    const account = "0x7000000000000000000000000000000000000007";
    const res = await send("POST", "/chain/fund", { body: { account, amount: "125" } });
    expect(await res.json()).toEqual({ account, balance: "125" });
  });

  it("rejects a block count beyond the safe integer range", async () => {
    const res = await app.request("/chain/mine", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"blocks":1e300}',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toHaveProperty("error", "Invalid request");
  });

  it("rejects mining that would push the height past the safe range", async () => {
    const res = await send("POST", "/chain/mine", { body: { blocks: Number.MAX_SAFE_INTEGER } });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid request",
      details: {
        formErrors: [`Cannot advance past block ${Number.MAX_SAFE_INTEGER}`],
        fieldErrors: {},
      },
    });

    const height = await send("GET", "/chain/height");
    expect(await height.json()).toEqual({ height: 1000 });
  });

  it("mines a single block by default", async () => {
    const res = await send("POST", "/chain/mine");
    expect(await res.json()).toEqual({ height: 1001 });
  });
});
