import { vi } from "vitest";
import { getAddress, type Address } from "viem";
import type { Limits, Settings } from "../../shared/types.js";
import { DEFAULT_ESCROW_ADDRESS, DEFAULT_LIMITS } from "../src/config.js";
import { fail, type Result } from "../src/result.js";
import { ManualClock } from "../src/services/clock.js";
import { EscrowEngine } from "../src/services/escrow-engine.js";
import { InMemoryValueLedger, type ValueTransfer } from "../src/services/value-ledger.js";

export const OWNER = getAddress("0x1000000000000000000000000000000000000001");
export const ALICE = getAddress("0x2000000000000000000000000000000000000002");
export const BOB = getAddress("0x3000000000000000000000000000000000000003");
export const CAROL = getAddress("0x4000000000000000000000000000000000000004");
/** Never funded */
export const DAVE = getAddress("0x5000000000000000000000000000000000000005");
export const ESCROW = DEFAULT_ESCROW_ADDRESS;

export const GENESIS = 1000;
export const STARTING_BALANCE = 10_000_000n;

export const TEST_SETTINGS: Settings = {
  owner: OWNER,
  minBet: 10n,
  maxBet: 1000n,
  expiryPeriod: 10_000,
};

interface SetupOptions {
  settings?: Partial<Settings>;
  limits?: Partial<Limits>;
}

export function setup(options: SetupOptions = {}) {
  const clock = new ManualClock(GENESIS);
  const ledger = new InMemoryValueLedger([
    [ALICE, STARTING_BALANCE],
    [BOB, STARTING_BALANCE],
    [CAROL, STARTING_BALANCE],
  ]);
  const transfer = new FlakyTransfer(ledger);
  const logger = { log: vi.fn(), warn: vi.fn() };
  const engine = new EscrowEngine({
    settings: { ...TEST_SETTINGS, ...options.settings },
    limits: { ...DEFAULT_LIMITS, ...options.limits },
    clock,
    value: transfer,
    escrow: ESCROW,
    logger,
  });
  return { engine, clock, ledger, transfer, logger };
}

/** Creates a market closing `closeIn` blocks from now and returns its id. */
export function openMarket(
  engine: EscrowEngine,
  closeIn = 200,
  creator: Address = OWNER,
): number {
  const result = engine.createMarket(creator, "Will the measure pass?", engine.getBlockHeight() + closeIn);
  if (!result.ok) throw new Error(`createMarket failed: ${result.error.code}`);
  return result.value;
}

/** Transfer primitive that rejects the next outgoing transfer from `account`. */
export class FlakyTransfer implements ValueTransfer {
  private armed = new Set<Address>();

  constructor(private readonly inner: ValueTransfer) {}

  failNextFrom(account: Address): void {
    this.armed.add(account);
  }

  balanceOf(account: Address): bigint {
    return this.inner.balanceOf(account);
  }

  transfer(from: Address, to: Address, amount: bigint): Result<void> {
    if (this.armed.delete(from)) return fail("InsufficientFunds", "host rejected transfer");
    return this.inner.transfer(from, to, amount);
  }
}
