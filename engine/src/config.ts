import { z } from "zod";
import { getAddress, isAddress, type Address } from "viem";
import type { Limits } from "../../shared/types.js";

// ─── Fixed limits ────────────────────────────────────────────────────────────

export const DEFAULT_LIMITS: Limits = {
  minCloseDelay: 100,
  maxCloseDelay: 52_560, // ~1 year of 10-minute blocks
  maxExpiryDelay: 105_120,
  minDescriptionLength: 1,
  maxDescriptionLength: 256,
  minExpiryPeriod: 144, // ~1 day
  maxExpiryPeriod: 52_560,
  betCeiling: 10n ** 15n,
};

export const DEFAULT_ESCROW_ADDRESS: Address = "0x0000000000000000000000000000000000005000";

// ─── Env schema ──────────────────────────────────────────────────────────────

export const addressSchema = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "Invalid address")
  .transform((v) => getAddress(v));

export const amountSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int().safe().nonnegative()])
  .transform((v) => BigInt(v));

const seedEntrySchema = z.tuple([addressSchema, amountSchema]);

const ledgerSeedSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
      .map((entry) => entry.split("=")),
  )
  .pipe(z.array(seedEntrySchema));

const EnvSchema = z.object({
  ENGINE_PORT: z.coerce.number().int().positive().default(3001),
  ENGINE_NAME: z.string().min(1).default("escrow"),
  ENGINE_OWNER: addressSchema,
  ESCROW_ADDRESS: addressSchema.default(DEFAULT_ESCROW_ADDRESS),
  MIN_BET: amountSchema.default("10"),
  MAX_BET: amountSchema.default("1000000"),
  EXPIRY_PERIOD: z.coerce.number().int().positive().default(10_000),
  GENESIS_HEIGHT: z.coerce.number().int().nonnegative().default(0),
  LEDGER_SEED: ledgerSeedSchema.default(""),
});

export interface EngineConfig {
  port: number;
  name: string;
  owner: Address;
  escrowAddress: Address;
  minBet: bigint;
  maxBet: bigint;
  expiryPeriod: number;
  genesisHeight: number;
  ledgerSeed: Array<[Address, bigint]>;
}

export function getConfig(env: Record<string, string | undefined>): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid engine configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.ENGINE_PORT,
    name: e.ENGINE_NAME,
    owner: e.ENGINE_OWNER,
    escrowAddress: e.ESCROW_ADDRESS,
    minBet: e.MIN_BET,
    maxBet: e.MAX_BET,
    expiryPeriod: e.EXPIRY_PERIOD,
    genesisHeight: e.GENESIS_HEIGHT,
    ledgerSeed: e.LEDGER_SEED,
  };
}
