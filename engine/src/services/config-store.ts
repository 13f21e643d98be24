import type { Address } from "viem";
import type { Limits, Settings } from "../../../shared/types.js";
import { ACK, fail, type Result } from "../result.js";

/**
 * Owner-gated engine settings. Holds the only administrative identity and
 * the bet bounds and expiry period read by the other components.
 */
export class ConfigStore {
  private settings: Settings;

  constructor(
    initial: Settings,
    readonly limits: Limits,
  ) {
    const problems = validateSettings(initial, limits);
    if (problems.length > 0) {
      throw new Error(`Invalid engine settings: ${problems.join("; ")}`);
    }
    this.settings = { ...initial };
  }

  get owner(): Address {
    return this.settings.owner;
  }

  get minBet(): bigint {
    return this.settings.minBet;
  }

  get maxBet(): bigint {
    return this.settings.maxBet;
  }

  get expiryPeriod(): number {
    return this.settings.expiryPeriod;
  }

  snapshot(): Settings {
    return { ...this.settings };
  }

  setExpiryPeriod(caller: Address, value: number): Result<void> {
    if (caller !== this.settings.owner) return notOwner(caller);
    const { minExpiryPeriod, maxExpiryPeriod } = this.limits;
    if (!Number.isSafeInteger(value) || value < minExpiryPeriod || value > maxExpiryPeriod) {
      return fail(
        "InvalidParameter",
        `Expiry period must be within [${minExpiryPeriod}, ${maxExpiryPeriod}], got ${value}`,
      );
    }
    this.settings = { ...this.settings, expiryPeriod: value };
    return ACK;
  }

  setMinBet(caller: Address, value: bigint): Result<void> {
    if (caller !== this.settings.owner) return notOwner(caller);
    if (value <= 0n || value >= this.settings.maxBet) {
      return fail(
        "InvalidParameter",
        `Minimum bet must be positive and below ${this.settings.maxBet}, got ${value}`,
      );
    }
    this.settings = { ...this.settings, minBet: value };
    return ACK;
  }

  setMaxBet(caller: Address, value: bigint): Result<void> {
    if (caller !== this.settings.owner) return notOwner(caller);
    if (value <= this.settings.minBet || value > this.limits.betCeiling) {
      return fail(
        "InvalidParameter",
        `Maximum bet must be above ${this.settings.minBet} and at most ${this.limits.betCeiling}, got ${value}`,
      );
    }
    this.settings = { ...this.settings, maxBet: value };
    return ACK;
  }

  /** Single-step handoff: the new owner takes effect immediately. */
  transferOwnership(caller: Address, newOwner: Address): Result<void> {
    if (caller !== this.settings.owner) return notOwner(caller);
    if (newOwner === this.settings.owner) {
      return fail("InvalidParameter", `${newOwner} already owns the engine`);
    }
    this.settings = { ...this.settings, owner: newOwner };
    return ACK;
  }
}

function notOwner(caller: Address): Result<void> {
  return fail("Unauthorized", `${caller} is not the engine owner`);
}

export function validateSettings(settings: Settings, limits: Limits): string[] {
  const problems: string[] = [];
  if (settings.minBet <= 0n) problems.push("minBet must be positive");
  if (settings.minBet >= settings.maxBet) problems.push("minBet must be below maxBet");
  if (settings.maxBet > limits.betCeiling) {
    problems.push(`maxBet must not exceed ${limits.betCeiling}`);
  }
  if (
    !Number.isSafeInteger(settings.expiryPeriod) ||
    settings.expiryPeriod < limits.minExpiryPeriod ||
    settings.expiryPeriod > limits.maxExpiryPeriod
  ) {
    problems.push(
      `expiryPeriod must be within [${limits.minExpiryPeriod}, ${limits.maxExpiryPeriod}]`,
    );
  }
  return problems;
}
