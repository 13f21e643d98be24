// ─── Error taxonomy ──────────────────────────────────────────────────────────

export type ErrorKind =
  | "validation"
  | "lifecycle"
  | "authorization"
  | "resource"
  | "funds";

export const ERROR_KINDS = {
  InvalidParameter: "validation",
  InvalidCloseBlock: "validation",
  InvalidBet: "validation",
  BetTooLow: "validation",
  BetTooHigh: "validation",
  MarketClosed: "lifecycle",
  MarketAlreadyResolved: "lifecycle",
  MarketNotClosed: "lifecycle",
  MarketExpired: "lifecycle",
  MarketNotExpired: "lifecycle",
  MarketNotResolved: "lifecycle",
  BetLost: "lifecycle",
  Unauthorized: "authorization",
  NotFound: "resource",
  BetNotFound: "resource",
  InsufficientFunds: "funds",
} as const satisfies Record<string, ErrorKind>;

export type ErrorCode = keyof typeof ERROR_KINDS;

export interface EngineError {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  readonly message: string;
}

// ─── Result ──────────────────────────────────────────────────────────────────

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: EngineError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export const ACK: Result<void> = ok(undefined);

export function fail<T = never>(code: ErrorCode, message: string): Result<T> {
  return { ok: false, error: { code, kind: ERROR_KINDS[code], message } };
}
