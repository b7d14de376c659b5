export type EngineErrorCode =
  | "INSUFFICIENT_HISTORY"
  | "INSUFFICIENT_TRADE_HISTORY"
  | "INVALID_TRANSITION"
  | "CONFIGURATION_ERROR"
  | "STALE_STATE"
  | "UNKNOWN_TICKER"
  | "LEDGER_VIOLATION";

/**
 * Base class for every failure raised by the decision engine.
 * `code` is stable and safe to switch on; messages are for humans.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InsufficientHistoryError extends EngineError {
  constructor(
    readonly ticker: string,
    readonly available: number,
    readonly required: number
  ) {
    super(
      "INSUFFICIENT_HISTORY",
      `${ticker}: ${available} usable price point(s), need at least ${required}`
    );
  }
}

export class InsufficientTradeHistoryError extends EngineError {
  constructor(
    readonly available: number,
    readonly required: number
  ) {
    super(
      "INSUFFICIENT_TRADE_HISTORY",
      `Kelly sizing needs ${required} closed trades, only ${available} recorded`
    );
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(
    readonly ticker: string,
    readonly from: string,
    readonly to: string,
    detail?: string
  ) {
    super(
      "INVALID_TRANSITION",
      `${ticker}: ${from} -> ${to} is not permitted${detail ? ` (${detail})` : ""}`
    );
  }
}

export class ConfigurationError extends EngineError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
  }
}

export class StaleStateError extends EngineError {
  constructor(
    readonly expectedVersion: number,
    readonly actualVersion: number | null
  ) {
    super(
      "STALE_STATE",
      `Engine state changed underneath this writer (expected version ${expectedVersion}, found ${actualVersion ?? "none"})`
    );
  }
}

export class UnknownTickerError extends EngineError {
  constructor(readonly ticker: string) {
    super("UNKNOWN_TICKER", `${ticker} is not part of the tracked universe`);
  }
}

export class LedgerError extends EngineError {
  constructor(
    readonly ticker: string,
    message: string
  ) {
    super("LEDGER_VIOLATION", `${ticker}: ${message}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
