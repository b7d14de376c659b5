import { config } from "dotenv";
import { DEFAULT_RISK_LIMITS, DEFAULT_SIZING, validateRiskLimits, validateSizing } from "./riskLimits";
import type { IRiskLimits } from "../types/risk.types";
import type { ISizingConfig, SizingMethod } from "../types/sizing.types";
import { ConfigurationError } from "../utils/errors";

// Load environment variables from .env file
config();

export interface EnvironmentConfig {
  mongoUri: string;
  refreshCron: string;
  startingPortfolioValue: number;
  factorSnapshotPath: string;
  factorMaxAgeHours: number;
  priceHistoryRange: string;
  runOnStart: boolean;
  sizing: ISizingConfig;
  riskLimits: IRiskLimits;
  minWeightSamples: number;
}

type Env = Record<string, string | undefined>;

function numberFrom(source: Env, key: string, fallback: number): number {
  const raw = source[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be numeric, got "${raw}"`);
  }
  return value;
}

function sizingMethodFrom(source: Env): SizingMethod {
  const raw = source.SIZING_METHOD ?? DEFAULT_SIZING.method;
  if (raw === "fixed-fraction" || raw === "half-kelly") return raw;
  throw new ConfigurationError(`SIZING_METHOD must be "fixed-fraction" or "half-kelly", got "${raw}"`);
}

export function validateEnvironment(source: Env = process.env): EnvironmentConfig {
  const mongoUri = source.MONGODB_URI;

  if (!mongoUri) {
    throw new ConfigurationError("MONGODB_URI is not set in environment variables");
  }

  const startingPortfolioValue = numberFrom(source, "STARTING_PORTFOLIO_VALUE", 10_000);
  if (startingPortfolioValue <= 0) {
    throw new ConfigurationError(`STARTING_PORTFOLIO_VALUE must be positive, got ${startingPortfolioValue}`);
  }

  const factorMaxAgeHours = numberFrom(source, "FACTOR_MAX_AGE_HOURS", 96);
  if (factorMaxAgeHours <= 0) {
    throw new ConfigurationError(`FACTOR_MAX_AGE_HOURS must be positive, got ${factorMaxAgeHours}`);
  }

  const riskLimits = validateRiskLimits({
    maxConcurrentPositions: numberFrom(source, "RISK_MAX_POSITIONS", DEFAULT_RISK_LIMITS.maxConcurrentPositions),
    maxSinglePositionPct: numberFrom(source, "RISK_MAX_POSITION_PCT", DEFAULT_RISK_LIMITS.maxSinglePositionPct),
    maxSectorExposurePct: numberFrom(source, "RISK_MAX_SECTOR_PCT", DEFAULT_RISK_LIMITS.maxSectorExposurePct),
    maxLeveragedExposure: numberFrom(source, "RISK_MAX_LEVERAGED_EXPOSURE", DEFAULT_RISK_LIMITS.maxLeveragedExposure),
    minCashReservePct: numberFrom(source, "RISK_MIN_CASH_PCT", DEFAULT_RISK_LIMITS.minCashReservePct),
    correlationThreshold: numberFrom(source, "RISK_CORRELATION_THRESHOLD", DEFAULT_RISK_LIMITS.correlationThreshold),
  });

  const sizing = validateSizing({
    ...DEFAULT_SIZING,
    method: sizingMethodFrom(source),
    riskFraction: numberFrom(source, "SIZING_RISK_FRACTION", DEFAULT_SIZING.riskFraction),
    minKellyTrades: numberFrom(source, "SIZING_MIN_KELLY_TRADES", DEFAULT_SIZING.minKellyTrades),
  });

  return {
    mongoUri,
    // Every 30 minutes during US market hours by default
    refreshCron: source.REFRESH_CRON || "*/30 13-21 * * 1-5",
    startingPortfolioValue,
    factorSnapshotPath: source.FACTOR_SNAPSHOT_PATH || "./data/factors.json",
    factorMaxAgeHours,
    priceHistoryRange: source.PRICE_HISTORY_RANGE || "5y",
    runOnStart: source.RUN_ON_START !== "false",
    sizing,
    riskLimits,
    minWeightSamples: numberFrom(source, "MIN_WEIGHT_SAMPLES", 5),
  };
}

/** What one process run does, from ENGINE_MODE and its arguments. */
export type EngineCommand =
  | { mode: "service" }
  | { mode: "once" }
  | { mode: "enter"; ticker: string; price: number; notional?: number }
  | { mode: "close"; ticker: string; price: number };

function positiveFrom(source: Env, key: string): number | undefined {
  const raw = source[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = numberFrom(source, key, 0);
  if (value <= 0) {
    throw new ConfigurationError(`${key} must be positive, got ${value}`);
  }
  return value;
}

export function parseCommand(source: Env = process.env): EngineCommand {
  const mode = source.ENGINE_MODE || "service";
  if (mode === "service" || mode === "once") return { mode };
  if (mode !== "enter" && mode !== "close") {
    throw new ConfigurationError(`ENGINE_MODE must be "service", "once", "enter" or "close", got "${mode}"`);
  }

  const ticker = source.ENGINE_TICKER?.trim().toUpperCase();
  if (!ticker) {
    throw new ConfigurationError(`ENGINE_MODE=${mode} needs ENGINE_TICKER`);
  }
  const price = positiveFrom(source, "ENGINE_PRICE");
  if (price === undefined) {
    throw new ConfigurationError(`ENGINE_MODE=${mode} needs ENGINE_PRICE`);
  }
  if (mode === "close") return { mode, ticker, price };

  const notional = positiveFrom(source, "ENGINE_NOTIONAL");
  return notional === undefined ? { mode, ticker, price } : { mode, ticker, price, notional };
}
