import type { IRiskLimits } from "../types/risk.types";
import type { ISizingConfig } from "../types/sizing.types";
import { ConfigurationError } from "../utils/errors";

export const DEFAULT_RISK_LIMITS: Readonly<IRiskLimits> = {
  maxConcurrentPositions: 4,
  maxSinglePositionPct: 0.3,
  maxSectorExposurePct: 0.5,
  maxLeveragedExposure: 3.0,
  minCashReservePct: 0.2,
  correlationThreshold: 0.8,
};

export const DEFAULT_SIZING: Readonly<ISizingConfig> = {
  method: "fixed-fraction",
  riskFraction: 0.02,
  extremeVolatilityReduction: 0.25,
  kellyFraction: 0.5,
  minKellyTrades: 10,
};

/** Factors need this many trades on each side before their weight counts. */
export const DEFAULT_MIN_WEIGHT_SAMPLES = 5;

function fraction(name: string, value: number, allowZero = false): void {
  const lowerOk = allowZero ? value >= 0 : value > 0;
  if (!Number.isFinite(value) || !lowerOk || value > 1) {
    throw new ConfigurationError(`${name} must be a fraction in ${allowZero ? "[0" : "(0"}, 1], got ${value}`);
  }
}

export function validateRiskLimits(limits: IRiskLimits): IRiskLimits {
  if (!Number.isInteger(limits.maxConcurrentPositions) || limits.maxConcurrentPositions < 1) {
    throw new ConfigurationError(
      `maxConcurrentPositions must be a positive integer, got ${limits.maxConcurrentPositions}`
    );
  }
  fraction("maxSinglePositionPct", limits.maxSinglePositionPct);
  fraction("maxSectorExposurePct", limits.maxSectorExposurePct);
  fraction("minCashReservePct", limits.minCashReservePct, true);
  if (!(limits.maxLeveragedExposure > 0) || !Number.isFinite(limits.maxLeveragedExposure)) {
    throw new ConfigurationError(
      `maxLeveragedExposure must be a positive multiple, got ${limits.maxLeveragedExposure}`
    );
  }
  if (!(limits.correlationThreshold >= -1 && limits.correlationThreshold <= 1)) {
    throw new ConfigurationError(
      `correlationThreshold must be in [-1, 1], got ${limits.correlationThreshold}`
    );
  }
  if (limits.maxSinglePositionPct > limits.maxSectorExposurePct) {
    throw new ConfigurationError(
      `maxSinglePositionPct (${limits.maxSinglePositionPct}) cannot exceed maxSectorExposurePct (${limits.maxSectorExposurePct})`
    );
  }
  return limits;
}

export function validateSizing(sizing: ISizingConfig): ISizingConfig {
  if (sizing.method !== "fixed-fraction" && sizing.method !== "half-kelly") {
    throw new ConfigurationError(`Unknown sizing method "${String(sizing.method)}"`);
  }
  fraction("riskFraction", sizing.riskFraction);
  fraction("extremeVolatilityReduction", sizing.extremeVolatilityReduction, true);
  fraction("kellyFraction", sizing.kellyFraction);
  if (!Number.isInteger(sizing.minKellyTrades) || sizing.minKellyTrades < 1) {
    throw new ConfigurationError(`minKellyTrades must be a positive integer, got ${sizing.minKellyTrades}`);
  }
  return sizing;
}
