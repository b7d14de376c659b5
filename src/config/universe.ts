import universeData from "./universe.json";
import type { IPairConfig } from "../types/signal.types";
import { ConfigurationError } from "../utils/errors";
import { isRecord } from "../utils/guards";

function requireString(raw: Record<string, unknown>, field: string, where: string): string {
  const value = raw[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigurationError(`${where}: "${field}" must be a non-empty string`);
  }
  return value.trim();
}

function requireNumber(raw: Record<string, unknown>, field: string, where: string): number {
  const value = raw[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigurationError(`${where}: "${field}" must be a finite number`);
  }
  return value;
}

/**
 * Check the threshold ordering and ranges for one pair.
 */
export function validatePair(pair: IPairConfig): IPairConfig {
  const where = `pair ${pair.leveragedTicker}`;
  if (pair.leverage <= 0) {
    throw new ConfigurationError(`${where}: leverage must be positive, got ${pair.leverage}`);
  }
  for (const field of ["entryThreshold", "alertThreshold", "profitTarget"] as const) {
    const value = pair[field];
    if (!(value > 0 && value < 1)) {
      throw new ConfigurationError(`${where}: ${field} must be in (0, 1), got ${value}`);
    }
  }
  if (pair.alertThreshold >= pair.entryThreshold) {
    throw new ConfigurationError(
      `${where}: alertThreshold (${pair.alertThreshold}) must be below entryThreshold (${pair.entryThreshold})`
    );
  }
  return pair;
}

export function parseUniverse(raw: unknown): IPairConfig[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigurationError("Universe must be a non-empty array of pairs");
  }

  const seen = new Set<string>();
  return raw.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new ConfigurationError(`universe[${index}] is not an object`);
    }
    const where = `universe[${index}]`;
    const pair = validatePair({
      leveragedTicker: requireString(entry, "leveragedTicker", where).toUpperCase(),
      underlyingTicker: requireString(entry, "underlyingTicker", where).toUpperCase(),
      name: requireString(entry, "name", where),
      sector: requireString(entry, "sector", where).toLowerCase(),
      leverage: requireNumber(entry, "leverage", where),
      entryThreshold: requireNumber(entry, "entryThreshold", where),
      alertThreshold: requireNumber(entry, "alertThreshold", where),
      profitTarget: requireNumber(entry, "profitTarget", where),
    });
    if (seen.has(pair.leveragedTicker)) {
      throw new ConfigurationError(`${where}: duplicate leveraged ticker ${pair.leveragedTicker}`);
    }
    seen.add(pair.leveragedTicker);
    return pair;
  });
}

export const DEFAULT_UNIVERSE: readonly IPairConfig[] = parseUniverse(universeData);

export function getUnderlyingTickers(universe: readonly IPairConfig[]): string[] {
  return [...new Set(universe.map((p) => p.underlyingTicker))];
}
