import { readFile } from "fs/promises";
import type { IFactorInputs } from "../types/confidence.types";
import type { IFactorSnapshotProvider } from "../types/engine.types";
import type { IPairConfig } from "../types/signal.types";
import { ConfigurationError, errorMessage } from "../utils/errors";
import { finiteOrNull, isRecord } from "../utils/guards";
import { logger } from "../utils/logger";

const STRING_FIELDS = [
  "volatilityRegime",
  "rateTrajectory",
  "yieldCurve",
  "fundamentalsHealth",
  "predictionMarket",
  "geopoliticalRisk",
  "socialSentiment",
  "newsSentiment",
  "marketBreadth",
  "smartMoney",
] as const;

/**
 * Keep the fields with the right primitive type and drop everything else.
 * Values are not checked against their vocabularies here; the scorer
 * treats unknown values as NEUTRAL.
 */
export function sanitizeFactorInputs(raw: unknown): IFactorInputs {
  if (!isRecord(raw)) return {};
  const inputs: IFactorInputs = {};
  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (typeof value === "string") inputs[field] = value;
  }
  const vix = finiteOrNull(raw.volatilityIndex);
  if (vix !== null) inputs.volatilityIndex = vix;
  const filings = finiteOrNull(raw.materialFilingCount);
  if (filings !== null) inputs.materialFilingCount = filings;
  if (raw.daysToEarnings === null) inputs.daysToEarnings = null;
  const days = finiteOrNull(raw.daysToEarnings);
  if (days !== null) inputs.daysToEarnings = days;
  return inputs;
}

interface IFactorSnapshotFile {
  asOf: string | null;
  defaults: IFactorInputs;
  pairs: Record<string, IFactorInputs>;
}

export function parseFactorSnapshot(raw: unknown): IFactorSnapshotFile {
  if (!isRecord(raw)) {
    throw new ConfigurationError("Factor snapshot must be a JSON object");
  }
  const pairs: Record<string, IFactorInputs> = {};
  if (isRecord(raw.pairs)) {
    for (const [ticker, value] of Object.entries(raw.pairs)) {
      pairs[ticker.toUpperCase()] = sanitizeFactorInputs(value);
    }
  }
  return {
    asOf: typeof raw.asOf === "string" ? raw.asOf : null,
    defaults: sanitizeFactorInputs(raw.defaults),
    pairs,
  };
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Factor inputs from a JSON file maintained by an upstream collector.
 * Market-wide values sit under `defaults`; `pairs` overrides per leveraged
 * ticker. The portfolio-risk input is never read from the file.
 *
 * An undated snapshot, or one older than `maxAgeHours` at evaluation time,
 * yields no inputs at all, so every factor scores NEUTRAL.
 */
export class FactorSnapshotService implements IFactorSnapshotProvider {
  constructor(
    private readonly path: string,
    private readonly maxAgeHours: number = 96
  ) {}

  async getFactorInputs(pair: IPairConfig, asOf: Date): Promise<IFactorInputs> {
    const snapshot = await this.load();
    if (!snapshot) return {};

    const dated = snapshot.asOf ? new Date(snapshot.asOf).getTime() : Number.NaN;
    if (Number.isNaN(dated)) {
      logger.warning(`[FactorSnapshot] ${this.path} has no usable asOf date; all factors NEUTRAL`);
      return {};
    }
    const ageHours = (asOf.getTime() - dated) / HOUR_MS;
    if (ageHours > this.maxAgeHours) {
      logger.warning(
        `[FactorSnapshot] Snapshot dated ${snapshot.asOf} is ${Math.floor(ageHours)}h old (max ${this.maxAgeHours}h); all factors NEUTRAL`
      );
      return {};
    }
    if (ageHours < 0) {
      logger.warning(`[FactorSnapshot] Snapshot dated ${snapshot.asOf} is newer than evaluation time ${asOf.toISOString()}`);
    }
    return { ...snapshot.defaults, ...(snapshot.pairs[pair.leveragedTicker] ?? {}) };
  }

  private async load(): Promise<IFactorSnapshotFile | null> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      logger.warning(`[FactorSnapshot] Cannot read ${this.path}: ${errorMessage(error)}; all factors NEUTRAL`);
      return null;
    }
    try {
      return parseFactorSnapshot(JSON.parse(text));
    } catch (error) {
      logger.error(`[FactorSnapshot] Invalid snapshot ${this.path}: ${errorMessage(error)}`);
      return null;
    }
  }
}
