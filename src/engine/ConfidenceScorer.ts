import {
  ConfidenceLevel,
  FactorAssessment,
  type FactorMap,
  type FactorName,
  type FactorWeightTable,
  type IConfidenceAssessment,
  type IFactorInputs,
  type IFactorResult,
} from "../types/confidence.types";
import type { ISignal } from "../types/signal.types";
import { DEFAULT_MIN_WEIGHT_SAMPLES } from "../config/riskLimits";
import { classifyFactor, FACTOR_REGISTRY } from "./factors";
import { roundTo } from "../utils/mathUtils";

/** Out of the fourteen registered factors. */
export const HIGH_CONFIDENCE_MIN = 10;
export const MEDIUM_CONFIDENCE_MIN = 5;

export function levelForScore(score: number, totalFactors: number = FACTOR_REGISTRY.length): ConfidenceLevel {
  // Thresholds are defined against the full registry; scale if it ever changes size
  const scaled = (score * FACTOR_REGISTRY.length) / totalFactors;
  if (scaled >= HIGH_CONFIDENCE_MIN) return ConfidenceLevel.HIGH;
  if (scaled >= MEDIUM_CONFIDENCE_MIN) return ConfidenceLevel.MEDIUM;
  return ConfidenceLevel.LOW;
}

export function toFactorMap(factors: IFactorResult[]): FactorMap {
  const map: FactorMap = {};
  for (const f of factors) map[f.name] = f.assessment;
  return map;
}

export class ConfidenceScorer {
  // Replaced wholesale by setWeights, never patched
  private weights: FactorWeightTable;
  private readonly minWeightSamples: number;

  constructor(
    weights: FactorWeightTable = {},
    minWeightSamples: number = DEFAULT_MIN_WEIGHT_SAMPLES
  ) {
    this.weights = weights;
    this.minWeightSamples = minWeightSamples;
  }

  setWeights(weights: FactorWeightTable): void {
    this.weights = weights;
  }

  /**
   * Multiplier for one factor, or null when its learned weight is missing or
   * backed by too few trades.
   */
  multiplierFor(name: FactorName): number | null {
    const w = this.weights[name];
    if (!w || w.sampleCount < this.minWeightSamples) return null;
    return Math.max(0, 1 + w.weight);
  }

  classify(signal: ISignal, inputs: IFactorInputs): IFactorResult[] {
    const context = { drawdown: signal.drawdown, entryThreshold: signal.entryThreshold };
    return FACTOR_REGISTRY.map(({ name, rule }) => ({ name, ...classifyFactor(rule, inputs, context) }));
  }

  /**
   * Score a signal against a factor snapshot. Missing inputs degrade to
   * NEUTRAL; the result depends only on the signal, the snapshot and the
   * current weight table.
   */
  assess(signal: ISignal, inputs: IFactorInputs, evaluatedAt: string = new Date().toISOString()): IConfidenceAssessment {
    const factors = this.classify(signal, inputs);
    const totalFactors = factors.length;
    const favorableCount = factors.filter((f) => f.assessment === FactorAssessment.FAVORABLE).length;

    let weighted = false;
    let favorableWeight = 0;
    let totalWeight = 0;
    for (const f of factors) {
      const multiplier = this.multiplierFor(f.name);
      if (multiplier !== null) weighted = true;
      const contribution = multiplier ?? 1;
      totalWeight += contribution;
      if (f.assessment === FactorAssessment.FAVORABLE) favorableWeight += contribution;
    }

    const weightedScore = weighted
      ? totalWeight > 0
        ? roundTo((favorableWeight * totalFactors) / totalWeight)
        : 0
      : null;

    return {
      leveragedTicker: signal.leveragedTicker,
      level: levelForScore(weightedScore ?? favorableCount, totalFactors),
      factors,
      favorableCount,
      totalFactors,
      weightedScore,
      weighted,
      evaluatedAt,
    };
  }
}
