import { v4 as uuidv4 } from "uuid";
import {
  FactorAssessment,
  type FactorMap,
  type FactorName,
  type FactorWeightTable,
  type IFactorWeight,
} from "../types/confidence.types";
import type { ITradeOutcome, ITradeStats } from "../types/outcome.types";
import { FACTOR_NAMES } from "./factors";
import { mean, roundTo } from "../utils/mathUtils";

export interface IOutcomeInput {
  ticker: string;
  underlyingTicker: string;
  entryDate: string;
  exitDate: string;
  entryPrice: number;
  exitPrice: number;
  notional: number;
  realizedPl: number;
  factorsAtEntry: FactorMap;
}

export interface ILearningInsights {
  stats: ITradeStats;
  strongest: IFactorWeight | null;
  weakest: IFactorWeight | null;
  ranked: IFactorWeight[]; // descending weight, qualified factors only
  summary: string;
}

export function createOutcome(input: IOutcomeInput, id: string = uuidv4()): ITradeOutcome {
  const plPct = input.notional > 0 ? roundTo(input.realizedPl / input.notional) : 0;
  return Object.freeze({
    id,
    ticker: input.ticker,
    underlyingTicker: input.underlyingTicker,
    entryDate: input.entryDate,
    exitDate: input.exitDate,
    entryPrice: input.entryPrice,
    exitPrice: input.exitPrice,
    notional: roundTo(input.notional),
    realizedPl: roundTo(input.realizedPl),
    plPct,
    win: input.realizedPl > 0,
    factorsAtEntry: Object.freeze({ ...input.factorsAtEntry }),
  });
}

function winRate(outcomes: ITradeOutcome[]): number {
  return outcomes.length > 0 ? outcomes.filter((o) => o.win).length / outcomes.length : 0;
}

/**
 * Rebuild the whole weight table from the outcome log.
 *
 * weight = win rate when the factor was FAVORABLE at entry minus the win rate
 * when it was anything else. A factor needs trades on both sides before its
 * weight means anything, so sampleCount is the smaller side.
 */
export function computeWeights(outcomes: readonly ITradeOutcome[]): FactorWeightTable {
  const table: Partial<Record<FactorName, IFactorWeight>> = {};
  if (outcomes.length === 0) return Object.freeze(table);

  for (const factor of FACTOR_NAMES) {
    const favorable: ITradeOutcome[] = [];
    const complement: ITradeOutcome[] = [];
    for (const o of outcomes) {
      (o.factorsAtEntry[factor] === FactorAssessment.FAVORABLE ? favorable : complement).push(o);
    }

    const favorableWinRate = roundTo(winRate(favorable));
    const complementWinRate = roundTo(winRate(complement));
    const sampleCount = Math.min(favorable.length, complement.length);

    table[factor] = Object.freeze({
      factor,
      weight: sampleCount > 0 ? roundTo(favorableWinRate - complementWinRate) : 0,
      sampleCount,
      favorableCount: favorable.length,
      complementCount: complement.length,
      favorableWinRate,
      complementWinRate,
    });
  }

  return Object.freeze(table);
}

export function computeTradeStats(outcomes: readonly ITradeOutcome[], ticker?: string): ITradeStats {
  const scoped = ticker ? outcomes.filter((o) => o.ticker === ticker) : [...outcomes];
  const wins = scoped.filter((o) => o.win);
  const losses = scoped.filter((o) => !o.win);

  return {
    trades: scoped.length,
    wins: wins.length,
    losses: losses.length,
    winRate: roundTo(winRate(scoped)),
    avgWin: roundTo(mean(wins.map((o) => o.plPct))),
    avgLoss: roundTo(Math.abs(mean(losses.map((o) => o.plPct)))),
    avgPlPct: roundTo(mean(scoped.map((o) => o.plPct))),
  };
}

export function learningInsights(
  outcomes: readonly ITradeOutcome[],
  weights: FactorWeightTable,
  minSamples: number
): ILearningInsights {
  const stats = computeTradeStats(outcomes);
  const ranked = FACTOR_NAMES.map((name) => weights[name])
    .filter((w): w is IFactorWeight => w !== undefined && w.sampleCount >= minSamples)
    .sort((a, b) => b.weight - a.weight || a.factor.localeCompare(b.factor));

  const strongest = ranked.length > 0 ? ranked[0] : null;
  const weakest = ranked.length > 1 ? ranked[ranked.length - 1] : null;

  let summary: string;
  if (stats.trades === 0) {
    summary = "No closed trades yet";
  } else if (!strongest) {
    summary = `${stats.trades} closed trades, no factor has ${minSamples} samples on each side yet`;
  } else {
    summary = `${stats.trades} closed trades, win rate ${(stats.winRate * 100).toFixed(1)}%; strongest factor ${strongest.factor} (${strongest.weight >= 0 ? "+" : ""}${strongest.weight.toFixed(2)})`;
  }

  return { stats, strongest, weakest, ranked, summary };
}
