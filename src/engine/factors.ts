import {
  FactorAssessment,
  type FactorName,
  type IFactorInputs,
  type VolatilityRegime,
} from "../types/confidence.types";
import { formatPct, roundTo } from "../utils/mathUtils";

type CategoricalInput =
  | "rateTrajectory"
  | "yieldCurve"
  | "fundamentalsHealth"
  | "predictionMarket"
  | "geopoliticalRisk"
  | "socialSentiment"
  | "newsSentiment"
  | "marketBreadth"
  | "smartMoney";

/**
 * Classification rules. Each factor is registered with exactly one of these
 * variants; `classifyFactor` is the single dispatch point.
 */
export type FactorRule =
  | { kind: "drawdown-depth"; deepMultiple: number }
  | { kind: "volatility" }
  | {
      kind: "categorical";
      input: CategoricalInput;
      label: string;
      favorable: readonly string[];
      neutral: readonly string[];
      unfavorable: readonly string[];
    }
  // Fear (bearish crowds, risk-off rotation) is the entry opportunity, not a warning
  | { kind: "contrarian"; input: CategoricalInput; label: string; trigger: string; known: readonly string[] }
  | { kind: "count-ceiling"; input: "materialFilingCount"; label: string; max: number }
  | { kind: "days-ahead"; input: "daysToEarnings"; label: string; near: number; distant: number }
  | { kind: "pass-fail"; input: "portfolioRiskPass"; label: string };

export interface IFactorDefinition {
  name: FactorName;
  rule: FactorRule;
}

const SENTIMENT: readonly string[] = ["BULLISH", "NEUTRAL", "BEARISH"];
const BREADTH: readonly string[] = ["RISK_ON", "MIXED", "RISK_OFF"];

/** Registration order is the order factors appear in every assessment. */
export const FACTOR_REGISTRY: readonly IFactorDefinition[] = [
  { name: "drawdown-depth", rule: { kind: "drawdown-depth", deepMultiple: 1.5 } },
  { name: "volatility-regime", rule: { kind: "volatility" } },
  {
    name: "rate-trajectory",
    rule: {
      kind: "categorical",
      input: "rateTrajectory",
      label: "Rate trajectory",
      favorable: ["CUTTING"],
      neutral: ["PAUSING"],
      unfavorable: ["HIKING"],
    },
  },
  {
    name: "yield-curve",
    rule: {
      kind: "categorical",
      input: "yieldCurve",
      label: "Yield curve",
      favorable: ["NORMAL"],
      neutral: ["FLAT"],
      unfavorable: ["INVERTED"],
    },
  },
  {
    name: "filing-sentiment",
    rule: { kind: "count-ceiling", input: "materialFilingCount", label: "Material filings", max: 3 },
  },
  {
    name: "fundamentals-health",
    rule: {
      kind: "categorical",
      input: "fundamentalsHealth",
      label: "Fundamentals",
      favorable: ["STRONG"],
      neutral: ["STABLE"],
      unfavorable: ["WEAK", "DETERIORATING"],
    },
  },
  {
    name: "prediction-market",
    rule: {
      kind: "categorical",
      input: "predictionMarket",
      label: "Prediction markets",
      favorable: ["BULLISH"],
      neutral: ["NEUTRAL"],
      unfavorable: ["BEARISH"],
    },
  },
  {
    name: "earnings-proximity",
    rule: { kind: "days-ahead", input: "daysToEarnings", label: "Earnings", near: 7, distant: 14 },
  },
  {
    name: "geopolitical-risk",
    rule: {
      kind: "categorical",
      input: "geopoliticalRisk",
      label: "Geopolitical risk",
      favorable: ["LOW"],
      neutral: ["MODERATE"],
      unfavorable: ["HIGH"],
    },
  },
  {
    name: "social-sentiment",
    rule: { kind: "contrarian", input: "socialSentiment", label: "Social sentiment", trigger: "BEARISH", known: SENTIMENT },
  },
  {
    name: "news-sentiment",
    rule: { kind: "contrarian", input: "newsSentiment", label: "News sentiment", trigger: "BEARISH", known: SENTIMENT },
  },
  {
    name: "market-breadth",
    rule: { kind: "contrarian", input: "marketBreadth", label: "Breadth/rotation", trigger: "RISK_OFF", known: BREADTH },
  },
  {
    name: "smart-money",
    rule: {
      kind: "categorical",
      input: "smartMoney",
      label: "Smart-money trades",
      favorable: ["BULLISH"],
      neutral: ["NEUTRAL"],
      unfavorable: ["BEARISH"],
    },
  },
  { name: "portfolio-risk", rule: { kind: "pass-fail", input: "portfolioRiskPass", label: "Portfolio risk" } },
];

export const FACTOR_NAMES: readonly FactorName[] = FACTOR_REGISTRY.map((f) => f.name);

export interface IDrawdownContext {
  drawdown: number;
  entryThreshold: number;
}

interface IClassification {
  assessment: FactorAssessment;
  reason: string;
}

const neutral = (reason: string): IClassification => ({ assessment: FactorAssessment.NEUTRAL, reason });

function normalize(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim().toUpperCase() : null;
}

function finiteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function classifyVolatilityIndex(index: number): VolatilityRegime {
  if (index < 15) return "LOW";
  if (index < 20) return "NORMAL";
  if (index < 30) return "ELEVATED";
  return "EXTREME";
}

/**
 * Regime from the snapshot, derived from the raw index when only that is
 * present. Null when neither is usable.
 */
export function resolveVolatilityRegime(inputs: IFactorInputs): VolatilityRegime | null {
  const regime = normalize(inputs.volatilityRegime);
  if (regime === "LOW" || regime === "NORMAL" || regime === "ELEVATED" || regime === "EXTREME") {
    return regime;
  }
  const index = finiteNumber(inputs.volatilityIndex);
  return index !== null && index >= 0 ? classifyVolatilityIndex(index) : null;
}

export function classifyFactor(
  rule: FactorRule,
  inputs: IFactorInputs,
  context: IDrawdownContext
): IClassification {
  switch (rule.kind) {
    case "drawdown-depth": {
      const deep = roundTo(context.entryThreshold * rule.deepMultiple);
      const depth = formatPct(context.drawdown, 1);
      if (context.drawdown >= deep) {
        return { assessment: FactorAssessment.FAVORABLE, reason: `Deep drawdown: ${depth}` };
      }
      if (context.drawdown >= context.entryThreshold) {
        return neutral(`At threshold: ${depth}`);
      }
      return { assessment: FactorAssessment.UNFAVORABLE, reason: `Shallow: ${depth}` };
    }

    case "volatility": {
      const regime = resolveVolatilityRegime(inputs);
      if (regime === null) return neutral("Volatility regime unavailable");
      if (regime === "ELEVATED" || regime === "EXTREME") {
        return { assessment: FactorAssessment.FAVORABLE, reason: `Volatility ${regime}: fear present` };
      }
      if (regime === "NORMAL") return neutral("Volatility in normal range");
      return { assessment: FactorAssessment.UNFAVORABLE, reason: "Volatility low: complacent market" };
    }

    case "categorical": {
      const value = normalize(inputs[rule.input]);
      if (value === null) return neutral(`${rule.label} unavailable`);
      if (rule.favorable.includes(value)) {
        return { assessment: FactorAssessment.FAVORABLE, reason: `${rule.label} ${value}` };
      }
      if (rule.unfavorable.includes(value)) {
        return { assessment: FactorAssessment.UNFAVORABLE, reason: `${rule.label} ${value}` };
      }
      return neutral(rule.neutral.includes(value) ? `${rule.label} ${value}` : `${rule.label} unrecognised (${value})`);
    }

    case "contrarian": {
      const value = normalize(inputs[rule.input]);
      if (value === null) return neutral(`${rule.label} unavailable`);
      if (value === rule.trigger) {
        return { assessment: FactorAssessment.FAVORABLE, reason: `${rule.label} ${value.toLowerCase()} (contrarian)` };
      }
      return neutral(
        rule.known.includes(value)
          ? `${rule.label} ${value.toLowerCase()}`
          : `${rule.label} unrecognised (${value})`
      );
    }

    case "count-ceiling": {
      const count = finiteNumber(inputs[rule.input]);
      if (count === null || count < 0) return neutral(`${rule.label} unavailable`);
      if (count > rule.max) {
        return { assessment: FactorAssessment.UNFAVORABLE, reason: `${count} ${rule.label.toLowerCase()}` };
      }
      return neutral(count === 0 ? `No ${rule.label.toLowerCase()}` : `${count} ${rule.label.toLowerCase()}`);
    }

    case "days-ahead": {
      const days = finiteNumber(inputs[rule.input]);
      if (days === null || days < 0) return neutral(`${rule.label} date unknown`);
      if (days >= rule.distant) {
        return { assessment: FactorAssessment.FAVORABLE, reason: `${rule.label} ${days} days away` };
      }
      if (days >= rule.near) return neutral(`${rule.label} upcoming in ${days} days`);
      return { assessment: FactorAssessment.UNFAVORABLE, reason: `${rule.label} imminent (${days} days)` };
    }

    case "pass-fail": {
      const passed = inputs[rule.input];
      if (typeof passed !== "boolean") return neutral(`${rule.label} not evaluated`);
      return passed
        ? { assessment: FactorAssessment.FAVORABLE, reason: `${rule.label} within limits` }
        : { assessment: FactorAssessment.UNFAVORABLE, reason: `${rule.label} limit breached` };
    }
  }
}
