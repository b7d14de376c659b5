export enum FactorAssessment {
  FAVORABLE = "FAVORABLE",
  NEUTRAL = "NEUTRAL",
  UNFAVORABLE = "UNFAVORABLE",
}

export enum ConfidenceLevel {
  HIGH = "HIGH",
  MEDIUM = "MEDIUM",
  LOW = "LOW",
}

export type FactorName =
  | "drawdown-depth"
  | "volatility-regime"
  | "rate-trajectory"
  | "yield-curve"
  | "filing-sentiment"
  | "fundamentals-health"
  | "prediction-market"
  | "earnings-proximity"
  | "geopolitical-risk"
  | "social-sentiment"
  | "news-sentiment"
  | "market-breadth"
  | "smart-money"
  | "portfolio-risk";

export type VolatilityRegime = "LOW" | "NORMAL" | "ELEVATED" | "EXTREME";

/**
 * Raw factor inputs for one pair at one evaluation time.
 * Every field is optional: a missing value classifies as NEUTRAL.
 * Categorical fields are typed as string because snapshots arrive as
 * untyped JSON; unrecognised values also classify as NEUTRAL.
 */
export interface IFactorInputs {
  volatilityRegime?: string;
  volatilityIndex?: number;
  rateTrajectory?: string; // HIKING | PAUSING | CUTTING
  yieldCurve?: string; // NORMAL | FLAT | INVERTED
  materialFilingCount?: number;
  fundamentalsHealth?: string; // STRONG | STABLE | WEAK | DETERIORATING
  predictionMarket?: string; // BULLISH | NEUTRAL | BEARISH
  daysToEarnings?: number | null;
  geopoliticalRisk?: string; // LOW | MODERATE | HIGH
  socialSentiment?: string; // BULLISH | NEUTRAL | BEARISH
  newsSentiment?: string;
  marketBreadth?: string; // RISK_ON | MIXED | RISK_OFF
  smartMoney?: string; // BULLISH | NEUTRAL | BEARISH
  portfolioRiskPass?: boolean;
}

export interface IFactorResult {
  name: FactorName;
  assessment: FactorAssessment;
  reason: string;
}

export type FactorMap = Partial<Record<FactorName, FactorAssessment>>;

export interface IConfidenceAssessment {
  leveragedTicker: string;
  level: ConfidenceLevel;
  factors: IFactorResult[];
  favorableCount: number;
  totalFactors: number;
  weightedScore: number | null;
  weighted: boolean;
  evaluatedAt: string;
}

export interface IFactorWeight {
  factor: FactorName;
  weight: number; // win-rate(FAVORABLE) - win-rate(rest), in [-1, 1]
  sampleCount: number; // size of the smaller group
  favorableCount: number;
  complementCount: number;
  favorableWinRate: number;
  complementWinRate: number;
}

export type FactorWeightTable = Readonly<Partial<Record<FactorName, IFactorWeight>>>;
