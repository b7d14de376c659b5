export type SizingMethod = "fixed-fraction" | "half-kelly";

export interface ISizingConfig {
  method: SizingMethod;
  riskFraction: number; // fixed-fraction target risk, e.g. 0.02
  extremeVolatilityReduction: number; // e.g. 0.25 cuts size by a quarter
  kellyFraction: number; // 0.5 for half-Kelly
  minKellyTrades: number;
}

export interface ISizingResult {
  method: SizingMethod;
  notional: number;
  portfolioPct: number;
  quantityEstimate: number;
  rationale: string;
  /** Set when the caller fell back from another method. */
  fallbackFrom?: SizingMethod;
}
