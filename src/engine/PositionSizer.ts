import type { VolatilityRegime } from "../types/confidence.types";
import type { ITradeStats } from "../types/outcome.types";
import type { ISizingConfig, ISizingResult } from "../types/sizing.types";
import { DEFAULT_SIZING, validateSizing } from "../config/riskLimits";
import { InsufficientTradeHistoryError } from "../utils/errors";
import { formatPct, roundTo } from "../utils/mathUtils";

export interface IKellyEstimate {
  winRate: number;
  payoffRatio: number; // avg win / avg loss
  fullKelly: number;
  recommended: number;
}

export interface ISizingRequest {
  portfolioValue: number;
  leverage: number;
  price: number;
  volatilityRegime?: VolatilityRegime | null;
  stats?: ITradeStats;
}

/**
 * Suggests a notional for a new entry. Sizing is advisory: the veto gate
 * still decides whether the entry goes ahead.
 */
export class PositionSizer {
  private readonly config: ISizingConfig;

  constructor(config: ISizingConfig = { ...DEFAULT_SIZING }) {
    this.config = validateSizing(config);
  }

  getConfig(): Readonly<ISizingConfig> {
    return this.config;
  }

  /**
   * riskFraction of the portfolio, deflated by the instrument's leverage and
   * cut further when volatility is EXTREME.
   */
  fixedFraction(
    portfolioValue: number,
    leverage: number,
    price: number,
    volatilityRegime?: VolatilityRegime | null
  ): ISizingResult {
    const base = (this.config.riskFraction * portfolioValue) / leverage;
    const extreme = volatilityRegime === "EXTREME";
    const notional = extreme ? base * (1 - this.config.extremeVolatilityReduction) : base;

    const parts = [`${formatPct(this.config.riskFraction)} risk / ${leverage}x leverage`];
    if (extreme) parts.push(`reduced ${formatPct(this.config.extremeVolatilityReduction, 0)} for EXTREME volatility`);

    return this.result("fixed-fraction", notional, portfolioValue, price, parts.join(", "));
  }

  /**
   * Kelly criterion from closed-trade statistics.
   * f* = (p*b - q) / b, scaled by kellyFraction and floored at zero.
   */
  kelly(stats: ITradeStats): IKellyEstimate {
    if (stats.trades < this.config.minKellyTrades) {
      throw new InsufficientTradeHistoryError(stats.trades, this.config.minKellyTrades);
    }

    const p = stats.winRate;
    const q = 1 - p;
    let fullKelly: number;
    let payoffRatio: number;
    if (stats.wins === 0) {
      fullKelly = 0;
      payoffRatio = 0;
    } else if (stats.losses === 0 || stats.avgLoss === 0) {
      fullKelly = 1;
      payoffRatio = Number.POSITIVE_INFINITY;
    } else {
      payoffRatio = stats.avgWin / stats.avgLoss;
      fullKelly = (p * payoffRatio - q) / payoffRatio;
    }

    return {
      winRate: p,
      payoffRatio: Number.isFinite(payoffRatio) ? roundTo(payoffRatio, 4) : payoffRatio,
      fullKelly: roundTo(fullKelly),
      recommended: roundTo(Math.max(0, fullKelly * this.config.kellyFraction)),
    };
  }

  halfKelly(stats: ITradeStats, portfolioValue: number, price: number): ISizingResult {
    const estimate = this.kelly(stats);
    const rationale =
      `Kelly ${formatPct(estimate.fullKelly)} x ${this.config.kellyFraction} ` +
      `(win rate ${formatPct(estimate.winRate)}, ${stats.trades} trades)`;
    return this.result("half-kelly", estimate.recommended * portfolioValue, portfolioValue, price, rationale);
  }

  /**
   * Size with the configured method. Throws InsufficientTradeHistoryError for
   * half-Kelly without enough history; falling back is the caller's call.
   */
  size(request: ISizingRequest): ISizingResult {
    if (this.config.method === "half-kelly") {
      const stats = request.stats ?? { trades: 0, wins: 0, losses: 0, winRate: 0, avgWin: 0, avgLoss: 0, avgPlPct: 0 };
      return this.halfKelly(stats, request.portfolioValue, request.price);
    }
    return this.fixedFraction(request.portfolioValue, request.leverage, request.price, request.volatilityRegime);
  }

  private result(
    method: ISizingResult["method"],
    notional: number,
    portfolioValue: number,
    price: number,
    rationale: string
  ): ISizingResult {
    const rounded = roundTo(Math.max(0, notional));
    return {
      method,
      notional: rounded,
      portfolioPct: portfolioValue > 0 ? roundTo(rounded / portfolioValue) : 0,
      quantityEstimate: price > 0 ? roundTo(rounded / price, 4) : 0,
      rationale,
    };
  }
}
