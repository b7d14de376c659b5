import { describe, expect, it } from "vitest";

import { DEFAULT_SIZING } from "../src/config/riskLimits";
import { PositionSizer } from "../src/engine/PositionSizer";
import type { ITradeStats } from "../src/types/outcome.types";
import { ConfigurationError, InsufficientTradeHistoryError } from "../src/utils/errors";

function stats(overrides: Partial<ITradeStats>): ITradeStats {
  return { trades: 20, wins: 11, losses: 9, winRate: 0.55, avgWin: 0.18, avgLoss: 0.1, avgPlPct: 0, ...overrides };
}

describe("PositionSizer", () => {
  it("sizes fixed-fraction risk by portfolio value over leverage", () => {
    const result = new PositionSizer().fixedFraction(10_000, 3, 50);

    expect(result.method).toBe("fixed-fraction");
    expect(result.notional).toBeCloseTo(66.6667, 4);
    expect(result.portfolioPct).toBeCloseTo(0.006667, 6);
    expect(result.quantityEstimate).toBe(1.3333);
    expect(result.rationale).toBe("2.00% risk / 3x leverage");
  });

  it("cuts the fixed fraction by a quarter in EXTREME volatility", () => {
    const result = new PositionSizer().fixedFraction(10_000, 3, 50, "EXTREME");

    expect(result.notional).toBeCloseTo(50, 6);
    expect(result.rationale).toBe("2.00% risk / 3x leverage, reduced 25% for EXTREME volatility");
  });

  it("computes Kelly from win rate and payoff ratio", () => {
    const estimate = new PositionSizer().kelly(stats({}));

    expect(estimate.payoffRatio).toBeCloseTo(1.8, 4);
    expect(estimate.fullKelly).toBeCloseTo(0.3, 6);
    expect(estimate.recommended).toBeCloseTo(0.15, 6);
  });

  it("sizes half-Kelly as a fraction of portfolio value", () => {
    const result = new PositionSizer({ ...DEFAULT_SIZING, method: "half-kelly" }).halfKelly(stats({}), 10_000, 50);

    expect(result.method).toBe("half-kelly");
    expect(result.notional).toBeCloseTo(1_500, 2);
    expect(result.quantityEstimate).toBeCloseTo(30, 4);
  });

  it("refuses Kelly sizing under the minimum trade count", () => {
    const sizer = new PositionSizer({ ...DEFAULT_SIZING, method: "half-kelly" });

    expect(() => sizer.kelly(stats({ trades: 9 }))).toThrow(InsufficientTradeHistoryError);
    expect(() => sizer.size({ portfolioValue: 10_000, leverage: 3, price: 50 })).toThrow(InsufficientTradeHistoryError);
  });

  it("handles one-sided trade histories", () => {
    const sizer = new PositionSizer();

    const allWins = sizer.kelly(stats({ wins: 10, losses: 0, trades: 10, winRate: 1, avgLoss: 0 }));
    expect(allWins.fullKelly).toBe(1);
    expect(allWins.recommended).toBe(0.5);

    const allLosses = sizer.kelly(stats({ wins: 0, losses: 10, trades: 10, winRate: 0, avgWin: 0 }));
    expect(allLosses.fullKelly).toBe(0);
    expect(allLosses.recommended).toBe(0);
  });

  it("floors a negative edge at zero", () => {
    const estimate = new PositionSizer().kelly(stats({ winRate: 0.3, avgWin: 0.1, avgLoss: 0.1 }));

    expect(estimate.fullKelly).toBeCloseTo(-0.4, 6);
    expect(estimate.recommended).toBe(0);
  });

  it("dispatches on the configured method", () => {
    const result = new PositionSizer().size({ portfolioValue: 10_000, leverage: 2, price: 20, stats: stats({}) });
    expect(result.method).toBe("fixed-fraction");
    expect(result.notional).toBe(100);
  });

  it("rejects out-of-range configuration", () => {
    expect(() => new PositionSizer({ ...DEFAULT_SIZING, riskFraction: 1.5 })).toThrow(ConfigurationError);
  });
});
