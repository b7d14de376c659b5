import type { IPortfolioPosition, IPortfolioState } from "../src/types/risk.types";
import type { IDrawdownReading, IPairConfig, IPricePoint } from "../src/types/signal.types";

export const AT = "2026-10-19T15:00:00.000Z";

export function makePair(overrides: Partial<IPairConfig> = {}): IPairConfig {
  return {
    leveragedTicker: "TQQQ",
    underlyingTicker: "QQQ",
    name: "Nasdaq-100 3x",
    sector: "technology",
    leverage: 3,
    entryThreshold: 0.05,
    alertThreshold: 0.03,
    profitTarget: 0.1,
    ...overrides,
  };
}

/** Daily closes starting 2026-10-01. */
export function history(closes: number[]): IPricePoint[] {
  return closes.map((close, i) => ({ date: `2026-10-${String(i + 1).padStart(2, "0")}`, close }));
}

export function reading(drawdown: number, athPrice = 100): IDrawdownReading {
  return {
    ticker: "QQQ",
    currentPrice: athPrice * (1 - drawdown),
    asOf: "2026-10-10",
    athPrice,
    athDate: "2026-10-01",
    drawdown,
  };
}

export function makePosition(
  ticker: string,
  sector: string,
  notional: number,
  leverage = 3,
  price = 100
): IPortfolioPosition {
  return {
    ticker,
    underlyingTicker: `${ticker}-U`,
    sector,
    leverage,
    entryPrice: price,
    quantity: notional / price,
    notional,
    entryDate: "2026-10-01",
    lastPrice: price,
    factorsAtEntry: {},
  };
}

export function makePortfolio(cash: number, positions: IPortfolioPosition[] = []): IPortfolioState {
  const invested = positions.reduce((sum, p) => sum + p.quantity * p.lastPrice, 0);
  return {
    startingValue: cash + invested,
    totalValue: cash + invested,
    cashBalance: cash,
    positions,
    realizedPl: 0,
  };
}
