import type { FactorMap } from "../types/confidence.types";
import type { IPortfolioPosition, IPortfolioState } from "../types/risk.types";
import { LedgerError } from "../utils/errors";
import { roundTo } from "../utils/mathUtils";

export interface ILedgerEntry {
  ticker: string;
  underlyingTicker: string;
  sector: string;
  leverage: number;
  price: number;
  notional: number;
  date: string;
  factorsAtEntry: FactorMap;
}

export interface ILedgerClose {
  position: IPortfolioPosition;
  exitPrice: number;
  proceeds: number;
  realizedPl: number;
}

export function createPortfolio(startingValue: number): IPortfolioState {
  const value = roundTo(startingValue);
  return { startingValue: value, totalValue: value, cashBalance: value, positions: [], realizedPl: 0 };
}

/**
 * Cash and open positions. Works on a private copy of the state it was given;
 * `snapshot()` hands back the result for the caller to persist.
 */
export class PortfolioLedger {
  private state: IPortfolioState;

  constructor(state: IPortfolioState) {
    this.state = {
      ...state,
      positions: state.positions.map((p) => ({ ...p, factorsAtEntry: { ...p.factorsAtEntry } })),
    };
  }

  snapshot(): IPortfolioState {
    return {
      ...this.state,
      positions: this.state.positions.map((p) => ({ ...p, factorsAtEntry: { ...p.factorsAtEntry } })),
    };
  }

  getPosition(ticker: string): IPortfolioPosition | undefined {
    return this.state.positions.find((p) => p.ticker === ticker);
  }

  getCash(): number {
    return this.state.cashBalance;
  }

  getTotalValue(): number {
    return this.state.totalValue;
  }

  enter(entry: ILedgerEntry): IPortfolioPosition {
    if (this.getPosition(entry.ticker)) {
      throw new LedgerError(entry.ticker, "a position is already open");
    }
    if (!(entry.price > 0)) {
      throw new LedgerError(entry.ticker, `entry price must be positive, got ${entry.price}`);
    }
    if (!(entry.notional > 0)) {
      throw new LedgerError(entry.ticker, `notional must be positive, got ${entry.notional}`);
    }
    const notional = roundTo(entry.notional);
    if (notional > this.state.cashBalance) {
      throw new LedgerError(
        entry.ticker,
        `notional ${notional} exceeds available cash ${this.state.cashBalance}`
      );
    }

    const position: IPortfolioPosition = {
      ticker: entry.ticker,
      underlyingTicker: entry.underlyingTicker,
      sector: entry.sector,
      leverage: entry.leverage,
      entryPrice: entry.price,
      quantity: roundTo(notional / entry.price),
      notional,
      entryDate: entry.date,
      lastPrice: entry.price,
      factorsAtEntry: { ...entry.factorsAtEntry },
    };

    this.state.cashBalance = roundTo(this.state.cashBalance - notional);
    this.state.positions = [...this.state.positions, position];
    this.revalue();
    return position;
  }

  close(ticker: string, exitPrice: number): ILedgerClose {
    const position = this.getPosition(ticker);
    if (!position) {
      throw new LedgerError(ticker, "no open position to close");
    }
    if (!(exitPrice > 0)) {
      throw new LedgerError(ticker, `exit price must be positive, got ${exitPrice}`);
    }

    const proceeds = roundTo(position.quantity * exitPrice);
    const realizedPl = roundTo(proceeds - position.notional);

    this.state.cashBalance = roundTo(this.state.cashBalance + proceeds);
    this.state.realizedPl = roundTo(this.state.realizedPl + realizedPl);
    this.state.positions = this.state.positions.filter((p) => p.ticker !== ticker);
    this.revalue();

    return { position: { ...position, lastPrice: exitPrice }, exitPrice, proceeds, realizedPl };
  }

  /**
   * Mark positions to the given prices. Tickers without a price keep their
   * last mark.
   */
  markToMarket(prices: Record<string, number>): IPortfolioState {
    this.state.positions = this.state.positions.map((p) => {
      const price = prices[p.ticker];
      return price !== undefined && price > 0 ? { ...p, lastPrice: price } : p;
    });
    this.revalue();
    return this.snapshot();
  }

  private revalue(): void {
    const invested = this.state.positions.reduce((sum, p) => sum + p.quantity * p.lastPrice, 0);
    this.state.totalValue = roundTo(this.state.cashBalance + invested);
  }
}
