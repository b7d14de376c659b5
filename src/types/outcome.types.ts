import type { FactorMap } from "./confidence.types";

export interface ITradeOutcome {
  readonly id: string;
  readonly ticker: string;
  readonly underlyingTicker: string;
  readonly entryDate: string;
  readonly exitDate: string;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly notional: number;
  readonly realizedPl: number;
  readonly plPct: number;
  readonly win: boolean;
  readonly factorsAtEntry: Readonly<FactorMap>;
}

export interface ITradeStats {
  trades: number;
  wins: number;
  losses: number;
  winRate: number;
  avgWin: number; // mean P/L fraction of winners
  avgLoss: number; // mean absolute P/L fraction of losers
  avgPlPct: number;
}
