import type { IFactorInputs } from "./confidence.types";

export enum SignalState {
  WATCH = "WATCH",
  ALERT = "ALERT",
  SIGNAL = "SIGNAL",
  ACTIVE = "ACTIVE",
  TARGET = "TARGET",
}

/** States that hold an open position; only P/L moves them. */
export const POSITION_STATES: ReadonlySet<SignalState> = new Set([
  SignalState.ACTIVE,
  SignalState.TARGET,
]);

export interface IPricePoint {
  date: string; // YYYY-MM-DD
  close: number;
}

export interface IPairConfig {
  leveragedTicker: string;
  underlyingTicker: string;
  name: string;
  sector: string;
  leverage: number;
  entryThreshold: number; // drawdown fraction, e.g. 0.05
  alertThreshold: number;
  profitTarget: number; // P/L fraction on the leveraged instrument
}

export interface IDrawdownReading {
  ticker: string;
  currentPrice: number;
  asOf: string;
  athPrice: number;
  athDate: string;
  drawdown: number; // 0 <= drawdown < 1
}

export interface ITransition {
  from: SignalState;
  to: SignalState;
  reason: string;
  value: number | null; // drawdown or P/L that triggered the move
  at: string;
}

export interface ISignal {
  leveragedTicker: string;
  underlyingTicker: string;
  sector: string;
  leverage: number;
  state: SignalState;
  drawdown: number;
  athPrice: number;
  athDate: string | null;
  entryThreshold: number;
  alertThreshold: number;
  profitTarget: number;
  entryPrice: number | null;
  entryDate: string | null;
  currentPrice: number | null; // underlying
  leveragedPrice: number | null;
  unrealizedPl: number | null;
  updatedAt: string;
  transitions: ITransition[];
  /** Factor snapshot scored on the last refresh that found the pair in SIGNAL. */
  factorInputs: IFactorInputs | null;
}

export interface IRecoveryStats {
  ticker: string;
  threshold: number;
  totalEpisodes: number;
  recoveredEpisodes: number;
  avgRecoveryDays: number;
  medianRecoveryDays: number;
  minRecoveryDays: number;
  maxRecoveryDays: number;
  recoveryRate: number;
}
