import type { IConfidenceAssessment, IFactorInputs, FactorWeightTable } from "./confidence.types";
import type { ITradeOutcome } from "./outcome.types";
import type { IPortfolioPosition, IPortfolioState, IVetoDecision } from "./risk.types";
import type { IPairConfig, IPricePoint, ISignal, ITransition } from "./signal.types";
import type { ISizingResult } from "./sizing.types";

/**
 * Everything the engine persists, read and written as one unit.
 */
export interface IEngineState {
  version: number;
  signals: Record<string, ISignal>; // keyed by leveraged ticker
  portfolio: IPortfolioState;
  outcomes: ITradeOutcome[];
  weights: FactorWeightTable;
  updatedAt: string;
}

export interface IStateRepository {
  load(): Promise<IEngineState | null>;
  /**
   * Persist `next` only if the stored version still equals `expectedVersion`.
   * `appendedOutcomes` are the outcomes added since the load.
   * Throws StaleStateError on a version mismatch.
   */
  commit(
    next: IEngineState,
    expectedVersion: number,
    appendedOutcomes: ITradeOutcome[]
  ): Promise<void>;
}

export interface IPriceHistoryProvider {
  getCloses(ticker: string): Promise<IPricePoint[]>;
  getLatestPrice(ticker: string): Promise<number | null>;
}

export interface IFactorSnapshotProvider {
  getFactorInputs(pair: IPairConfig, asOf: Date): Promise<IFactorInputs>;
}

/**
 * Already-fetched inputs for one refresh cycle. The engine performs no I/O
 * beyond the state store while processing it.
 */
export interface IMarketSnapshot {
  asOf: string;
  underlyingHistory: Record<string, IPricePoint[]>;
  leveragedPrices: Record<string, number>;
  factors: Record<string, IFactorInputs>; // keyed by leveraged ticker
}

export interface IPairEvaluation {
  ticker: string;
  signal: ISignal;
  transitions: ITransition[];
  assessment?: IConfidenceAssessment;
  decision?: IVetoDecision;
  sizing?: ISizingResult;
  error?: string;
}

export interface IRefreshReport {
  asOf: string;
  version: number;
  evaluations: IPairEvaluation[];
  failures: { ticker: string; code: string; message: string }[];
}

export interface IEntryOptions {
  date?: string;
  notional?: number;
  factors?: IFactorInputs;
  returns?: Record<string, number[]>; // daily returns by leveraged ticker
}

export type IEntryResult =
  | {
      status: "entered";
      signal: ISignal;
      position: IPortfolioPosition;
      assessment: IConfidenceAssessment;
      decision: IVetoDecision;
      sizing: ISizingResult;
    }
  | {
      status: "vetoed";
      signal: ISignal;
      assessment: IConfidenceAssessment;
      decision: IVetoDecision;
      sizing: ISizingResult;
    };

export interface ICloseResult {
  signal: ISignal;
  outcome: ITradeOutcome;
  weights: FactorWeightTable;
}
