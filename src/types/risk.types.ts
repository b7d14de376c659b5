import type { FactorMap } from "./confidence.types";

export interface IRiskLimits {
  maxConcurrentPositions: number;
  maxSinglePositionPct: number;
  maxSectorExposurePct: number;
  maxLeveragedExposure: number; // multiple of portfolio value
  minCashReservePct: number;
  correlationThreshold: number;
}

export interface IPortfolioPosition {
  ticker: string;
  underlyingTicker: string;
  sector: string;
  leverage: number;
  entryPrice: number;
  quantity: number;
  notional: number; // cost basis
  entryDate: string;
  lastPrice: number;
  factorsAtEntry: FactorMap;
}

export interface IPortfolioState {
  startingValue: number;
  totalValue: number;
  cashBalance: number;
  positions: IPortfolioPosition[];
  realizedPl: number;
}

export interface IExposureReport {
  totalValue: number;
  investedValue: number;
  cashValue: number;
  investedPct: number;
  cashPct: number;
  leveragedExposure: number;
  leveragedExposureRatio: number;
  sectorValues: Record<string, number>;
  sectorPcts: Record<string, number>;
  positionCount: number;
  unrealizedPl: number;
}

export interface IProposedEntry {
  ticker: string;
  sector: string;
  leverage: number;
  notional: number;
  /** Daily returns of the proposed instrument, for the advisory correlation check. */
  returns?: number[];
}

export type VetoCriterion =
  | "max-positions"
  | "single-position"
  | "sector-exposure"
  | "leveraged-exposure"
  | "cash-reserve";

export interface ILimitCheck {
  criterion: VetoCriterion;
  limitName: keyof IRiskLimits;
  current: number;
  afterEntry: number;
  limit: number;
  headroom: number; // negative when breached
  passed: boolean;
  message: string;
}

export interface ICorrelationWarning {
  ticker: string;
  correlatedWith: string;
  sector: string;
  correlation: number;
  threshold: number;
  message: string;
}

export interface IVetoApproved {
  approved: true;
  ticker: string;
  checks: ILimitCheck[];
  warnings: ICorrelationWarning[];
}

export interface IVetoRejected {
  approved: false;
  ticker: string;
  reason: ILimitCheck;
  remediation: string;
  checks: ILimitCheck[];
  warnings: ICorrelationWarning[];
}

export type IVetoDecision = IVetoApproved | IVetoRejected;
