import mongoose, { Schema, Document } from "mongoose";
import { SignalState, type ISignal } from "../types/signal.types";
import type { IPortfolioState } from "../types/risk.types";
import type { IFactorWeight } from "../types/confidence.types";

export const ENGINE_STATE_ID = "engine";

/** Plain shape of the single engine-state document. */
export interface IEngineStateRecord {
  _id: string;
  version: number;
  signals: ISignal[];
  portfolio: IPortfolioState;
  weights: IFactorWeight[];
  updatedAt: string;
}

export interface IEngineStateDoc extends Document<string> {
  version: number;
  signals: ISignal[];
  portfolio: IPortfolioState;
  weights: IFactorWeight[];
  updatedAt: string;
}

const STATES = Object.values(SignalState);

const TransitionSchema = new Schema(
  {
    from: { type: String, enum: STATES, required: true },
    to: { type: String, enum: STATES, required: true },
    reason: { type: String, required: true },
    value: { type: Number, default: null },
    at: { type: String, required: true },
  },
  { _id: false }
);

const SignalSchema = new Schema(
  {
    leveragedTicker: { type: String, required: true },
    underlyingTicker: { type: String, required: true },
    sector: { type: String, required: true },
    leverage: { type: Number, required: true },
    state: { type: String, enum: STATES, required: true },
    drawdown: { type: Number, required: true },
    athPrice: { type: Number, required: true },
    athDate: { type: String, default: null },
    entryThreshold: { type: Number, required: true },
    alertThreshold: { type: Number, required: true },
    profitTarget: { type: Number, required: true },
    entryPrice: { type: Number, default: null },
    entryDate: { type: String, default: null },
    currentPrice: { type: Number, default: null },
    leveragedPrice: { type: Number, default: null },
    unrealizedPl: { type: Number, default: null },
    updatedAt: { type: String, required: true },
    transitions: { type: [TransitionSchema], default: [] },
    factorInputs: { type: Schema.Types.Mixed, default: null },
  },
  { _id: false, minimize: false }
);

const PositionSchema = new Schema(
  {
    ticker: { type: String, required: true },
    underlyingTicker: { type: String, required: true },
    sector: { type: String, required: true },
    leverage: { type: Number, required: true },
    entryPrice: { type: Number, required: true },
    quantity: { type: Number, required: true },
    notional: { type: Number, required: true },
    entryDate: { type: String, required: true },
    lastPrice: { type: Number, required: true },
    factorsAtEntry: { type: Schema.Types.Mixed, default: {} },
  },
  { _id: false, minimize: false }
);

const WeightSchema = new Schema(
  {
    factor: { type: String, required: true },
    weight: { type: Number, required: true },
    sampleCount: { type: Number, required: true },
    favorableCount: { type: Number, required: true },
    complementCount: { type: Number, required: true },
    favorableWinRate: { type: Number, required: true },
    complementWinRate: { type: Number, required: true },
  },
  { _id: false }
);

const EngineStateSchema: Schema = new Schema(
  {
    _id: { type: String, default: ENGINE_STATE_ID },
    version: { type: Number, required: true, min: 0 },
    signals: { type: [SignalSchema], default: [] },
    portfolio: {
      startingValue: { type: Number, required: true },
      totalValue: { type: Number, required: true },
      cashBalance: { type: Number, required: true },
      positions: { type: [PositionSchema], default: [] },
      realizedPl: { type: Number, default: 0 },
    },
    weights: { type: [WeightSchema], default: [] },
    updatedAt: { type: String, required: true },
  },
  { versionKey: false, minimize: false }
);

export const EngineStateModel = mongoose.model<IEngineStateDoc>("EngineState", EngineStateSchema);
