import mongoose, { Schema, Document } from "mongoose";
import type { FactorMap } from "../types/confidence.types";

/** Plain shape of a stored outcome; `_id` is the outcome id. */
export interface ITradeOutcomeRecord {
  _id: string;
  ticker: string;
  underlyingTicker: string;
  entryDate: string;
  exitDate: string;
  entryPrice: number;
  exitPrice: number;
  notional: number;
  realizedPl: number;
  plPct: number;
  win: boolean;
  factorsAtEntry: FactorMap;
  recordedAt: Date;
}

export interface ITradeOutcomeDoc extends Document<string> {
  ticker: string;
  underlyingTicker: string;
  entryDate: string;
  exitDate: string;
  entryPrice: number;
  exitPrice: number;
  notional: number;
  realizedPl: number;
  plPct: number;
  win: boolean;
  factorsAtEntry: FactorMap;
  recordedAt: Date;
}

const TradeOutcomeSchema: Schema = new Schema(
  {
    _id: { type: String, required: true },
    ticker: { type: String, required: true, index: true },
    underlyingTicker: { type: String, required: true },
    entryDate: { type: String, required: true },
    exitDate: { type: String, required: true },
    entryPrice: { type: Number, required: true },
    exitPrice: { type: Number, required: true },
    notional: { type: Number, required: true },
    realizedPl: { type: Number, required: true },
    plPct: { type: Number, required: true },
    win: { type: Boolean, required: true },
    factorsAtEntry: { type: Schema.Types.Mixed, default: {} },
    recordedAt: { type: Date, default: Date.now },
  },
  { versionKey: false, minimize: false }
);

// Append-only log, read back in close order
TradeOutcomeSchema.index({ exitDate: 1, recordedAt: 1 });

export const TradeOutcomeModel = mongoose.model<ITradeOutcomeDoc>("TradeOutcome", TradeOutcomeSchema);
