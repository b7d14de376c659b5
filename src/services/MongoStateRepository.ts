import mongoose, { type ClientSession } from "mongoose";
import type { FactorName, FactorWeightTable, IFactorWeight } from "../types/confidence.types";
import type { IEngineState, IStateRepository } from "../types/engine.types";
import type { ITradeOutcome } from "../types/outcome.types";
import type { ISignal } from "../types/signal.types";
import { ENGINE_STATE_ID, EngineStateModel, type IEngineStateRecord } from "../models/EngineState";
import { TradeOutcomeModel, type ITradeOutcomeRecord } from "../models/TradeOutcome";
import { StaleStateError } from "../utils/errors";
import { logger } from "../utils/logger";

function isDuplicateKey(err: unknown): boolean {
  return err instanceof mongoose.mongo.MongoServerError && err.code === 11000;
}

function toWeightTable(weights: IFactorWeight[]): FactorWeightTable {
  const table: Partial<Record<FactorName, IFactorWeight>> = {};
  for (const w of weights) table[w.factor] = w;
  return Object.freeze(table);
}

function fromWeightTable(table: FactorWeightTable): IFactorWeight[] {
  return Object.values(table).filter((w): w is IFactorWeight => w !== undefined);
}

function toOutcome(record: ITradeOutcomeRecord): ITradeOutcome {
  return {
    id: record._id,
    ticker: record.ticker,
    underlyingTicker: record.underlyingTicker,
    entryDate: record.entryDate,
    exitDate: record.exitDate,
    entryPrice: record.entryPrice,
    exitPrice: record.exitPrice,
    notional: record.notional,
    realizedPl: record.realizedPl,
    plPct: record.plPct,
    win: record.win,
    factorsAtEntry: record.factorsAtEntry ?? {},
  };
}

function toOutcomeRecord(o: ITradeOutcome): Omit<ITradeOutcomeRecord, "recordedAt"> {
  return {
    _id: o.id,
    ticker: o.ticker,
    underlyingTicker: o.underlyingTicker,
    entryDate: o.entryDate,
    exitDate: o.exitDate,
    entryPrice: o.entryPrice,
    exitPrice: o.exitPrice,
    notional: o.notional,
    realizedPl: o.realizedPl,
    plPct: o.plPct,
    win: o.win,
    factorsAtEntry: o.factorsAtEntry,
  };
}

/**
 * Engine state as one document guarded by a version number, plus an
 * append-only TradeOutcome collection.
 *
 * Both collections are read and written inside one transaction, so the
 * server must run as a replica set (a single-node set is enough).
 */
export class MongoStateRepository implements IStateRepository {
  async load(): Promise<IEngineState | null> {
    return this.inTransaction(async (session) => {
      const record = await EngineStateModel.findById(ENGINE_STATE_ID)
        .session(session)
        .lean<IEngineStateRecord>()
        .exec();
      if (!record) return null;

      const outcomes = await TradeOutcomeModel.find()
        .sort({ exitDate: 1, recordedAt: 1 })
        .session(session)
        .lean<ITradeOutcomeRecord[]>()
        .exec();

      const signals: Record<string, ISignal> = {};
      for (const s of record.signals) signals[s.leveragedTicker] = s;

      return {
        version: record.version,
        signals,
        portfolio: record.portfolio,
        outcomes: outcomes.map(toOutcome),
        weights: toWeightTable(record.weights),
        updatedAt: record.updatedAt,
      };
    });
  }

  /** The state document and the new outcomes commit together or not at all. */
  async commit(next: IEngineState, expectedVersion: number, appendedOutcomes: ITradeOutcome[]): Promise<void> {
    const body = {
      version: next.version,
      signals: Object.values(next.signals),
      portfolio: next.portfolio,
      weights: fromWeightTable(next.weights),
      updatedAt: next.updatedAt,
    };

    await this.inTransaction(async (session) => {
      if (expectedVersion === 0) {
        try {
          await EngineStateModel.create([{ _id: ENGINE_STATE_ID, ...body }], { session });
        } catch (err) {
          if (isDuplicateKey(err)) throw new StaleStateError(expectedVersion, await this.currentVersion());
          throw err;
        }
      } else {
        const updated = await EngineStateModel.findOneAndUpdate(
          { _id: ENGINE_STATE_ID, version: expectedVersion },
          { $set: body },
          { new: true, session }
        ).exec();
        if (!updated) {
          throw new StaleStateError(expectedVersion, await this.currentVersion());
        }
      }

      if (appendedOutcomes.length > 0) {
        await TradeOutcomeModel.insertMany(appendedOutcomes.map(toOutcomeRecord), { session });
      }
    });

    if (appendedOutcomes.length > 0) {
      logger.info(`Recorded ${appendedOutcomes.length} trade outcome(s)`);
    }
  }

  private async inTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
    const session = await mongoose.startSession();
    try {
      return await session.withTransaction(() => work(session));
    } finally {
      await session.endSession();
    }
  }

  // Outside the session: reports the version the competing writer committed
  private async currentVersion(): Promise<number | null> {
    const record = await EngineStateModel.findById(ENGINE_STATE_ID).select({ version: 1 }).lean<{ version: number }>().exec();
    return record ? record.version : null;
  }
}
