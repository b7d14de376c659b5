import { beforeEach, describe, expect, it, vi } from "vitest";

const { session, engineState, tradeOutcome, fakeQuery } = vi.hoisted(() => {
  interface IFakeQuery {
    select(): IFakeQuery;
    session(): IFakeQuery;
    sort(): IFakeQuery;
    lean(): IFakeQuery;
    exec(): Promise<unknown>;
  }
  const fakeQuery = (value: unknown): IFakeQuery => {
    const q: IFakeQuery = {
      select: () => q,
      session: () => q,
      sort: () => q,
      lean: () => q,
      exec: async () => value,
    };
    return q;
  };
  return {
    fakeQuery,
    session: {
      withTransaction: vi.fn(async (work: () => Promise<unknown>) => work()),
      endSession: vi.fn(async () => undefined),
    },
    engineState: {
      findById: vi.fn(),
      findOneAndUpdate: vi.fn(),
      create: vi.fn(),
    },
    tradeOutcome: {
      find: vi.fn(),
      insertMany: vi.fn(),
    },
  };
});

vi.mock("mongoose", () => ({
  default: {
    startSession: vi.fn(async () => session),
    mongo: { MongoServerError: class MongoServerError extends Error {} },
  },
}));
vi.mock("../src/models/EngineState", () => ({ ENGINE_STATE_ID: "engine", EngineStateModel: engineState }));
vi.mock("../src/models/TradeOutcome", () => ({ TradeOutcomeModel: tradeOutcome }));

import { createPortfolio } from "../src/engine/PortfolioLedger";
import { createOutcome } from "../src/engine/OutcomeLearner";
import { createSignal } from "../src/engine/SignalLifecycle";
import { MongoStateRepository } from "../src/services/MongoStateRepository";
import type { IEngineState } from "../src/types/engine.types";
import { StaleStateError } from "../src/utils/errors";
import { AT, makePair } from "./fixtures";

function state(version: number): IEngineState {
  return {
    version,
    signals: { TQQQ: createSignal(makePair(), AT) },
    portfolio: createPortfolio(10_000),
    outcomes: [],
    weights: {},
    updatedAt: AT,
  };
}

const OUTCOME = createOutcome(
  {
    ticker: "TQQQ",
    underlyingTicker: "QQQ",
    entryDate: "2026-10-19",
    exitDate: "2026-10-20",
    entryPrice: 50,
    exitPrice: 55,
    notional: 2_000,
    realizedPl: 200,
    factorsAtEntry: {},
  },
  "outcome-1"
);

describe("MongoStateRepository", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("writes the state document and new outcomes in one transaction", async () => {
    engineState.findOneAndUpdate.mockReturnValue(fakeQuery({ version: 2 }));
    tradeOutcome.insertMany.mockResolvedValue([]);

    await new MongoStateRepository().commit(state(2), 1, [OUTCOME]);

    expect(session.withTransaction).toHaveBeenCalledTimes(1);
    expect(engineState.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: "engine", version: 1 },
      expect.objectContaining({ $set: expect.objectContaining({ version: 2 }) }),
      { new: true, session }
    );
    expect(tradeOutcome.insertMany).toHaveBeenCalledWith([expect.objectContaining({ _id: "outcome-1", realizedPl: 200 })], {
      session,
    });
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("fails the whole commit when the outcome insert fails", async () => {
    engineState.findOneAndUpdate.mockReturnValue(fakeQuery({ version: 2 }));
    tradeOutcome.insertMany.mockRejectedValue(new Error("write conflict"));

    await expect(new MongoStateRepository().commit(state(2), 1, [OUTCOME])).rejects.toThrow("write conflict");
    expect(session.withTransaction).toHaveBeenCalledTimes(1);
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("creates the first document inside the session", async () => {
    engineState.create.mockResolvedValue([]);

    await new MongoStateRepository().commit(state(1), 0, []);

    expect(engineState.create).toHaveBeenCalledWith([expect.objectContaining({ _id: "engine", version: 1 })], { session });
    expect(tradeOutcome.insertMany).not.toHaveBeenCalled();
  });

  it("raises StaleStateError when the version moved", async () => {
    engineState.findOneAndUpdate.mockReturnValue(fakeQuery(null));
    engineState.findById.mockReturnValue(fakeQuery({ version: 4 }));

    const commit = new MongoStateRepository().commit(state(3), 2, [OUTCOME]);

    await expect(commit).rejects.toBeInstanceOf(StaleStateError);
    await expect(commit).rejects.toMatchObject({ expectedVersion: 2, actualVersion: 4 });
    expect(tradeOutcome.insertMany).not.toHaveBeenCalled();
  });

  it("loads the state and the outcome log from one session", async () => {
    const stored = state(3);
    engineState.findById.mockReturnValue(
      fakeQuery({ _id: "engine", ...stored, signals: Object.values(stored.signals), weights: [] })
    );
    tradeOutcome.find.mockReturnValue(fakeQuery([{ ...OUTCOME, _id: OUTCOME.id, recordedAt: new Date(AT) }]));

    const loaded = await new MongoStateRepository().load();

    expect(session.withTransaction).toHaveBeenCalledTimes(1);
    expect(loaded?.version).toBe(3);
    expect(Object.keys(loaded?.signals ?? {})).toEqual(["TQQQ"]);
    expect(loaded?.outcomes.map((o) => o.id)).toEqual(["outcome-1"]);
  });

  it("returns null before the first commit", async () => {
    engineState.findById.mockReturnValue(fakeQuery(null));

    await expect(new MongoStateRepository().load()).resolves.toBeNull();
    expect(tradeOutcome.find).not.toHaveBeenCalled();
  });
});
