import { beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_SIZING } from "../src/config/riskLimits";
import { toFactorMap } from "../src/engine/ConfidenceScorer";
import { DecisionEngine } from "../src/engine/DecisionEngine";
import { PositionSizer } from "../src/engine/PositionSizer";
import { InMemoryStateRepository } from "../src/services/InMemoryStateRepository";
import { StateStore } from "../src/services/StateStore";
import { FactorAssessment } from "../src/types/confidence.types";
import type { IMarketSnapshot } from "../src/types/engine.types";
import { SignalState } from "../src/types/signal.types";
import { InvalidTransitionError, UnknownTickerError } from "../src/utils/errors";
import { history, makePair } from "./fixtures";

const UNIVERSE = [
  makePair(),
  makePair({ leveragedTicker: "SOXL", underlyingTicker: "SOXX", entryThreshold: 0.08, alertThreshold: 0.05 }),
  makePair({ leveragedTicker: "FAS", underlyingTicker: "XLF", sector: "financials" }),
];

function snapshot(overrides: Partial<IMarketSnapshot> = {}): IMarketSnapshot {
  return {
    asOf: "2026-10-19T15:00:00.000Z",
    underlyingHistory: { QQQ: history([100, 97, 94]), SOXX: history([100, 99]) },
    leveragedPrices: { TQQQ: 50, SOXL: 30 },
    factors: {},
    ...overrides,
  };
}

describe("DecisionEngine", () => {
  let repository: InMemoryStateRepository;
  let engine: DecisionEngine;

  beforeEach(() => {
    repository = new InMemoryStateRepository();
    engine = new DecisionEngine({
      universe: UNIVERSE,
      store: new StateStore(repository, UNIVERSE, 10_000),
      now: () => new Date("2026-10-19T16:00:00.000Z"),
    });
  });

  it("refreshes every pair and isolates a pair without history", async () => {
    const report = await engine.refresh(snapshot());

    expect(report.version).toBe(1);
    expect(report.evaluations).toHaveLength(3);
    expect(report.failures).toEqual([
      { ticker: "FAS", code: "INSUFFICIENT_HISTORY", message: "XLF: 0 usable price point(s), need at least 2" },
    ]);

    const [tqqq, soxl, fas] = report.evaluations;
    expect(tqqq.signal.state).toBe(SignalState.SIGNAL);
    expect(tqqq.transitions).toHaveLength(2);
    expect(soxl.signal.state).toBe(SignalState.WATCH);
    expect(fas.signal.state).toBe(SignalState.WATCH);
    expect(fas.error).toBeDefined();

    const stored = await repository.load();
    expect(stored?.signals.TQQQ.state).toBe(SignalState.SIGNAL);
  });

  it("sizes, vets and scores a SIGNAL pair", async () => {
    const report = await engine.refresh(snapshot());
    const tqqq = report.evaluations[0];

    expect(tqqq.decision?.approved).toBe(true);
    expect(tqqq.sizing?.notional).toBeCloseTo(66.6667, 4);
    expect(tqqq.assessment?.favorableCount).toBe(1);
    expect(tqqq.assessment?.factors.find((f) => f.name === "portfolio-risk")?.assessment).toBe(
      FactorAssessment.FAVORABLE
    );
    expect(report.evaluations[1].assessment).toBeUndefined();
  });

  it("falls back to fixed-fraction when half-Kelly lacks history", async () => {
    const kellyEngine = new DecisionEngine({
      universe: UNIVERSE,
      store: new StateStore(new InMemoryStateRepository(), UNIVERSE, 10_000),
      sizer: new PositionSizer({ ...DEFAULT_SIZING, method: "half-kelly" }),
    });

    const report = await kellyEngine.refresh(snapshot());

    expect(report.evaluations[0].sizing).toMatchObject({ method: "fixed-fraction", fallbackFrom: "half-kelly" });
  });

  it("enters a SIGNAL pair and records the entry factors on the position", async () => {
    await engine.refresh(snapshot());
    const result = await engine.enter("tqqq", 50, { notional: 2_000, date: "2026-10-19" });

    expect(result.status).toBe("entered");
    if (result.status !== "entered") return;
    expect(result.signal.state).toBe(SignalState.ACTIVE);
    expect(result.signal.entryPrice).toBe(50);
    expect(result.position.quantity).toBe(40);
    expect(result.position.factorsAtEntry["portfolio-risk"]).toBe(FactorAssessment.FAVORABLE);

    const portfolio = await engine.getPortfolio();
    expect(portfolio.cashBalance).toBe(8_000);
    expect(portfolio.positions).toHaveLength(1);
  });

  it("enters with the factor snapshot the last refresh scored", async () => {
    const factors = { TQQQ: { volatilityRegime: "EXTREME", rateTrajectory: "CUTTING", socialSentiment: "BEARISH" } };
    const report = await engine.refresh(snapshot({ factors }));
    const scored = report.evaluations[0].assessment;
    expect(scored?.favorableCount).toBe(4);
    expect((await engine.getSignal("TQQQ")).factorInputs).toEqual(factors.TQQQ);

    const result = await engine.enter("TQQQ", 50);

    expect(result.status).toBe("entered");
    if (result.status !== "entered" || !scored) return;
    expect(result.assessment.favorableCount).toBe(4);
    expect(result.position.factorsAtEntry).toEqual(toFactorMap(scored.factors));
    expect(result.position.factorsAtEntry["volatility-regime"]).toBe(FactorAssessment.FAVORABLE);
    expect(result.sizing.notional).toBe(50);
    expect(result.sizing.rationale).toBe("2.00% risk / 3x leverage, reduced 25% for EXTREME volatility");
    expect(result.position.quantity).toBe(1);
  });

  it("prefers factor inputs passed to enter over the stored snapshot", async () => {
    await engine.refresh(snapshot({ factors: { TQQQ: { rateTrajectory: "CUTTING" } } }));

    const result = await engine.enter("TQQQ", 50, { notional: 1_000, factors: { rateTrajectory: "HIKING" } });

    expect(result.assessment.factors.find((f) => f.name === "rate-trajectory")?.assessment).toBe(
      FactorAssessment.UNFAVORABLE
    );
  });

  it("returns a veto without changing any state", async () => {
    await engine.refresh(snapshot());
    const commitsBefore = repository.getCommitCount();

    const result = await engine.enter("TQQQ", 50, { notional: 4_000 });

    expect(result.status).toBe("vetoed");
    expect(result.decision.approved).toBe(false);
    if (!result.decision.approved) {
      expect(result.decision.reason.criterion).toBe("single-position");
    }
    expect(result.assessment.factors.find((f) => f.name === "portfolio-risk")?.assessment).toBe(
      FactorAssessment.UNFAVORABLE
    );
    expect(repository.getCommitCount()).toBe(commitsBefore);
    expect((await engine.getSignal("TQQQ")).state).toBe(SignalState.SIGNAL);
  });

  it("rejects entering a pair that is not in SIGNAL and unknown tickers", async () => {
    await engine.refresh(snapshot());

    await expect(engine.enter("SOXL", 30)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(engine.enter("XYZ", 10)).rejects.toBeInstanceOf(UnknownTickerError);
    await expect(engine.close("TQQQ", 50)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("marks a held position to TARGET and closes it into the outcome log", async () => {
    await engine.refresh(snapshot());
    await engine.enter("TQQQ", 50, { notional: 2_000, date: "2026-10-19" });

    const marked = await engine.refresh(
      snapshot({ underlyingHistory: { QQQ: history([100, 97, 94, 99]), SOXX: history([100, 99]) }, leveragedPrices: { TQQQ: 55 } })
    );
    const tqqq = marked.evaluations[0];
    expect(tqqq.signal.state).toBe(SignalState.TARGET);
    expect(tqqq.signal.unrealizedPl).toBe(0.1);
    expect((await engine.getPortfolio()).totalValue).toBe(10_200);

    const closed = await engine.close("TQQQ", 55, "2026-10-20");

    expect(closed.signal.state).toBe(SignalState.WATCH);
    expect(closed.signal.entryPrice).toBeNull();
    expect(closed.signal.factorInputs).toBeNull();
    expect(closed.outcome).toMatchObject({
      ticker: "TQQQ",
      entryDate: "2026-10-19",
      exitDate: "2026-10-20",
      realizedPl: 200,
      plPct: 0.1,
      win: true,
    });
    expect(closed.weights["drawdown-depth"]?.sampleCount).toBe(0);

    const stored = await repository.load();
    expect(stored?.outcomes).toHaveLength(1);
    expect(stored?.portfolio.cashBalance).toBe(10_200);
    expect(stored?.portfolio.realizedPl).toBe(200);
    expect((await engine.getInsights()).stats.trades).toBe(1);
  });

  it("rebuilds weights from the outcome log on demand", async () => {
    await expect(engine.recomputeWeights()).resolves.toEqual({});
  });
});
