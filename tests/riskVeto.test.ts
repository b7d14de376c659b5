import { describe, expect, it } from "vitest";

import { DEFAULT_RISK_LIMITS } from "../src/config/riskLimits";
import { calculateExposure, RiskVetoGate } from "../src/engine/RiskVetoGate";
import { ConfigurationError } from "../src/utils/errors";
import { makePortfolio, makePosition } from "./fixtures";

const techHeavy = () =>
  makePortfolio(13_000, [makePosition("TQQQ", "technology", 6_000), makePosition("TECL", "technology", 6_000)]);

const soxl = (notional: number) => ({ ticker: "SOXL", sector: "technology", leverage: 3, notional });

describe("calculateExposure", () => {
  it("breaks the portfolio down by sector and leverage", () => {
    const exposure = calculateExposure(techHeavy());

    expect(exposure.totalValue).toBe(25_000);
    expect(exposure.investedPct).toBe(0.48);
    expect(exposure.cashPct).toBe(0.52);
    expect(exposure.sectorPcts).toEqual({ technology: 0.48 });
    expect(exposure.leveragedExposureRatio).toBe(1.44);
    expect(exposure.positionCount).toBe(2);
    expect(exposure.unrealizedPl).toBe(0);
  });
});

describe("RiskVetoGate", () => {
  it("vetoes a tech entry that would take the sector to 56% against a 50% cap", () => {
    const decision = new RiskVetoGate().evaluate(soxl(2_000), techHeavy());

    expect(decision.approved).toBe(false);
    if (decision.approved) return;
    expect(decision.reason.criterion).toBe("sector-exposure");
    expect(decision.reason.limitName).toBe("maxSectorExposurePct");
    expect(decision.reason.current).toBe(0.48);
    expect(decision.reason.afterEntry).toBe(0.56);
    expect(decision.reason.limit).toBe(0.5);
    expect(decision.reason.headroom).toBe(-0.06);
    expect(decision.remediation).toBe("reduce technology exposure below 50.00%");
  });

  it("reports the first failing criterion when several fail", () => {
    const portfolio = makePortfolio(11_000, [
      makePosition("TQQQ", "technology", 6_000),
      makePosition("TECL", "technology", 6_000),
      makePosition("UCO", "energy", 1_000, 2),
      makePosition("FAS", "financials", 1_000),
    ]);

    const decision = new RiskVetoGate().evaluate(soxl(2_000), portfolio);

    expect(decision.approved).toBe(false);
    if (decision.approved) return;
    expect(decision.reason.criterion).toBe("max-positions");
    expect(decision.checks.filter((c) => !c.passed).map((c) => c.criterion)).toEqual([
      "max-positions",
      "sector-exposure",
    ]);
  });

  it("approves with headroom on every limit", () => {
    const decision = new RiskVetoGate().evaluate(soxl(1_000), makePortfolio(10_000));

    expect(decision.approved).toBe(true);
    expect(decision.checks).toHaveLength(5);
    expect(decision.checks.every((c) => c.passed)).toBe(true);
    expect(decision.checks.map((c) => c.headroom)).toEqual([3, 0.2, 0.4, 2.7, 0.7]);
  });

  it("vetoes aggregate leveraged exposure above the multiple", () => {
    const portfolio = makePortfolio(2_500, [
      makePosition("AAA", "a", 2_500),
      makePosition("BBB", "b", 2_500),
      makePosition("CCC", "c", 2_500),
    ]);
    const gate = new RiskVetoGate({ ...DEFAULT_RISK_LIMITS, maxLeveragedExposure: 2 });

    const decision = gate.evaluate({ ticker: "DDD", sector: "d", leverage: 3, notional: 500 }, portfolio);

    expect(decision.approved).toBe(false);
    if (decision.approved) return;
    expect(decision.reason.criterion).toBe("leveraged-exposure");
    expect(decision.reason.afterEntry).toBe(2.4);
  });

  it("vetoes an entry that would leave too little cash", () => {
    const portfolio = makePortfolio(2_500, [
      makePosition("AAA", "a", 2_500),
      makePosition("BBB", "b", 2_500),
      makePosition("CCC", "c", 2_500),
    ]);

    const decision = new RiskVetoGate().evaluate({ ticker: "DDD", sector: "d", leverage: 1, notional: 1_000 }, portfolio);

    expect(decision.approved).toBe(false);
    if (decision.approved) return;
    expect(decision.reason.criterion).toBe("cash-reserve");
    expect(decision.reason.afterEntry).toBe(0.15);
    expect(decision.remediation).toBe("keep at least 20.00% in cash; this entry would leave 15.00%");
  });

  it("vetoes on single-position size when the portfolio has no value", () => {
    const decision = new RiskVetoGate().evaluate(soxl(100), makePortfolio(0));

    expect(decision.approved).toBe(false);
    if (decision.approved) return;
    expect(decision.reason.criterion).toBe("single-position");
    expect(decision.remediation).toBe("portfolio has no value to allocate");
  });

  it("warns about a highly correlated same-sector position without vetoing", () => {
    const portfolio = makePortfolio(8_000, [makePosition("TQQQ", "technology", 2_000)]);
    const decision = new RiskVetoGate().evaluate(
      { ...soxl(1_000), returns: [0.01, -0.02, 0.03, 0.01] },
      portfolio,
      { TQQQ: [0.02, -0.04, 0.06, 0.02] }
    );

    expect(decision.approved).toBe(true);
    expect(decision.warnings).toHaveLength(1);
    expect(decision.warnings[0]).toMatchObject({ correlatedWith: "TQQQ", sector: "technology", correlation: 1 });
  });

  it("rejects inconsistent limits", () => {
    expect(() => new RiskVetoGate({ ...DEFAULT_RISK_LIMITS, maxSinglePositionPct: 0.6 })).toThrow(ConfigurationError);
    expect(() => new RiskVetoGate({ ...DEFAULT_RISK_LIMITS, maxConcurrentPositions: 0 })).toThrow(ConfigurationError);
  });
});
