import type {
  ICorrelationWarning,
  IExposureReport,
  ILimitCheck,
  IPortfolioPosition,
  IPortfolioState,
  IProposedEntry,
  IRiskLimits,
  IVetoDecision,
} from "../types/risk.types";
import { DEFAULT_RISK_LIMITS, validateRiskLimits } from "../config/riskLimits";
import { correlation, formatPct, roundTo } from "../utils/mathUtils";
import { logger } from "../utils/logger";

export function positionValue(position: IPortfolioPosition): number {
  return position.quantity * position.lastPrice;
}

/**
 * Portfolio exposure breakdown from the ledger's open positions.
 * Total value is cash plus positions marked at their last price.
 */
export function calculateExposure(portfolio: IPortfolioState): IExposureReport {
  const investedValue = portfolio.positions.reduce((sum, p) => sum + positionValue(p), 0);
  const totalValue = portfolio.cashBalance + investedValue;
  const share = (value: number): number => (totalValue > 0 ? value / totalValue : 0);

  const sectorValues: Record<string, number> = {};
  let leveragedExposure = 0;
  let unrealizedPl = 0;
  for (const p of portfolio.positions) {
    const value = positionValue(p);
    sectorValues[p.sector] = (sectorValues[p.sector] ?? 0) + value;
    leveragedExposure += value * p.leverage;
    unrealizedPl += value - p.notional;
  }

  const sectorPcts: Record<string, number> = {};
  for (const [sector, value] of Object.entries(sectorValues)) {
    sectorPcts[sector] = roundTo(share(value));
  }

  return {
    totalValue: roundTo(totalValue),
    investedValue: roundTo(investedValue),
    cashValue: roundTo(portfolio.cashBalance),
    investedPct: roundTo(share(investedValue)),
    cashPct: totalValue > 0 ? roundTo(share(portfolio.cashBalance)) : 1,
    leveragedExposure: roundTo(leveragedExposure),
    leveragedExposureRatio: roundTo(share(leveragedExposure)),
    sectorValues,
    sectorPcts,
    positionCount: portfolio.positions.length,
    unrealizedPl: roundTo(unrealizedPl),
  };
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

export class RiskVetoGate {
  private readonly limits: IRiskLimits;

  constructor(limits: IRiskLimits = { ...DEFAULT_RISK_LIMITS }) {
    this.limits = validateRiskLimits(limits);
  }

  /**
   * Evaluate a proposed entry against every limit, in priority order:
   * position count, single-position size, sector, leveraged exposure, cash.
   * The first failing check is the veto reason. Correlation findings are
   * attached as warnings and never veto.
   */
  evaluate(
    proposal: IProposedEntry,
    portfolio: IPortfolioState,
    returnsByTicker: Record<string, number[]> = {}
  ): IVetoDecision {
    const exposure = calculateExposure(portfolio);
    const checks = this.runChecks(proposal, portfolio, exposure);
    const warnings = this.correlationWarnings(proposal, portfolio, returnsByTicker);

    for (const w of warnings) {
      logger.warning(`Risk gate advisory for ${proposal.ticker}: ${w.message}`);
    }

    const failed = checks.find((c) => !c.passed);
    if (failed) {
      const remediation = this.remediation(failed, proposal, exposure);
      logger.warning(`Risk gate VETOED ${proposal.ticker}: ${failed.message} | ${remediation}`);
      return { approved: false, ticker: proposal.ticker, reason: failed, remediation, checks, warnings };
    }

    return { approved: true, ticker: proposal.ticker, checks, warnings };
  }

  private runChecks(
    proposal: IProposedEntry,
    portfolio: IPortfolioState,
    exposure: IExposureReport
  ): ILimitCheck[] {
    const limits = this.limits;
    const total = exposure.totalValue;
    // An empty or negative portfolio cannot absorb any entry
    const share = (value: number): number =>
      total > 0 ? roundTo(value / total) : value > 0 ? Number.POSITIVE_INFINITY : 0;

    const countAfter = exposure.positionCount + 1;

    const existing = portfolio.positions
      .filter((p) => p.ticker === proposal.ticker)
      .reduce((sum, p) => sum + positionValue(p), 0);
    const singleNow = share(existing);
    const singleAfter = total > 0 ? share(existing + proposal.notional) : Number.POSITIVE_INFINITY;

    const sectorValue = exposure.sectorValues[proposal.sector] ?? 0;
    const sectorNow = share(sectorValue);
    const sectorAfter = share(sectorValue + proposal.notional);

    const leverageNow = exposure.leveragedExposureRatio;
    const leverageAfter = share(exposure.leveragedExposure + proposal.notional * proposal.leverage);

    const cashNow = total > 0 ? exposure.cashPct : 0;
    const cashAfter = total > 0 ? roundTo((exposure.cashValue - proposal.notional) / total) : Number.NEGATIVE_INFINITY;

    return [
      {
        criterion: "max-positions",
        limitName: "maxConcurrentPositions",
        current: exposure.positionCount,
        afterEntry: countAfter,
        limit: limits.maxConcurrentPositions,
        headroom: limits.maxConcurrentPositions - countAfter,
        passed: countAfter <= limits.maxConcurrentPositions,
        message: `open positions ${countAfter} after entry vs limit ${limits.maxConcurrentPositions}`,
      },
      {
        criterion: "single-position",
        limitName: "maxSinglePositionPct",
        current: singleNow,
        afterEntry: singleAfter,
        limit: limits.maxSinglePositionPct,
        headroom: roundTo(limits.maxSinglePositionPct - singleAfter),
        passed: singleAfter <= limits.maxSinglePositionPct,
        message: `${proposal.ticker} would be ${formatPct(singleAfter)} of portfolio vs limit ${formatPct(limits.maxSinglePositionPct)}`,
      },
      {
        criterion: "sector-exposure",
        limitName: "maxSectorExposurePct",
        current: sectorNow,
        afterEntry: sectorAfter,
        limit: limits.maxSectorExposurePct,
        headroom: roundTo(limits.maxSectorExposurePct - sectorAfter),
        passed: sectorAfter <= limits.maxSectorExposurePct,
        message: `sector ${proposal.sector} ${formatPct(sectorNow)} -> ${formatPct(sectorAfter)} vs limit ${formatPct(limits.maxSectorExposurePct)}`,
      },
      {
        criterion: "leveraged-exposure",
        limitName: "maxLeveragedExposure",
        current: leverageNow,
        afterEntry: leverageAfter,
        limit: limits.maxLeveragedExposure,
        headroom: roundTo(limits.maxLeveragedExposure - leverageAfter),
        passed: leverageAfter <= limits.maxLeveragedExposure,
        message: `leveraged exposure ${leverageNow.toFixed(2)}x -> ${leverageAfter.toFixed(2)}x vs limit ${limits.maxLeveragedExposure.toFixed(2)}x`,
      },
      {
        criterion: "cash-reserve",
        limitName: "minCashReservePct",
        current: cashNow,
        afterEntry: cashAfter,
        limit: limits.minCashReservePct,
        headroom: roundTo(cashAfter - limits.minCashReservePct),
        passed: cashAfter >= limits.minCashReservePct,
        message: `cash ${formatPct(cashNow)} -> ${formatPct(cashAfter)} vs minimum ${formatPct(limits.minCashReservePct)}`,
      },
    ];
  }

  private remediation(check: ILimitCheck, proposal: IProposedEntry, exposure: IExposureReport): string {
    const total = exposure.totalValue;
    switch (check.criterion) {
      case "max-positions":
        return `close one of the ${check.current} open positions before entering ${proposal.ticker}`;
      case "single-position":
        return total > 0
          ? `reduce the ${proposal.ticker} entry to at most ${money(check.limit * total)}`
          : "portfolio has no value to allocate";
      case "sector-exposure":
        return `reduce ${proposal.sector} exposure below ${formatPct(check.limit)}`;
      case "leveraged-exposure":
        return `reduce aggregate leveraged exposure below ${check.limit.toFixed(2)}x`;
      case "cash-reserve":
        return `keep at least ${formatPct(check.limit)} in cash; this entry would leave ${formatPct(check.afterEntry)}`;
    }
  }

  private correlationWarnings(
    proposal: IProposedEntry,
    portfolio: IPortfolioState,
    returnsByTicker: Record<string, number[]>
  ): ICorrelationWarning[] {
    const proposed = proposal.returns ?? returnsByTicker[proposal.ticker];
    if (!proposed || proposed.length < 2) return [];

    const warnings: ICorrelationWarning[] = [];
    const threshold = this.limits.correlationThreshold;
    for (const p of portfolio.positions) {
      if (p.sector !== proposal.sector || p.ticker === proposal.ticker) continue;
      const other = returnsByTicker[p.ticker];
      if (!other || other.length < 2) continue;
      const corr = roundTo(correlation(proposed, other), 4);
      if (corr > threshold) {
        warnings.push({
          ticker: proposal.ticker,
          correlatedWith: p.ticker,
          sector: p.sector,
          correlation: corr,
          threshold,
          message: `${proposal.ticker} and ${p.ticker} (${p.sector}) correlation ${corr.toFixed(2)} exceeds ${threshold.toFixed(2)}`,
        });
      }
    }
    return warnings;
  }
}
