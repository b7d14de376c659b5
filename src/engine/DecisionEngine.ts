import type { FactorWeightTable, IConfidenceAssessment, IFactorInputs } from "../types/confidence.types";
import type {
  ICloseResult,
  IEngineState,
  IEntryOptions,
  IEntryResult,
  IMarketSnapshot,
  IPairEvaluation,
  IRefreshReport,
} from "../types/engine.types";
import type { ITradeStats } from "../types/outcome.types";
import type { IExposureReport, IPortfolioState, IVetoDecision } from "../types/risk.types";
import { SignalState, type IPairConfig, type ISignal, type ITransition } from "../types/signal.types";
import type { ISizingResult } from "../types/sizing.types";
import { DEFAULT_MIN_WEIGHT_SAMPLES } from "../config/riskLimits";
import type { StateStore } from "../services/StateStore";
import { ConfidenceScorer, toFactorMap } from "./ConfidenceScorer";
import { computeDrawdown } from "./DrawdownTracker";
import { resolveVolatilityRegime } from "./factors";
import { computeTradeStats, computeWeights, createOutcome, learningInsights, type ILearningInsights } from "./OutcomeLearner";
import { PortfolioLedger } from "./PortfolioLedger";
import { PositionSizer } from "./PositionSizer";
import { calculateExposure, RiskVetoGate } from "./RiskVetoGate";
import {
  applyDrawdown,
  applyLeveragedPrice,
  closePosition,
  createSignal,
  holdsPosition,
  openPosition,
} from "./SignalLifecycle";
import {
  EngineError,
  InsufficientTradeHistoryError,
  InvalidTransitionError,
  UnknownTickerError,
  errorMessage,
} from "../utils/errors";
import { logger } from "../utils/logger";
import { dailyReturns, formatPct, roundTo } from "../utils/mathUtils";

export interface IDecisionEngineOptions {
  universe: IPairConfig[];
  store: StateStore;
  riskGate?: RiskVetoGate;
  sizer?: PositionSizer;
  minWeightSamples?: number;
  now?: () => Date;
}

interface IPairContext {
  ledger: PortfolioLedger;
  stats: ITradeStats;
  returnsByTicker: Record<string, number[]>;
}

/**
 * Runs refresh cycles and the manual enter/close operations over the state
 * held in the StateStore. Each public operation is one read-modify-write.
 */
export class DecisionEngine {
  private readonly pairs: Map<string, IPairConfig>;
  private readonly store: StateStore;
  private readonly riskGate: RiskVetoGate;
  private readonly sizer: PositionSizer;
  private readonly scorer: ConfidenceScorer;
  private readonly minWeightSamples: number;
  private readonly now: () => Date;

  constructor(options: IDecisionEngineOptions) {
    this.pairs = new Map(options.universe.map((p) => [p.leveragedTicker, p]));
    this.store = options.store;
    this.riskGate = options.riskGate ?? new RiskVetoGate();
    this.sizer = options.sizer ?? new PositionSizer();
    this.minWeightSamples = options.minWeightSamples ?? DEFAULT_MIN_WEIGHT_SAMPLES;
    this.scorer = new ConfidenceScorer({}, this.minWeightSamples);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Re-evaluate every pair in the universe against a market snapshot.
   * A failing pair keeps its previous signal and is reported; the rest of
   * the universe is still processed and committed.
   */
  async refresh(snapshot: IMarketSnapshot): Promise<IRefreshReport> {
    return this.store.transaction<IRefreshReport>((state) => {
      this.scorer.setWeights(state.weights);
      const at = snapshot.asOf;
      const ledger = new PortfolioLedger(state.portfolio);
      ledger.markToMarket(snapshot.leveragedPrices);

      const context: IPairContext = {
        ledger,
        stats: computeTradeStats(state.outcomes),
        returnsByTicker: this.returnsByTicker(snapshot),
      };

      const signals: Record<string, ISignal> = { ...state.signals };
      const evaluations: IPairEvaluation[] = [];
      const failures: IRefreshReport["failures"] = [];

      for (const pair of this.pairs.values()) {
        const ticker = pair.leveragedTicker;
        const prior = signals[ticker] ?? createSignal(pair, at);
        try {
          const evaluation = this.evaluatePair(pair, prior, snapshot, context);
          signals[ticker] = evaluation.signal;
          evaluations.push(evaluation);
        } catch (err) {
          const code = err instanceof EngineError ? err.code : "UNEXPECTED";
          const message = errorMessage(err);
          logger.error(`Refresh failed for ${ticker}: ${message}`);
          failures.push({ ticker, code, message });
          evaluations.push({ ticker, signal: prior, transitions: [], error: message });
        }
      }

      const version = state.version + 1;
      logger.info(
        `Refresh ${at}: ${evaluations.length - failures.length}/${evaluations.length} pairs evaluated, ` +
          `${evaluations.filter((e) => e.signal.state === SignalState.SIGNAL).length} in SIGNAL`
      );

      return {
        next: { ...state, signals, portfolio: ledger.snapshot() },
        result: { asOf: at, version, evaluations, failures },
      };
    });
  }

  /**
   * Open a position on a SIGNAL pair. A veto is returned as a structured
   * result and leaves the state untouched.
   */
  async enter(ticker: string, price: number, options: IEntryOptions = {}): Promise<IEntryResult> {
    const pair = this.requirePair(ticker);
    return this.store.transaction<IEntryResult>((state) => {
      this.scorer.setWeights(state.weights);
      const at = this.now().toISOString();
      const signal = state.signals[pair.leveragedTicker] ?? createSignal(pair, at);
      if (signal.state !== SignalState.SIGNAL) {
        throw new InvalidTransitionError(pair.leveragedTicker, signal.state, SignalState.ACTIVE, "enter requires SIGNAL");
      }

      const ledger = new PortfolioLedger(state.portfolio);
      // Without explicit inputs, score against the snapshot the last refresh used
      const factors = options.factors ?? signal.factorInputs ?? {};
      const sizing =
        options.notional !== undefined
          ? this.manualSizing(options.notional, ledger.getTotalValue(), price)
          : this.proposeSize(pair, ledger.getTotalValue(), price, factors, computeTradeStats(state.outcomes));
      const decision = this.riskGate.evaluate(
        {
          ticker: pair.leveragedTicker,
          sector: pair.sector,
          leverage: pair.leverage,
          notional: sizing.notional,
          returns: options.returns?.[pair.leveragedTicker],
        },
        ledger.snapshot(),
        options.returns
      );
      const assessment = this.scorer.assess(signal, { ...factors, portfolioRiskPass: decision.approved }, at);

      if (!decision.approved) {
        return { next: null, result: { status: "vetoed", signal, assessment, decision, sizing } };
      }

      const entryDate = options.date ?? at.slice(0, 10);
      const position = ledger.enter({
        ticker: pair.leveragedTicker,
        underlyingTicker: pair.underlyingTicker,
        sector: pair.sector,
        leverage: pair.leverage,
        price,
        notional: sizing.notional,
        date: entryDate,
        factorsAtEntry: toFactorMap(assessment.factors),
      });
      const step = openPosition(signal, price, entryDate, at);
      this.logTransitions(pair.leveragedTicker, step.transitions);
      logger.success(
        `Entered ${pair.leveragedTicker} at ${price}: $${position.notional.toFixed(2)} ` +
          `(${formatPct(sizing.portfolioPct)} of portfolio, confidence ${assessment.level})`
      );

      return {
        next: {
          ...state,
          signals: { ...state.signals, [pair.leveragedTicker]: step.signal },
          portfolio: ledger.snapshot(),
        },
        result: { status: "entered", signal: step.signal, position, assessment, decision, sizing },
      };
    });
  }

  /**
   * Close an ACTIVE or TARGET position, record the outcome and publish the
   * rebuilt weight table.
   */
  async close(ticker: string, price: number, date?: string): Promise<ICloseResult> {
    const pair = this.requirePair(ticker);
    const result = await this.store.transaction<ICloseResult>((state) => {
      const at = this.now().toISOString();
      const signal = state.signals[pair.leveragedTicker];
      if (!signal || !holdsPosition(signal)) {
        throw new InvalidTransitionError(
          pair.leveragedTicker,
          signal ? signal.state : SignalState.WATCH,
          SignalState.WATCH,
          "close requires ACTIVE or TARGET"
        );
      }

      const ledger = new PortfolioLedger(state.portfolio);
      const closed = ledger.close(pair.leveragedTicker, price);
      const step = closePosition(signal, price, at);
      const outcome = createOutcome({
        ticker: pair.leveragedTicker,
        underlyingTicker: pair.underlyingTicker,
        entryDate: closed.position.entryDate,
        exitDate: date ?? at.slice(0, 10),
        entryPrice: closed.position.entryPrice,
        exitPrice: price,
        notional: closed.position.notional,
        realizedPl: closed.realizedPl,
        factorsAtEntry: closed.position.factorsAtEntry,
      });
      const outcomes = [...state.outcomes, outcome];
      const weights = computeWeights(outcomes);

      this.logTransitions(pair.leveragedTicker, step.transitions);
      logger.success(
        `Closed ${pair.leveragedTicker} at ${price}: P/L $${outcome.realizedPl.toFixed(2)} (${formatPct(outcome.plPct)})`
      );

      return {
        next: {
          ...state,
          signals: { ...state.signals, [pair.leveragedTicker]: step.signal },
          portfolio: ledger.snapshot(),
          outcomes,
          weights,
        },
        appendedOutcomes: [outcome],
        result: { signal: step.signal, outcome, weights },
      };
    });

    this.publishWeights(result.weights);
    return result;
  }

  /** Rebuild the weight table from the full outcome log. */
  async recomputeWeights(): Promise<FactorWeightTable> {
    const weights = await this.store.transaction<FactorWeightTable>((state) => {
      const rebuilt = computeWeights(state.outcomes);
      return { next: { ...state, weights: rebuilt }, result: rebuilt };
    });
    this.publishWeights(weights);
    return weights;
  }

  async getSignals(): Promise<ISignal[]> {
    const state = await this.store.read();
    return [...this.pairs.keys()].flatMap((ticker) => {
      const signal = state.signals[ticker];
      return signal ? [signal] : [];
    });
  }

  async getSignal(ticker: string): Promise<ISignal> {
    const pair = this.requirePair(ticker);
    const state = await this.store.read();
    return state.signals[pair.leveragedTicker] ?? createSignal(pair, state.updatedAt);
  }

  async getPortfolio(): Promise<IPortfolioState> {
    return (await this.store.read()).portfolio;
  }

  async getExposure(): Promise<IExposureReport> {
    return calculateExposure(await this.getPortfolio());
  }

  async getInsights(): Promise<ILearningInsights> {
    const state = await this.store.read();
    return learningInsights(state.outcomes, state.weights, this.minWeightSamples);
  }

  /** Score a pair against a factor snapshot without touching the state. */
  async assess(ticker: string, factors: IFactorInputs): Promise<IConfidenceAssessment> {
    const pair = this.requirePair(ticker);
    const state: IEngineState = await this.store.read();
    this.scorer.setWeights(state.weights);
    const signal = state.signals[pair.leveragedTicker] ?? createSignal(pair, state.updatedAt);
    return this.scorer.assess(signal, factors, this.now().toISOString());
  }

  private evaluatePair(
    pair: IPairConfig,
    prior: ISignal,
    snapshot: IMarketSnapshot,
    context: IPairContext
  ): IPairEvaluation {
    const ticker = pair.leveragedTicker;
    const at = snapshot.asOf;
    const history = snapshot.underlyingHistory[pair.underlyingTicker] ?? [];
    const reading = computeDrawdown(pair.underlyingTicker, history, { price: prior.athPrice, date: prior.athDate });

    const stepped = applyDrawdown(prior, reading, at);
    let signal = stepped.signal;
    const transitions: ITransition[] = [...stepped.transitions];

    const leveragedPrice = snapshot.leveragedPrices[ticker];
    if (leveragedPrice !== undefined && leveragedPrice > 0) {
      const marked = applyLeveragedPrice(signal, leveragedPrice, at);
      signal = marked.signal;
      transitions.push(...marked.transitions);
    }
    this.logTransitions(ticker, transitions);

    if (signal.state !== SignalState.SIGNAL) {
      if (!holdsPosition(signal)) signal = { ...signal, factorInputs: null };
      return { ticker, signal, transitions };
    }

    const factors = snapshot.factors[ticker] ?? {};
    signal = { ...signal, factorInputs: { ...factors } };
    const price = signal.leveragedPrice ?? 0;
    const sizing = this.proposeSize(pair, context.ledger.getTotalValue(), price, factors, context.stats);
    const decision: IVetoDecision = this.riskGate.evaluate(
      {
        ticker,
        sector: pair.sector,
        leverage: pair.leverage,
        notional: sizing.notional,
        returns: context.returnsByTicker[ticker],
      },
      context.ledger.snapshot(),
      context.returnsByTicker
    );
    const assessment = this.scorer.assess(signal, { ...factors, portfolioRiskPass: decision.approved }, at);
    logger.info(
      `${ticker} SIGNAL: drawdown ${formatPct(signal.drawdown)}, confidence ${assessment.level} ` +
        `(${assessment.favorableCount}/${assessment.totalFactors}), ${decision.approved ? "risk approved" : "risk vetoed"}`
    );

    return {
      ticker,
      signal,
      transitions,
      assessment,
      decision,
      sizing: decision.approved ? sizing : undefined,
    };
  }

  private proposeSize(
    pair: IPairConfig,
    portfolioValue: number,
    price: number,
    factors: IFactorInputs,
    stats: ITradeStats
  ): ISizingResult {
    const volatilityRegime = resolveVolatilityRegime(factors);
    try {
      return this.sizer.size({ portfolioValue, leverage: pair.leverage, price, volatilityRegime, stats });
    } catch (err) {
      if (err instanceof InsufficientTradeHistoryError) {
        logger.warning(`${pair.leveragedTicker}: ${err.message}; sizing with fixed fraction`);
        return {
          ...this.sizer.fixedFraction(portfolioValue, pair.leverage, price, volatilityRegime),
          fallbackFrom: "half-kelly",
        };
      }
      throw err;
    }
  }

  private manualSizing(notional: number, portfolioValue: number, price: number): ISizingResult {
    const rounded = roundTo(notional);
    return {
      method: this.sizer.getConfig().method,
      notional: rounded,
      portfolioPct: portfolioValue > 0 ? roundTo(rounded / portfolioValue) : 0,
      quantityEstimate: price > 0 ? roundTo(rounded / price, 4) : 0,
      rationale: "notional set by caller",
    };
  }

  /** Daily returns of each pair's underlying, keyed by leveraged ticker. */
  private returnsByTicker(snapshot: IMarketSnapshot): Record<string, number[]> {
    const returns: Record<string, number[]> = {};
    for (const pair of this.pairs.values()) {
      const history = snapshot.underlyingHistory[pair.underlyingTicker];
      if (history && history.length > 1) {
        returns[pair.leveragedTicker] = dailyReturns(history.map((p) => p.close));
      }
    }
    return returns;
  }

  private publishWeights(weights: FactorWeightTable): void {
    this.scorer.setWeights(weights);
    const usable = Object.values(weights).filter((w) => w !== undefined && w.sampleCount >= this.minWeightSamples);
    logger.info(`Published factor weights: ${usable.length} of ${Object.keys(weights).length} factors usable`);
  }

  private logTransitions(ticker: string, transitions: ITransition[]): void {
    for (const t of transitions) {
      logger.info(`${ticker}: ${t.from} -> ${t.to} (${t.reason})`);
    }
  }

  private requirePair(ticker: string): IPairConfig {
    const pair = this.pairs.get(ticker.trim().toUpperCase());
    if (!pair) throw new UnknownTickerError(ticker);
    return pair;
  }
}
