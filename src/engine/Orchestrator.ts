import cron from "node-cron";
import { connectToDatabase, disconnectFromDatabase } from "../config/mongoose";
import type { EnvironmentConfig } from "../config/environment";
import type {
  ICloseResult,
  IEntryResult,
  IFactorSnapshotProvider,
  IMarketSnapshot,
  IPriceHistoryProvider,
  IRefreshReport,
  IStateRepository,
} from "../types/engine.types";
import type { IFactorInputs } from "../types/confidence.types";
import { SignalState, type IPairConfig, type IPricePoint } from "../types/signal.types";
import { FactorSnapshotService } from "../services/FactorSnapshotService";
import { MongoStateRepository } from "../services/MongoStateRepository";
import { PriceHistoryService } from "../services/PriceHistoryService";
import { StateStore } from "../services/StateStore";
import { calculateRecoveryStats } from "./DrawdownTracker";
import { DecisionEngine } from "./DecisionEngine";
import { PositionSizer } from "./PositionSizer";
import { RiskVetoGate } from "./RiskVetoGate";
import { ConfigurationError, errorMessage } from "../utils/errors";
import { formatPct } from "../utils/mathUtils";
import { logger } from "../utils/logger";

export interface IOrchestratorDeps {
  repository?: IStateRepository;
  prices?: IPriceHistoryProvider;
  factors?: IFactorSnapshotProvider;
}

export class Orchestrator {
  private readonly engine: DecisionEngine;
  private readonly prices: IPriceHistoryProvider;
  private readonly factors: IFactorSnapshotProvider;
  private readonly usesMongo: boolean;
  private cronJobs: ReturnType<typeof cron.schedule>[] = [];
  private cycleRunning = false;

  constructor(
    private readonly env: EnvironmentConfig,
    private readonly universe: IPairConfig[],
    deps: IOrchestratorDeps = {}
  ) {
    this.usesMongo = deps.repository === undefined;
    const repository = deps.repository ?? new MongoStateRepository();
    this.prices = deps.prices ?? new PriceHistoryService(env.priceHistoryRange);
    this.factors = deps.factors ?? new FactorSnapshotService(env.factorSnapshotPath, env.factorMaxAgeHours);
    this.engine = new DecisionEngine({
      universe,
      store: new StateStore(repository, universe, env.startingPortfolioValue),
      riskGate: new RiskVetoGate(env.riskLimits),
      sizer: new PositionSizer(env.sizing),
      minWeightSamples: env.minWeightSamples,
    });
  }

  async start(): Promise<void> {
    if (!cron.validate(this.env.refreshCron)) {
      throw new ConfigurationError(`REFRESH_CRON is not a valid cron expression: "${this.env.refreshCron}"`);
    }

    await this.prepare();

    // First cycle, then the schedule
    if (this.env.runOnStart) {
      await this.runCycle();
    }
    this.cronJobs.push(cron.schedule(this.env.refreshCron, () => void this.runCycle()));
    logger.success(`Refresh scheduled (${this.env.refreshCron}) for ${this.universe.length} pairs`);
  }

  /** Connect, publish weights and run a single cycle without scheduling. */
  async runOnce(): Promise<IRefreshReport | null> {
    await this.prepare();
    return this.runCycle();
  }

  /**
   * Manual SIGNAL -> ACTIVE entry. Without a notional the sizer decides, and
   * the factors are the ones the last refresh stored on the signal.
   */
  async enterPosition(ticker: string, price: number, notional?: number): Promise<IEntryResult> {
    await this.prepare();
    return this.engine.enter(ticker, price, notional === undefined ? {} : { notional });
  }

  async closePosition(ticker: string, price: number): Promise<ICloseResult> {
    await this.prepare();
    return this.engine.close(ticker, price);
  }

  /**
   * One refresh cycle. A tick that arrives while the previous cycle is still
   * running is skipped. Never rejects.
   */
  async runCycle(): Promise<IRefreshReport | null> {
    if (this.cycleRunning) {
      logger.warning("Previous refresh still running, skipping this tick");
      return null;
    }
    this.cycleRunning = true;
    try {
      const snapshot = await this.buildSnapshot(new Date());
      const report = await this.engine.refresh(snapshot);
      this.logSignals(report, snapshot);
      return report;
    } catch (err) {
      logger.error(`Refresh cycle failed: ${errorMessage(err)}`);
      return null;
    } finally {
      this.cycleRunning = false;
    }
  }

  async buildSnapshot(asOf: Date): Promise<IMarketSnapshot> {
    const underlyingHistory: Record<string, IPricePoint[]> = {};
    const leveragedPrices: Record<string, number> = {};
    const factors: Record<string, IFactorInputs> = {};

    for (const pair of this.universe) {
      if (!underlyingHistory[pair.underlyingTicker]) {
        underlyingHistory[pair.underlyingTicker] = await this.prices.getCloses(pair.underlyingTicker);
      }
      const price = await this.prices.getLatestPrice(pair.leveragedTicker);
      if (price !== null) leveragedPrices[pair.leveragedTicker] = price;
      factors[pair.leveragedTicker] = await this.factors.getFactorInputs(pair, asOf);
    }

    return { asOf: asOf.toISOString(), underlyingHistory, leveragedPrices, factors };
  }

  async shutdown(): Promise<void> {
    logger.info("Shutting down orchestrator...");
    for (const job of this.cronJobs) {
      job.stop();
    }
    this.cronJobs = [];
    if (this.usesMongo) {
      await disconnectFromDatabase();
    }
    logger.info("Orchestrator shut down");
  }

  private async prepare(): Promise<void> {
    // 1. Connect to MongoDB
    if (this.usesMongo) {
      await connectToDatabase(this.env.mongoUri);
    }

    // 2. Re-publish learned weights from the outcome log
    await this.engine.recomputeWeights();
    const insights = await this.engine.getInsights();
    logger.info(`Learning: ${insights.summary}`);
  }

  private logSignals(report: IRefreshReport, snapshot: IMarketSnapshot): void {
    for (const evaluation of report.evaluations) {
      if (evaluation.signal.state !== SignalState.SIGNAL) continue;
      const pair = this.universe.find((p) => p.leveragedTicker === evaluation.ticker);
      const history = pair ? snapshot.underlyingHistory[pair.underlyingTicker] : undefined;
      if (!pair || !history || history.length < 2) continue;

      const stats = calculateRecoveryStats(pair.underlyingTicker, history, pair.entryThreshold);
      logger.info(
        `${pair.leveragedTicker}: ${stats.totalEpisodes} past ${formatPct(pair.entryThreshold, 0)} drawdowns in ${pair.underlyingTicker}, ` +
          `${formatPct(stats.recoveryRate, 0)} recovered, median ${stats.medianRecoveryDays} days`
      );
    }
    if (report.failures.length > 0) {
      logger.warning(`${report.failures.length} pair(s) failed: ${report.failures.map((f) => f.ticker).join(", ")}`);
    }
  }
}
