import type { IEngineState, IStateRepository } from "../types/engine.types";
import type { ITradeOutcome } from "../types/outcome.types";
import type { IPairConfig, ISignal } from "../types/signal.types";
import { createSignal, syncWithPair } from "../engine/SignalLifecycle";
import { createPortfolio } from "../engine/PortfolioLedger";
import { logger } from "../utils/logger";

export interface IStateChange<T> {
  /** Null leaves the stored state as it was. */
  next: IEngineState | null;
  appendedOutcomes?: ITradeOutcome[];
  result: T;
}

/**
 * Serializes read-modify-write cycles over the engine state.
 *
 * Writers in this process queue behind one another; writers in other
 * processes are caught by the repository's version check and surface as
 * StaleStateError without anything being written.
 */
export class StateStore {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly repository: IStateRepository,
    private readonly universe: IPairConfig[],
    private readonly startingValue: number
  ) {}

  /** Current state without taking the write lock. */
  async read(): Promise<IEngineState> {
    const loaded = await this.repository.load();
    return loaded ? this.alignWithUniverse(loaded) : this.initialState();
  }

  async transaction<T>(work: (state: IEngineState) => IStateChange<T> | Promise<IStateChange<T>>): Promise<T> {
    const run = this.tail.then(async () => {
      const current = await this.read();
      const change = await work(current);
      if (change.next === null) return change.result;
      const next: IEngineState = {
        ...change.next,
        version: current.version + 1,
        updatedAt: new Date().toISOString(),
      };
      await this.repository.commit(next, current.version, change.appendedOutcomes ?? []);
      logger.debug(`Engine state committed at version ${next.version}`);
      return change.result;
    });
    // Keep the queue moving after a failed writer; the failure still reaches the caller via `run`
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  initialState(): IEngineState {
    const now = new Date().toISOString();
    const signals: Record<string, ISignal> = {};
    for (const pair of this.universe) {
      signals[pair.leveragedTicker] = createSignal(pair, now);
    }
    return {
      version: 0,
      signals,
      portfolio: createPortfolio(this.startingValue),
      outcomes: [],
      weights: {},
      updatedAt: now,
    };
  }

  /**
   * Add signals for pairs new to the universe and carry threshold changes onto
   * existing ones. Signals for pairs no longer configured are left untouched.
   */
  private alignWithUniverse(state: IEngineState): IEngineState {
    const signals: Record<string, ISignal> = { ...state.signals };
    for (const pair of this.universe) {
      const existing = signals[pair.leveragedTicker];
      signals[pair.leveragedTicker] = existing
        ? syncWithPair(existing, pair)
        : createSignal(pair, state.updatedAt);
    }
    return { ...state, signals };
  }
}
