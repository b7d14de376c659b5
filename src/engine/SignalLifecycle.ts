import {
  type IDrawdownReading,
  type IPairConfig,
  type ISignal,
  type ITransition,
  POSITION_STATES,
  SignalState,
} from "../types/signal.types";
import { InvalidTransitionError } from "../utils/errors";
import { roundTo } from "../utils/mathUtils";

const MAX_TRANSITIONS = 50;

/**
 * Every permitted edge. Anything else is rejected.
 * WATCH never reaches ACTIVE directly and TARGET never returns to SIGNAL.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<SignalState, readonly SignalState[]>> = {
  [SignalState.WATCH]: [SignalState.ALERT],
  [SignalState.ALERT]: [SignalState.WATCH, SignalState.SIGNAL],
  [SignalState.SIGNAL]: [SignalState.ALERT, SignalState.ACTIVE],
  [SignalState.ACTIVE]: [SignalState.TARGET, SignalState.WATCH],
  [SignalState.TARGET]: [SignalState.ACTIVE, SignalState.WATCH],
};

// Drawdown-driven states, in order of depth
const LADDER: readonly SignalState[] = [SignalState.WATCH, SignalState.ALERT, SignalState.SIGNAL];

export interface ILifecycleStep {
  signal: ISignal;
  transitions: ITransition[];
}

export function canTransition(from: SignalState, to: SignalState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function holdsPosition(signal: ISignal): boolean {
  return POSITION_STATES.has(signal.state);
}

export function createSignal(pair: IPairConfig, at: string): ISignal {
  return {
    leveragedTicker: pair.leveragedTicker,
    underlyingTicker: pair.underlyingTicker,
    sector: pair.sector,
    leverage: pair.leverage,
    state: SignalState.WATCH,
    drawdown: 0,
    athPrice: 0,
    athDate: null,
    entryThreshold: pair.entryThreshold,
    alertThreshold: pair.alertThreshold,
    profitTarget: pair.profitTarget,
    entryPrice: null,
    entryDate: null,
    currentPrice: null,
    leveragedPrice: null,
    unrealizedPl: null,
    updatedAt: at,
    transitions: [],
    factorInputs: null,
  };
}

/**
 * Carry configuration changes (thresholds, sector, leverage) onto an existing
 * signal without touching its state.
 */
export function syncWithPair(signal: ISignal, pair: IPairConfig): ISignal {
  return {
    ...signal,
    underlyingTicker: pair.underlyingTicker,
    sector: pair.sector,
    leverage: pair.leverage,
    entryThreshold: pair.entryThreshold,
    alertThreshold: pair.alertThreshold,
    profitTarget: pair.profitTarget,
    // Documents written before the field existed load without it
    factorInputs: signal.factorInputs ?? null,
  };
}

export function assertSignalInvariant(signal: ISignal): void {
  const hasEntry = signal.entryPrice !== null && signal.entryDate !== null;
  const noEntry = signal.entryPrice === null && signal.entryDate === null;
  if (holdsPosition(signal) ? !hasEntry : !noEntry) {
    throw new InvalidTransitionError(
      signal.leveragedTicker,
      signal.state,
      signal.state,
      "entry price and date must be set exactly while a position is held"
    );
  }
}

function transition(
  signal: ISignal,
  to: SignalState,
  reason: string,
  value: number | null,
  at: string
): ILifecycleStep {
  if (!canTransition(signal.state, to)) {
    throw new InvalidTransitionError(signal.leveragedTicker, signal.state, to);
  }
  const record: ITransition = { from: signal.state, to, reason, value, at };
  return {
    signal: {
      ...signal,
      state: to,
      updatedAt: at,
      transitions: [...signal.transitions, record].slice(-MAX_TRANSITIONS),
    },
    transitions: [record],
  };
}

/**
 * The drawdown-driven state a reading calls for.
 * Recovery below the entry bound falls back to ALERT, and only recovery
 * below the alert bound returns to WATCH.
 */
export function stateForDrawdown(drawdown: number, signal: Pick<ISignal, "entryThreshold" | "alertThreshold">): SignalState {
  if (drawdown >= signal.entryThreshold) return SignalState.SIGNAL;
  if (drawdown >= signal.alertThreshold) return SignalState.ALERT;
  return SignalState.WATCH;
}

/**
 * Apply a fresh drawdown reading. Signals holding a position only record the
 * new prices; the rest walk the WATCH/ALERT/SIGNAL ladder one edge at a time,
 * so a gapped reading still leaves every intermediate state in the trail.
 */
export function applyDrawdown(signal: ISignal, reading: IDrawdownReading, at: string): ILifecycleStep {
  let current: ISignal = {
    ...signal,
    drawdown: reading.drawdown,
    athPrice: Math.max(signal.athPrice, reading.athPrice),
    athDate: reading.athPrice >= signal.athPrice ? reading.athDate : signal.athDate,
    currentPrice: reading.currentPrice,
    updatedAt: at,
  };

  if (holdsPosition(current)) {
    return { signal: current, transitions: [] };
  }

  const target = stateForDrawdown(reading.drawdown, current);
  const transitions: ITransition[] = [];
  let idx = LADDER.indexOf(current.state);
  const targetIdx = LADDER.indexOf(target);

  while (idx !== targetIdx) {
    idx += idx < targetIdx ? 1 : -1;
    const next = LADDER[idx];
    const reason = describeStep(current.state, next, reading.drawdown);
    const step = transition(current, next, reason, reading.drawdown, at);
    current = step.signal;
    transitions.push(...step.transitions);
  }

  return { signal: current, transitions };
}

function describeStep(from: SignalState, to: SignalState, drawdown: number): string {
  const deeper = LADDER.indexOf(to) > LADDER.indexOf(from);
  if (deeper) {
    return to === SignalState.SIGNAL
      ? `drawdown ${drawdown} reached entry threshold`
      : `drawdown ${drawdown} reached alert threshold`;
  }
  return to === SignalState.WATCH
    ? `drawdown ${drawdown} recovered below alert threshold`
    : `drawdown ${drawdown} recovered below entry threshold`;
}

/**
 * Mark a held position to the latest leveraged price and move between
 * ACTIVE and TARGET on the profit target.
 */
export function applyLeveragedPrice(signal: ISignal, price: number, at: string): ILifecycleStep {
  if (!holdsPosition(signal) || signal.entryPrice === null) {
    return { signal: { ...signal, leveragedPrice: price, updatedAt: at }, transitions: [] };
  }

  const pl = roundTo((price - signal.entryPrice) / signal.entryPrice);
  const marked: ISignal = { ...signal, leveragedPrice: price, unrealizedPl: pl, updatedAt: at };

  if (marked.state === SignalState.ACTIVE && pl >= marked.profitTarget) {
    return transition(marked, SignalState.TARGET, `P/L ${pl} reached target ${marked.profitTarget}`, pl, at);
  }
  if (marked.state === SignalState.TARGET && pl < marked.profitTarget) {
    return transition(marked, SignalState.ACTIVE, `P/L ${pl} fell back below target ${marked.profitTarget}`, pl, at);
  }
  return { signal: marked, transitions: [] };
}

/**
 * SIGNAL -> ACTIVE. The caller has already obtained veto approval.
 */
export function openPosition(signal: ISignal, price: number, date: string, at: string): ILifecycleStep {
  if (signal.state !== SignalState.SIGNAL) {
    throw new InvalidTransitionError(signal.leveragedTicker, signal.state, SignalState.ACTIVE, "enter requires SIGNAL");
  }
  const step = transition(signal, SignalState.ACTIVE, `entered at ${price}`, 0, at);
  return {
    signal: {
      ...step.signal,
      entryPrice: price,
      entryDate: date,
      leveragedPrice: price,
      unrealizedPl: 0,
    },
    transitions: step.transitions,
  };
}

/**
 * ACTIVE/TARGET -> WATCH, clearing the entry fields.
 */
export function closePosition(signal: ISignal, price: number, at: string): ILifecycleStep {
  if (!holdsPosition(signal) || signal.entryPrice === null) {
    throw new InvalidTransitionError(signal.leveragedTicker, signal.state, SignalState.WATCH, "close requires ACTIVE or TARGET");
  }
  const pl = roundTo((price - signal.entryPrice) / signal.entryPrice);
  const step = transition(signal, SignalState.WATCH, `closed at ${price}`, pl, at);
  return {
    signal: {
      ...step.signal,
      entryPrice: null,
      entryDate: null,
      leveragedPrice: price,
      unrealizedPl: null,
      factorInputs: null,
    },
    transitions: step.transitions,
  };
}
