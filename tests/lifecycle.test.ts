import { describe, expect, it } from "vitest";

import {
  applyDrawdown,
  applyLeveragedPrice,
  assertSignalInvariant,
  canTransition,
  closePosition,
  createSignal,
  openPosition,
} from "../src/engine/SignalLifecycle";
import { SignalState, type ISignal } from "../src/types/signal.types";
import { InvalidTransitionError } from "../src/utils/errors";
import { AT, makePair, reading } from "./fixtures";

function signalAt(drawdown: number): ISignal {
  return applyDrawdown(createSignal(makePair(), AT), reading(drawdown), AT).signal;
}

function activeSignal(): ISignal {
  return openPosition(signalAt(0.06), 50, "2026-10-19", AT).signal;
}

describe("SignalLifecycle", () => {
  it("walks a gapped reading through ALERT into SIGNAL", () => {
    const step = applyDrawdown(createSignal(makePair(), AT), reading(0.06), AT);

    expect(step.transitions.map((t) => [t.from, t.to])).toEqual([
      [SignalState.WATCH, SignalState.ALERT],
      [SignalState.ALERT, SignalState.SIGNAL],
    ]);
    expect(step.transitions[1].reason).toBe("drawdown 0.06 reached entry threshold");
    expect(step.signal.transitions).toHaveLength(2);
  });

  it("walks a sharp recovery back through ALERT to WATCH", () => {
    const step = applyDrawdown(signalAt(0.06), reading(0.01), AT);

    expect(step.signal.state).toBe(SignalState.WATCH);
    expect(step.transitions.map((t) => t.reason)).toEqual([
      "drawdown 0.01 recovered below entry threshold",
      "drawdown 0.01 recovered below alert threshold",
    ]);
  });

  it("stops at ALERT between the two thresholds", () => {
    const step = applyDrawdown(createSignal(makePair(), AT), reading(0.04), AT);
    expect(step.signal.state).toBe(SignalState.ALERT);
    expect(step.transitions).toHaveLength(1);
  });

  it("does not allow WATCH to ACTIVE or TARGET to SIGNAL", () => {
    expect(canTransition(SignalState.WATCH, SignalState.ACTIVE)).toBe(false);
    expect(canTransition(SignalState.TARGET, SignalState.SIGNAL)).toBe(false);
    expect(canTransition(SignalState.SIGNAL, SignalState.ACTIVE)).toBe(true);
  });

  it("refuses to open a position outside SIGNAL and leaves the signal as it was", () => {
    const watch = createSignal(makePair(), AT);

    expect(() => openPosition(watch, 50, "2026-10-19", AT)).toThrow(InvalidTransitionError);
    expect(watch.state).toBe(SignalState.WATCH);
    expect(watch.entryPrice).toBeNull();
  });

  it("sets entry fields exactly while a position is held", () => {
    const active = activeSignal();

    expect(active.state).toBe(SignalState.ACTIVE);
    expect(active.entryPrice).toBe(50);
    expect(active.entryDate).toBe("2026-10-19");
    expect(active.unrealizedPl).toBe(0);
    expect(() => assertSignalInvariant(active)).not.toThrow();

    const closed = closePosition(active, 52, AT).signal;
    expect(closed.state).toBe(SignalState.WATCH);
    expect(closed.entryPrice).toBeNull();
    expect(closed.entryDate).toBeNull();
    expect(closed.unrealizedPl).toBeNull();
    expect(() => assertSignalInvariant(closed)).not.toThrow();
  });

  it("flags a signal with an entry price outside a position state", () => {
    const broken: ISignal = { ...createSignal(makePair(), AT), entryPrice: 10 };
    expect(() => assertSignalInvariant(broken)).toThrow(InvalidTransitionError);
  });

  it("ignores drawdown once a position is held", () => {
    const step = applyDrawdown(activeSignal(), reading(0.01), AT);

    expect(step.signal.state).toBe(SignalState.ACTIVE);
    expect(step.transitions).toHaveLength(0);
    expect(step.signal.drawdown).toBe(0.01);
  });

  it("moves to TARGET at the profit target and back to ACTIVE below it", () => {
    const target = applyLeveragedPrice(activeSignal(), 55, AT);
    expect(target.signal.state).toBe(SignalState.TARGET);
    expect(target.signal.unrealizedPl).toBe(0.1);
    expect(target.transitions[0].value).toBe(0.1);

    const back = applyLeveragedPrice(target.signal, 54, AT);
    expect(back.signal.state).toBe(SignalState.ACTIVE);
    expect(back.signal.unrealizedPl).toBe(0.08);
  });

  it("only closes ACTIVE or TARGET positions", () => {
    expect(() => closePosition(signalAt(0.06), 50, AT)).toThrow(InvalidTransitionError);
  });

  it("keeps a bounded transition trail", () => {
    let signal = createSignal(makePair(), AT);
    for (let i = 0; i < 60; i++) {
      signal = applyDrawdown(signal, reading(i % 2 === 0 ? 0.04 : 0), AT).signal;
    }
    expect(signal.transitions).toHaveLength(50);
  });
});
