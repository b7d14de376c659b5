import type { IDrawdownReading, IPricePoint, IRecoveryStats } from "../types/signal.types";
import { InsufficientHistoryError } from "../utils/errors";
import { mean, median, roundTo } from "../utils/mathUtils";

export const MIN_HISTORY_POINTS = 2;

export interface IPersistedAth {
  price: number;
  date: string | null;
}

function usablePoints(history: IPricePoint[]): IPricePoint[] {
  return history.filter((p) => Number.isFinite(p.close) && p.close > 0);
}

/**
 * Drawdown of the latest close from the running all-time high.
 *
 * `previousAth` is the high already persisted on the signal. It wins over the
 * series maximum when larger, so a re-fetched history with gaps can never
 * lower the recorded high.
 */
export function computeDrawdown(
  ticker: string,
  history: IPricePoint[],
  previousAth?: IPersistedAth | null
): IDrawdownReading {
  const points = usablePoints(history);
  if (points.length < MIN_HISTORY_POINTS) {
    throw new InsufficientHistoryError(ticker, points.length, MIN_HISTORY_POINTS);
  }

  let athPrice = points[0].close;
  let athDate = points[0].date;
  for (const point of points) {
    // >= keeps the most recent occurrence of a tied high
    if (point.close >= athPrice) {
      athPrice = point.close;
      athDate = point.date;
    }
  }

  if (previousAth && previousAth.price > athPrice) {
    athPrice = previousAth.price;
    athDate = previousAth.date ?? athDate;
  }

  const latest = points[points.length - 1];
  const drawdown = Math.max(0, (athPrice - latest.close) / athPrice);

  return {
    ticker,
    currentPrice: latest.close,
    asOf: latest.date,
    athPrice,
    athDate,
    drawdown: roundTo(drawdown),
  };
}

/**
 * Historical drawdown episodes and how long each took to regain its high.
 * An episode starts when the running drawdown reaches `threshold` and ends
 * on the first close at or above the prior high.
 */
export function calculateRecoveryStats(
  ticker: string,
  history: IPricePoint[],
  threshold: number
): IRecoveryStats {
  const points = usablePoints(history);
  if (points.length < MIN_HISTORY_POINTS) {
    throw new InsufficientHistoryError(ticker, points.length, MIN_HISTORY_POINTS);
  }

  const durations: number[] = [];
  let runningMax = points[0].close;
  let startIdx = -1;

  for (let i = 0; i < points.length; i++) {
    const close = points[i].close;
    if (startIdx >= 0 && close >= runningMax) {
      durations.push(i - startIdx);
      startIdx = -1;
    }
    runningMax = Math.max(runningMax, close);
    const drawdown = (runningMax - close) / runningMax;
    if (startIdx < 0 && drawdown >= threshold) {
      startIdx = i;
    }
  }

  const totalEpisodes = durations.length + (startIdx >= 0 ? 1 : 0);

  return {
    ticker,
    threshold,
    totalEpisodes,
    recoveredEpisodes: durations.length,
    avgRecoveryDays: roundTo(mean(durations), 2),
    medianRecoveryDays: median(durations),
    minRecoveryDays: durations.length > 0 ? Math.min(...durations) : 0,
    maxRecoveryDays: durations.length > 0 ? Math.max(...durations) : 0,
    recoveryRate: totalEpisodes > 0 ? roundTo(durations.length / totalEpisodes, 4) : 0,
  };
}
