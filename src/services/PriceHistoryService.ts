import axios, { type AxiosInstance } from "axios";
import type { IPriceHistoryProvider } from "../types/engine.types";
import type { IPricePoint } from "../types/signal.types";
import { errorMessage } from "../utils/errors";
import { finiteOrNull, isRecord } from "../utils/guards";
import { logger } from "../utils/logger";

const CHART_BASE = "https://query1.finance.yahoo.com/v8/finance/chart";

/**
 * Pull `timestamp` and `indicators.quote[0].close` out of a chart response.
 * Days with a missing close are skipped.
 */
export function parseChartResponse(data: unknown): IPricePoint[] {
  if (!isRecord(data) || !isRecord(data.chart) || !Array.isArray(data.chart.result)) return [];
  const result: unknown = data.chart.result[0];
  if (!isRecord(result) || !Array.isArray(result.timestamp) || !isRecord(result.indicators)) return [];
  const quotes = result.indicators.quote;
  if (!Array.isArray(quotes) || !isRecord(quotes[0]) || !Array.isArray(quotes[0].close)) return [];

  const timestamps: unknown[] = result.timestamp;
  const closes: unknown[] = quotes[0].close;
  const points: IPricePoint[] = [];
  for (let i = 0; i < timestamps.length; i++) {
    const ts = finiteOrNull(timestamps[i]);
    const close = finiteOrNull(closes[i]);
    if (ts === null || close === null || close <= 0) continue;
    points.push({ date: new Date(ts * 1000).toISOString().slice(0, 10), close });
  }
  return points;
}

export class PriceHistoryService implements IPriceHistoryProvider {
  private http: AxiosInstance;
  private range: string;

  constructor(range: string = "5y", baseURL: string = CHART_BASE) {
    this.http = axios.create({ baseURL, timeout: 10000 });
    this.range = range;
  }

  /** Daily closes, oldest first. Empty on any fetch or parse failure. */
  async getCloses(ticker: string): Promise<IPricePoint[]> {
    try {
      const resp = await this.http.get(`/${encodeURIComponent(ticker)}`, {
        params: { range: this.range, interval: "1d" },
      });
      const points = parseChartResponse(resp.data);
      if (points.length === 0) {
        logger.warning(`[PriceHistory] No usable closes for ${ticker}`);
      }
      return points;
    } catch (error) {
      logger.error(`[PriceHistory] Failed to fetch ${ticker}: ${errorMessage(error)}`);
      return [];
    }
  }

  async getLatestPrice(ticker: string): Promise<number | null> {
    try {
      const resp = await this.http.get(`/${encodeURIComponent(ticker)}`, {
        params: { range: "5d", interval: "1d" },
      });
      const points = parseChartResponse(resp.data);
      return points.length > 0 ? points[points.length - 1].close : null;
    } catch (error) {
      logger.error(`[PriceHistory] Failed to fetch latest price for ${ticker}: ${errorMessage(error)}`);
      return null;
    }
  }
}
