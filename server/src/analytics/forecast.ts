// Lightweight statistical forecast: least-squares trend blended with an SMA anchor
import { UpstreamError, isRecord } from '../shared/errors.js';
import type { MarketDataSource } from '../providers/marketData.js';

export interface ClosePoint {
  date: string;
  close: number;
}

export interface ForecastPoint {
  date: string;
  predicted: number;
  lower: number;
  upper: number;
}

export interface Forecast {
  ticker: string;
  lastClose: number;
  lastDate: string;
  horizonDays: number;
  method: string;
  points: ForecastPoint[];
}

export const HISTORY_DAYS = 180;
const TREND_WINDOW = 30;
const SMA_WINDOW = 10;
const MIN_POINTS = SMA_WINDOW;
const Z95 = 1.96;

const round2 = (n: number) => Math.round(n * 100) / 100;

export function sma(closes: number[], window = SMA_WINDOW): number {
  if (!closes.length) return 0;
  const recent = closes.slice(-Math.min(window, closes.length));
  return recent.reduce((a, b) => a + b, 0) / recent.length;
}

export function linearFit(ys: number[]): { intercept: number; slope: number; sigma: number } {
  const n = ys.length;
  const meanX = (n - 1) / 2;
  const meanY = ys.reduce((a, b) => a + b, 0) / n;
  let sxy = 0;
  let sxx = 0;
  ys.forEach((y, x) => {
    sxy += (x - meanX) * (y - meanY);
    sxx += (x - meanX) ** 2;
  });
  const slope = sxx ? sxy / sxx : 0;
  const intercept = meanY - slope * meanX;
  const sse = ys.reduce((acc, y, x) => acc + (y - (intercept + slope * x)) ** 2, 0);
  return { intercept, slope, sigma: Math.sqrt(sse / n) };
}

/** Next `count` weekdays after `fromDate` (YYYY-MM-DD, UTC). */
export function nextBusinessDays(fromDate: string, count: number): string[] {
  const d = new Date(`${fromDate}T00:00:00Z`);
  const out: string[] = [];
  while (out.length < count) {
    d.setUTCDate(d.getUTCDate() + 1);
    const day = d.getUTCDay();
    if (day !== 0 && day !== 6) out.push(d.toISOString().slice(0, 10));
  }
  return out;
}

export function forecastFromCloses(ticker: string, series: ClosePoint[], horizonDays: number): Forecast {
  const last = series[series.length - 1];
  if (!last || series.length < MIN_POINTS) {
    throw new UpstreamError('forecast', `not enough price history for ${ticker} (${series.length} closes)`);
  }
  const closes = series.map((p) => p.close);
  const window = closes.slice(-TREND_WINDOW);
  const { intercept, slope, sigma } = linearFit(window);
  const anchor = sma(closes);
  // the SMA sits (window-1)/2 bars behind the last close
  const lag = (Math.min(SMA_WINDOW, closes.length) - 1) / 2;
  const dates = nextBusinessDays(last.date, horizonDays);
  const points = dates.map((date, i) => {
    const k = i + 1;
    const trend = intercept + slope * (window.length - 1 + k);
    const smoothed = anchor + slope * (lag + k);
    const predicted = (trend + smoothed) / 2;
    const band = Z95 * sigma * Math.sqrt(k);
    return { date, predicted: round2(predicted), lower: round2(predicted - band), upper: round2(predicted + band) };
  });
  return {
    ticker,
    lastClose: last.close,
    lastDate: last.date,
    horizonDays,
    method: `linear-trend(${window.length}) + sma(${SMA_WINDOW}) blend, 95% band`,
    points,
  };
}

/** Daily closes out of an aggregates payload (`results[].t` epoch ms, `results[].c` close). */
export function closesFromAggregates(payload: unknown): ClosePoint[] {
  if (!isRecord(payload) || !Array.isArray(payload.results)) return [];
  const out: ClosePoint[] = [];
  for (const bar of payload.results) {
    if (isRecord(bar) && typeof bar.t === 'number' && typeof bar.c === 'number') {
      out.push({ date: new Date(bar.t).toISOString().slice(0, 10), close: bar.c });
    }
  }
  return out;
}

export interface PriceBar extends ClosePoint {
  open: number;
  high: number;
  low: number;
  volume: number;
}

/** OHLCV bars out of an aggregates payload; bars without a time or close are dropped. */
export function barsFromAggregates(payload: unknown): PriceBar[] {
  if (!isRecord(payload) || !Array.isArray(payload.results)) return [];
  const out: PriceBar[] = [];
  for (const bar of payload.results) {
    if (!isRecord(bar) || typeof bar.t !== 'number' || typeof bar.c !== 'number') continue;
    const close = bar.c;
    const num = (v: unknown, fallback: number) => (typeof v === 'number' ? v : fallback);
    out.push({
      date: new Date(bar.t).toISOString().slice(0, 10),
      open: num(bar.o, close),
      high: num(bar.h, close),
      low: num(bar.l, close),
      close,
      volume: num(bar.v, 0),
    });
  }
  return out;
}

export interface FitInfo {
  method: string;
  trained_at: string;
  data_points: number;
  last_date: string;
  horizon_days: number;
}

/** Forecast in the field layout the dashboard's forecast tab reads. */
export interface DashboardForecast {
  ticker: string;
  forecast: Array<{ date: string; predicted_close: number; upper_bound: number; lower_bound: number; day: number }>;
  model_info: FitInfo;
  historical: Array<{ date: string; close: number; open: number; high: number; low: number; volume: number }>;
  confidence_bounds: { upper: number[]; lower: number[] };
}

export const DASHBOARD_HORIZON = 30;
const CHART_BARS = 60;

export class ForecastService {
  private fits = new Map<string, FitInfo>();

  constructor(private readonly market: MarketDataSource, private readonly now: () => number = Date.now) {}

  async history(ticker: string): Promise<PriceBar[]> {
    const to = new Date(this.now());
    const from = new Date(to.getTime() - HISTORY_DAYS * 24 * 60 * 60 * 1000);
    const payload = await this.market.fetch('aggregates', ticker.toUpperCase(), {
      timespan: 'day',
      from: from.toISOString().slice(0, 10),
      to: to.toISOString().slice(0, 10),
    });
    return barsFromAggregates(payload);
  }

  async forecast(ticker: string, horizonDays = 7): Promise<Forecast> {
    const symbol = ticker.toUpperCase();
    return this.fit(symbol, await this.history(symbol), horizonDays).forecast;
  }

  /** Dashboard forecast over the given bars, or over fetched history when too few are given. */
  async predict(ticker: string, bars: PriceBar[] = [], horizonDays = DASHBOARD_HORIZON): Promise<DashboardForecast> {
    const symbol = ticker.toUpperCase();
    const series = bars.length >= TREND_WINDOW ? bars : await this.history(symbol);
    const { forecast: f, info } = this.fit(symbol, series, horizonDays);
    return {
      ticker: symbol,
      forecast: f.points.map((p, i) => ({ date: p.date, predicted_close: p.predicted, upper_bound: p.upper, lower_bound: p.lower, day: i + 1 })),
      model_info: info,
      historical: series.slice(-CHART_BARS).map((b) => ({ date: b.date, close: b.close, open: b.open, high: b.high, low: b.low, volume: b.volume })),
      confidence_bounds: { upper: f.points.map((p) => p.upper), lower: f.points.map((p) => p.lower) },
    };
  }

  /** The method needs no training; a ticker counts as fitted once a forecast has been computed for it. */
  status(ticker: string): { ticker: string; model_exists: boolean; metadata: FitInfo | null } {
    const symbol = ticker.toUpperCase();
    const info = this.fits.get(symbol) ?? null;
    return { ticker: symbol, model_exists: info !== null, metadata: info };
  }

  private fit(symbol: string, series: ClosePoint[], horizonDays: number): { forecast: Forecast; info: FitInfo } {
    const forecast = forecastFromCloses(symbol, series, horizonDays);
    const info: FitInfo = {
      method: forecast.method,
      trained_at: new Date(this.now()).toISOString(),
      data_points: series.length,
      last_date: forecast.lastDate,
      horizon_days: horizonDays,
    };
    this.fits.set(symbol, info);
    return { forecast, info };
  }
}
