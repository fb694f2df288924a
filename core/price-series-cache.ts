/**
 * Price Series Cache
 *
 * Time-ordered oracle prices per (source, asset), with as-of lookup.
 * Each series is a pair of parallel arrays (timestamps, prices) kept sorted
 * by timestamp; lookups and out-of-order inserts binary-search the timestamps.
 *
 * Retention is relative: after every insert, points older than
 * (newest timestamp in that series - maxAgeMs) are evicted. A stalled feed
 * keeps its history until fresh data arrives.
 *
 * Access discipline: the oracle listener is the only writer and holds the
 * PriceSeriesWriter view; pricing code holds the PriceSeriesReader view.
 */

import { PricePoint, PriceSource } from './types';

export interface PriceSeriesWriter {
  add(source: PriceSource, asset: string, timestampMs: number, price: number): void;
}

export interface PriceSeriesReader {
  asOf(source: PriceSource, asset: string, timestampMs: number): PricePoint | null;
  latest(source: PriceSource, asset: string): PricePoint | null;
  sample(source: PriceSource, asset: string, fromMs: number, toMs: number, stepMs: number): number[];
  size(source: PriceSource, asset: string): number;
}

interface Series {
  ts: number[];
  px: number[];
}

/**
 * Index of the first element strictly greater than `target`
 * (number of elements <= target).
 */
export function upperBound(sorted: readonly number[], target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/** Index of the first element >= `target` */
function lowerBound(sorted: readonly number[], target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export class PriceSeriesCache implements PriceSeriesWriter, PriceSeriesReader {
  private readonly series = new Map<string, Series>();

  constructor(private readonly maxAgeMs: number = 30 * 60 * 1000) {}

  private static key(source: PriceSource, asset: string): string {
    return `${source}:${asset}`;
  }

  add(source: PriceSource, asset: string, timestampMs: number, price: number): void {
    const key = PriceSeriesCache.key(source, asset);
    let s = this.series.get(key);
    if (!s) {
      s = { ts: [], px: [] };
      this.series.set(key, s);
    }

    const n = s.ts.length;
    if (n === 0 || timestampMs >= s.ts[n - 1]) {
      s.ts.push(timestampMs);
      s.px.push(price);
    } else {
      // Late arrival: goes after any points sharing its timestamp
      const i = upperBound(s.ts, timestampMs);
      s.ts.splice(i, 0, timestampMs);
      s.px.splice(i, 0, price);
    }

    const cutoff = s.ts[s.ts.length - 1] - this.maxAgeMs;
    const stale = lowerBound(s.ts, cutoff);
    if (stale > 0) {
      s.ts.splice(0, stale);
      s.px.splice(0, stale);
    }
  }

  asOf(source: PriceSource, asset: string, timestampMs: number): PricePoint | null {
    const s = this.series.get(PriceSeriesCache.key(source, asset));
    if (!s || s.ts.length === 0) return null;

    const i = upperBound(s.ts, timestampMs) - 1;
    if (i < 0) return null;

    return { timestamp: s.ts[i], price: s.px[i] };
  }

  latest(source: PriceSource, asset: string): PricePoint | null {
    const s = this.series.get(PriceSeriesCache.key(source, asset));
    if (!s || s.ts.length === 0) return null;

    const last = s.ts.length - 1;
    return { timestamp: s.ts[last], price: s.px[last] };
  }

  /**
   * As-of prices on a fixed grid from `fromMs` to `toMs` inclusive.
   * Grid points with no value at or before them are skipped.
   */
  sample(source: PriceSource, asset: string, fromMs: number, toMs: number, stepMs: number): number[] {
    if (stepMs <= 0 || toMs < fromMs) return [];

    const out: number[] = [];
    for (let t = fromMs; t <= toMs; t += stepMs) {
      const point = this.asOf(source, asset, t);
      if (point) out.push(point.price);
    }
    return out;
  }

  size(source: PriceSource, asset: string): number {
    return this.series.get(PriceSeriesCache.key(source, asset))?.ts.length ?? 0;
  }

  /** Every (source, asset) pair with at least one point */
  keys(): Array<{ source: PriceSource; asset: string; size: number }> {
    const out: Array<{ source: PriceSource; asset: string; size: number }> = [];
    for (const [key, s] of this.series) {
      const sep = key.indexOf(':');
      const source = key.slice(0, sep);
      if (source !== 'cl' && source !== 'bn') continue;
      out.push({ source, asset: key.slice(sep + 1), size: s.ts.length });
    }
    return out;
  }
}
