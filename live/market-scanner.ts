/**
 * Market Window Scanner
 * Finds 15-minute up/down markets on the Gamma catalog.
 *
 * API Flow:
 * 1. GET /events?order=id&ascending=false&closed=false&limit=N&offset=K
 *    page by page until an empty page or the page cap
 * 2. Keep events in a series with recurrence "15m" whose start time
 *    lies within now ± horizon
 * 3. Take the first market of each event for token ids
 */

import axios from 'axios';
import { Asset, KNOWN_ASSETS, MarketWindow, WINDOW_DURATION_MS } from '../core/types';
import { createLogger, safeErrorData } from '../core/logger';
import { JsonRecord, getArray, getId, getString, isRecord, tryParseJson } from './payload';

const log = createLogger('MarketScanner', { mode: 'live' });

export interface ScannerOptions {
  gammaUrl: string;
  horizonSec: number;
  pageSize: number;
  maxPages: number;
  requestTimeoutMs: number;
}

/** Anything the coordinator can pull fresh windows from */
export interface WindowSource {
  scan(now?: number): Promise<MarketWindow[]>;
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Traded asset from slug prefix ("btc-updown-15m-...") or tag slugs.
 */
export function extractAsset(event: JsonRecord): Asset | 'unknown' {
  const slug = (getString(event, 'slug') ?? '').toLowerCase();
  for (const asset of KNOWN_ASSETS) {
    if (slug.startsWith(`${asset}-`)) return asset;
  }

  for (const tag of getArray(event, 'tags')) {
    if (!isRecord(tag)) continue;
    const tagSlug = (getString(tag, 'slug') ?? '').toLowerCase();
    const match = KNOWN_ASSETS.find(asset => asset === tagSlug);
    if (match) return match;
  }

  return 'unknown';
}

/**
 * [UP, DOWN] token ids from a market's clobTokenIds JSON string.
 */
export function parseTokenPair(market: JsonRecord): [string, string] | null {
  const raw = market.clobTokenIds;
  const ids = typeof raw === 'string' ? tryParseJson(raw) : raw;
  if (!Array.isArray(ids) || ids.length < 2) return null;

  const [up, down] = ids;
  if ((typeof up !== 'string' && typeof up !== 'number') || (typeof down !== 'string' && typeof down !== 'number')) {
    return null;
  }
  return [String(up), String(down)];
}

function isFifteenMinuteSeries(event: JsonRecord): boolean {
  return getArray(event, 'series').some(s => isRecord(s) && s.recurrence === '15m');
}

function parseStartMs(event: JsonRecord, market: JsonRecord | undefined): number | null {
  const raw = getString(event, 'eventStartTime')
    ?? getString(event, 'startTime')
    ?? (market ? getString(market, 'eventStartTime') : undefined);
  if (!raw) return null;

  const ms = Date.parse(raw);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Build a MarketWindow from a catalog event, or null when the event is not
 * a 15-minute market, starts outside [loMs, hiMs], or lacks token ids.
 */
export function parseEventWindow(event: unknown, loMs: number, hiMs: number): MarketWindow | null {
  if (!isRecord(event) || !isFifteenMinuteSeries(event)) return null;

  const market = getArray(event, 'markets').find(isRecord);
  const startMs = parseStartMs(event, market);
  if (startMs === null || startMs < loMs || startMs > hiMs) return null;

  if (!market) return null;
  const tokenIds = parseTokenPair(market);
  if (!tokenIds) return null;

  const marketId = getId(market, 'id') ?? getId(event, 'id');
  if (!marketId) return null;

  return {
    marketId,
    conditionId: getString(market, 'conditionId') ?? '',
    slug: getString(event, 'slug') ?? '',
    asset: extractAsset(event),
    tokenIds,
    startTime: new Date(startMs),
    endTime: new Date(startMs + WINDOW_DURATION_MS),
  };
}

// =============================================================================
// SCANNER
// =============================================================================

export class MarketWindowScanner implements WindowSource {
  private lastResultKey = '';

  constructor(private readonly options: ScannerOptions) {}

  /**
   * Page through the catalog and collect windows starting within now ± horizon.
   * A failed page is logged and skipped; paging stops at the first empty page
   * or after `maxPages`.
   */
  async scan(now: number = Date.now()): Promise<MarketWindow[]> {
    const { horizonSec, pageSize, maxPages } = this.options;
    const lo = now - horizonSec * 1000;
    const hi = now + horizonSec * 1000;

    const found = new Map<string, MarketWindow>();
    let failedPages = 0;
    let pagesRead = 0;

    for (let page = 0; page < maxPages; page++) {
      const offset = page * pageSize;

      let events: unknown[];
      try {
        events = await this.fetchPage(offset);
      } catch (err) {
        failedPages++;
        log.warn('scan.page_failed', { ...safeErrorData(err), page, offset });
        continue;
      }

      pagesRead++;
      if (events.length === 0) break;

      for (const event of events) {
        const parsed = parseEventWindow(event, lo, hi);
        if (parsed) found.set(parsed.marketId, parsed);
      }
    }

    const windows = Array.from(found.values())
      .sort((a, b) => a.startTime.getTime() - b.startTime.getTime());

    // Only log at INFO when the result set changed
    const resultKey = windows.map(w => w.marketId).join(',');
    if (resultKey !== this.lastResultKey) {
      this.lastResultKey = resultKey;
      log.info('scan.result_changed', {
        count: windows.length,
        pagesRead,
        failedPages,
        next: windows.slice(0, 3).map(w => ({ slug: w.slug, asset: w.asset, start: w.startTime.toISOString() })),
      });
    } else {
      log.debug('scan.result_unchanged', { count: windows.length, pagesRead, failedPages });
    }

    return windows;
  }

  private async fetchPage(offset: number): Promise<unknown[]> {
    const response = await axios.get<unknown>(`${this.options.gammaUrl}/events`, {
      params: {
        order: 'id',
        ascending: 'false',
        limit: this.options.pageSize,
        offset,
        closed: 'false',
      },
      timeout: this.options.requestTimeoutMs,
    });

    if (!Array.isArray(response.data)) {
      throw new Error(`unexpected events payload at offset ${offset}`);
    }
    return response.data;
  }
}
