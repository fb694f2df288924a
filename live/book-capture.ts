/**
 * Book Capture Handler
 *
 * Validates raw book events for one token, applies them to its OrderBook and
 * appends a top-of-book row per accepted snapshot.
 *
 * Validation (whole update rejected on any failure):
 * - event_type "book" with asset_id, timestamp, bids and asks present
 * - every level 0 < price < 1 and size > 0
 *
 * Other event types (price_change, last_trade_price, tick_size_change)
 * and events for other tokens are counted as ignored.
 */

import { BookLevel } from '../core/types';
import { OrderBook } from '../core/order-book';
import { createLogger, rateLimitedLog, Logger } from '../core/logger';
import { BookRowSink } from './orderbook-log';
import { JsonRecord, getArray, getNumber, getString, isRecord, toNumber } from './payload';

const MAX_RECENT_ERRORS = 10;

export interface CaptureStats {
  totalUpdates: number;
  validUpdates: number;
  invalidUpdates: number;
  ignoredEvents: number;
  recentErrors: string[];
}

export type BookEventCheck =
  | { ok: true; timestamp: number; bids: BookLevel[]; asks: BookLevel[] }
  | { ok: false; error: string };

/** Accepts {price, size} objects or [price, size] pairs, numbers or numeric strings */
function parseLevel(raw: unknown): BookLevel | null {
  let price: number | undefined;
  let size: number | undefined;

  if (isRecord(raw)) {
    price = getNumber(raw, 'price');
    size = getNumber(raw, 'size');
  } else if (Array.isArray(raw) && raw.length >= 2) {
    price = toNumber(raw[0]);
    size = toNumber(raw[1]);
  }

  if (price === undefined || size === undefined) return null;
  return { price, size };
}

function parseSide(raw: unknown[], side: 'bid' | 'ask'): BookLevel[] | string {
  const levels: BookLevel[] = [];
  for (let i = 0; i < raw.length; i++) {
    const level = parseLevel(raw[i]);
    if (!level) return `${side} level ${i}: malformed`;
    if (level.price <= 0 || level.price >= 1) return `${side} level ${i}: price ${level.price} outside (0, 1)`;
    if (level.size <= 0) return `${side} level ${i}: size ${level.size} not positive`;
    levels.push(level);
  }
  return levels;
}

/**
 * Check a "book" event. Caller has already matched event_type and asset.
 */
export function validateBookEvent(event: JsonRecord): BookEventCheck {
  for (const field of ['asset_id', 'timestamp', 'bids', 'asks']) {
    if (event[field] === undefined || event[field] === null) {
      return { ok: false, error: `missing field: ${field}` };
    }
  }

  const timestamp = getNumber(event, 'timestamp');
  if (timestamp === undefined) return { ok: false, error: 'timestamp not numeric' };

  if (!Array.isArray(event.bids) || !Array.isArray(event.asks)) {
    return { ok: false, error: 'bids/asks not arrays' };
  }

  const bids = parseSide(getArray(event, 'bids'), 'bid');
  if (typeof bids === 'string') return { ok: false, error: bids };
  const asks = parseSide(getArray(event, 'asks'), 'ask');
  if (typeof asks === 'string') return { ok: false, error: asks };

  return { ok: true, timestamp: Math.trunc(timestamp), bids, asks };
}

export class BookCaptureHandler {
  private stats: CaptureStats = {
    totalUpdates: 0,
    validUpdates: 0,
    invalidUpdates: 0,
    ignoredEvents: 0,
    recentErrors: [],
  };
  private log: Logger;

  constructor(
    readonly marketId: string,
    readonly book: OrderBook,
    private readonly sink: BookRowSink,
  ) {
    this.log = createLogger('BookCapture', { marketId });
  }

  /** Bound so it can be handed to a listener directly */
  handle = (event: JsonRecord): void => {
    const type = getString(event, 'event_type');
    const assetId = getString(event, 'asset_id');

    if (type !== 'book' || (assetId !== undefined && assetId !== this.book.tokenId)) {
      this.stats.ignoredEvents++;
      return;
    }

    this.stats.totalUpdates++;
    const check = validateBookEvent(event);
    if (!check.ok) {
      this.recordError(check.error);
      return;
    }

    this.stats.validUpdates++;
    this.book.applySnapshot(check.bids, check.asks, check.timestamp);
    this.sink.append({
      timestampMs: check.timestamp,
      marketId: this.marketId,
      top: this.book.topOfBook(),
    });
  };

  getStats(): CaptureStats {
    return { ...this.stats, recentErrors: [...this.stats.recentErrors] };
  }

  private recordError(error: string): void {
    this.stats.invalidUpdates++;
    this.stats.recentErrors.push(error);
    if (this.stats.recentErrors.length > MAX_RECENT_ERRORS) {
      this.stats.recentErrors.shift();
    }
    rateLimitedLog(this.log, 'warn', `book_invalid:${this.marketId}`, 60_000, 'book.invalid_update', {
      error,
      invalid: this.stats.invalidUpdates,
    });
  }
}
