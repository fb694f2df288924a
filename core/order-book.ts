/**
 * Order Book
 *
 * Top-N bid/ask levels for one token, rebuilt from full snapshots.
 * Each snapshot produces a new frozen level set that replaces the old one
 * in a single assignment, so a reader sees either the previous book or the
 * next one, never a mix.
 */

import { BookLevel, BookSnapshot, TopOfBook } from './types';

const EMPTY_BOOK: BookSnapshot = Object.freeze({
  bids: Object.freeze([]),
  asks: Object.freeze([]),
});

/** Prices recorded for a missing side in persisted rows */
export const EMPTY_SIDE_PRICE = 0.5;

function round6(x: number): number {
  return Math.round(x * 1e6) / 1e6;
}

/**
 * Collapse duplicate prices (last one wins), drop non-finite levels,
 * sort and keep the best `levels` entries.
 */
function normalizeSide(
  input: readonly BookLevel[],
  levels: number,
  descending: boolean,
): readonly BookLevel[] {
  const byPrice = new Map<number, number>();
  for (const { price, size } of input) {
    if (!Number.isFinite(price) || !Number.isFinite(size)) continue;
    byPrice.set(price, size);
  }

  const sorted = Array.from(byPrice, ([price, size]) => ({ price, size }))
    .sort((a, b) => (descending ? b.price - a.price : a.price - b.price))
    .slice(0, levels);

  return Object.freeze(sorted.map(level => Object.freeze(level)));
}

export class OrderBook {
  private book: BookSnapshot = EMPTY_BOOK;
  private updatedAt = 0;

  constructor(
    readonly tokenId: string,
    private readonly levels: number = 5,
  ) {}

  /**
   * Replace the whole level set.
   * Bids end up highest first, asks lowest first, each at most `levels` long.
   */
  applySnapshot(bids: readonly BookLevel[], asks: readonly BookLevel[], timestamp: number = Date.now()): void {
    const next: BookSnapshot = Object.freeze({
      bids: normalizeSide(bids, this.levels, true),
      asks: normalizeSide(asks, this.levels, false),
    });
    this.book = next;
    this.updatedAt = timestamp;
  }

  snapshot(): BookSnapshot {
    return this.book;
  }

  bestBid(): BookLevel | null {
    return this.book.bids[0] ?? null;
  }

  bestAsk(): BookLevel | null {
    return this.book.asks[0] ?? null;
  }

  lastUpdate(): number {
    return this.updatedAt;
  }

  isEmpty(): boolean {
    return this.book.bids.length === 0 && this.book.asks.length === 0;
  }

  /**
   * Top-of-book summary as persisted per update.
   * A missing side is reported at 0.5 with zero size.
   */
  topOfBook(): TopOfBook {
    const { bids, asks } = this.book;
    const bidPrice = bids[0]?.price ?? EMPTY_SIDE_PRICE;
    const bidSize = bids[0]?.size ?? 0;
    const askPrice = asks[0]?.price ?? EMPTY_SIDE_PRICE;
    const askSize = asks[0]?.size ?? 0;

    return {
      bidPrice,
      bidSize,
      askPrice,
      askSize,
      spread: round6(askPrice - bidPrice),
      midPrice: round6((bidPrice + askPrice) / 2),
    };
  }
}
