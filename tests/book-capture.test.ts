import { describe, it, expect, beforeEach } from 'vitest';
import { BookCaptureHandler, validateBookEvent } from '../live/book-capture';
import { BookRow, BookRowSink } from '../live/orderbook-log';
import { OrderBook } from '../core/order-book';

class MemorySink implements BookRowSink {
  rows: BookRow[] = [];
  append(row: BookRow): void {
    this.rows.push(row);
  }
}

function bookEvent(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    event_type: 'book',
    asset_id: 'tok-up',
    market: '0xcond',
    timestamp: '1700000000000',
    bids: [{ price: '0.48', size: '100' }, { price: '0.47', size: '50' }],
    asks: [{ price: '0.52', size: '80' }],
    ...overrides,
  };
}

describe('validateBookEvent', () => {
  it('parses string levels and the timestamp', () => {
    expect(validateBookEvent(bookEvent())).toEqual({
      ok: true,
      timestamp: 1700000000000,
      bids: [{ price: 0.48, size: 100 }, { price: 0.47, size: 50 }],
      asks: [{ price: 0.52, size: 80 }],
    });
  });

  it('accepts [price, size] pairs', () => {
    const check = validateBookEvent(bookEvent({ bids: [['0.4', '10']], asks: [[0.6, 5]] }));
    expect(check).toEqual({
      ok: true,
      timestamp: 1700000000000,
      bids: [{ price: 0.4, size: 10 }],
      asks: [{ price: 0.6, size: 5 }],
    });
  });

  it('rejects missing fields and out-of-range levels', () => {
    expect(validateBookEvent(bookEvent({ timestamp: undefined }))).toEqual({ ok: false, error: 'missing field: timestamp' });
    expect(validateBookEvent(bookEvent({ timestamp: 'soon' }))).toEqual({ ok: false, error: 'timestamp not numeric' });
    expect(validateBookEvent(bookEvent({ bids: 'none' }))).toEqual({ ok: false, error: 'bids/asks not arrays' });
    expect(validateBookEvent(bookEvent({ asks: [{ price: '1.2', size: '1' }] })))
      .toEqual({ ok: false, error: 'ask level 0: price 1.2 outside (0, 1)' });
    expect(validateBookEvent(bookEvent({ bids: [{ price: '0.4', size: '0' }] })))
      .toEqual({ ok: false, error: 'bid level 0: size 0 not positive' });
    expect(validateBookEvent(bookEvent({ bids: [{ price: 'abc', size: '1' }] })))
      .toEqual({ ok: false, error: 'bid level 0: malformed' });
  });
});

describe('BookCaptureHandler', () => {
  let book: OrderBook;
  let sink: MemorySink;
  let handler: BookCaptureHandler;

  beforeEach(() => {
    book = new OrderBook('tok-up', 5);
    sink = new MemorySink();
    handler = new BookCaptureHandler('m1', book, sink);
  });

  it('applies a valid snapshot and appends one row', () => {
    handler.handle(bookEvent());

    expect(book.bestBid()).toEqual({ price: 0.48, size: 100 });
    expect(book.lastUpdate()).toBe(1700000000000);
    expect(sink.rows).toHaveLength(1);

    const row = sink.rows[0];
    expect(row.timestampMs).toBe(1700000000000);
    expect(row.marketId).toBe('m1');
    expect(row.top.bidPrice).toBe(0.48);
    expect(row.top.bidSize).toBe(100);
    expect(row.top.askPrice).toBe(0.52);
    expect(row.top.askSize).toBe(80);
    expect(row.top.spread).toBeCloseTo(0.04, 6);
    expect(row.top.midPrice).toBeCloseTo(0.5, 6);

    expect(handler.getStats()).toEqual({
      totalUpdates: 1,
      validUpdates: 1,
      invalidUpdates: 0,
      ignoredEvents: 0,
      recentErrors: [],
    });
  });

  it('rejects an invalid update without touching the book', () => {
    handler.handle(bookEvent({ asks: [{ price: '1.2', size: '1' }] }));

    expect(book.isEmpty()).toBe(true);
    expect(sink.rows).toHaveLength(0);
    expect(handler.getStats()).toMatchObject({
      totalUpdates: 1,
      validUpdates: 0,
      invalidUpdates: 1,
      recentErrors: ['ask level 0: price 1.2 outside (0, 1)'],
    });
  });

  it('ignores other event types and other tokens', () => {
    handler.handle({ event_type: 'price_change', asset_id: 'tok-up' });
    handler.handle(bookEvent({ asset_id: 'tok-down' }));
    handler.handle({ event_type: 'tick_size_change' });

    expect(sink.rows).toHaveLength(0);
    expect(handler.getStats()).toMatchObject({ totalUpdates: 0, ignoredEvents: 3 });
  });

  it('keeps only the last ten validation errors', () => {
    for (let i = 0; i < 12; i++) {
      handler.handle(bookEvent({ bids: [{ price: '0.4', size: String(-i) }] }));
    }

    const stats = handler.getStats();
    expect(stats.invalidUpdates).toBe(12);
    expect(stats.recentErrors).toHaveLength(10);
    expect(stats.recentErrors[0]).toBe('bid level 0: size -2 not positive');
    expect(stats.recentErrors[9]).toBe('bid level 0: size -11 not positive');
  });

  it('returns a copy of its stats', () => {
    handler.handle(bookEvent({ timestamp: undefined }));
    const stats = handler.getStats();
    stats.recentErrors.push('tampered');

    expect(handler.getStats().recentErrors).toEqual(['missing field: timestamp']);
  });
});
