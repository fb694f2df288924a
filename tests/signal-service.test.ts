import { describe, it, expect, beforeEach } from 'vitest';
import { PricedSignal, SignalEvaluation, SignalService } from '../live/signal-service';
import { PriceSeriesCache } from '../core/price-series-cache';
import { OrderBook } from '../core/order-book';
import { normalCDF } from '../core/fair-value';
import { MarketWindow, WINDOW_DURATION_MS } from '../core/types';

const START = Date.UTC(2026, 0, 1, 12, 0, 0);
const MINUTE = 60_000;

function makeWindow(overrides: Partial<MarketWindow> = {}): MarketWindow {
  return {
    marketId: 'm1',
    conditionId: '0xcond',
    slug: 'btc-updown-15m-1',
    asset: 'btc',
    tokenIds: ['tok-up', 'tok-down'],
    startTime: new Date(START),
    endTime: new Date(START + WINDOW_DURATION_MS),
    ...overrides,
  };
}

function expectPriced(result: SignalEvaluation): PricedSignal {
  if (!result.ok) throw new Error(`expected a signal, got ${result.reason}`);
  return result;
}

describe('SignalService', () => {
  let cache: PriceSeriesCache;
  let book: OrderBook;
  let service: SignalService;

  beforeEach(() => {
    cache = new PriceSeriesCache();
    book = new OrderBook('tok-up');
    service = new SignalService(cache, {
      minEdge: 0.05,
      sigmaFloor: 0.001,
      defaultVolatility: 0.01,
      volLookbackMinutes: 1,
    });
  });

  it('prices the window from strike, current price and book mid', () => {
    const now = START + 5 * MINUTE;
    cache.add('cl', 'btc', START - 5_000, 100);
    cache.add('cl', 'btc', now, 100.5);
    cache.add('bn', 'btc', now, 250);
    book.applySnapshot([{ price: 0.3, size: 10 }], [{ price: 0.34, size: 10 }]);

    const priced = expectPriced(service.evaluate(makeWindow(), book, now));
    const expectedYes = normalCDF(Math.log(1.005) / (0.01 * Math.sqrt(10)));

    expect(priced.strike).toBe(100);
    expect(priced.current).toBe(100.5);
    // One-minute lookback gives a single return: default vol
    expect(priced.volatility).toBe(0.01);
    expect(priced.minutesRemaining).toBe(10);
    expect(priced.marketPrice).toBeCloseTo(0.32, 10);
    expect(priced.fair.fairYes).toBeCloseTo(expectedYes, 12);
    expect(priced.misprice?.type).toBe('underpriced_yes');
    expect(priced.signal).toEqual({
      marketId: 'm1',
      action: 'long',
      entryPrice: 0.34,
      edge: priced.misprice?.edge,
      confidence: priced.fair.fairYes,
      createdAt: now,
    });
  });

  it('estimates volatility from one-minute samples over the lookback', () => {
    service = new SignalService(cache, {
      minEdge: 0.05,
      sigmaFloor: 0.001,
      defaultVolatility: 0.01,
      volLookbackMinutes: 3,
    });
    const now = START + 3 * MINUTE;
    cache.add('cl', 'btc', START, 100);
    cache.add('cl', 'btc', START + MINUTE, 110);
    cache.add('cl', 'btc', START + 2 * MINUTE, 100);
    cache.add('cl', 'btc', START + 3 * MINUTE, 110);
    book.applySnapshot([{ price: 0.45, size: 1 }], [{ price: 0.55, size: 1 }]);

    const priced = expectPriced(service.evaluate(makeWindow(), book, now));

    expect(priced.volatility).toBeCloseTo(Math.log(1.1) * Math.sqrt(4 / 3), 10);
  });

  it('emits a none signal when the market agrees with the model', () => {
    const now = START + MINUTE;
    cache.add('cl', 'btc', START - 1_000, 100);
    book.applySnapshot([{ price: 0.49, size: 1 }], [{ price: 0.51, size: 1 }]);

    const priced = expectPriced(service.evaluate(makeWindow(), book, now));

    expect(priced.current).toBe(100);
    expect(priced.misprice).toBeNull();
    expect(priced.signal.action).toBe('none');
    expect(priced.signal.entryPrice).toBeCloseTo(0.5, 10);
  });

  it('reports why a window cannot be priced yet', () => {
    book.applySnapshot([{ price: 0.49, size: 1 }], [{ price: 0.51, size: 1 }]);

    expect(service.evaluate(makeWindow({ asset: 'unknown' }), book, START + MINUTE))
      .toEqual({ ok: false, reason: 'unknown_asset' });
    expect(service.evaluate(makeWindow(), book, START - 1))
      .toEqual({ ok: false, reason: 'not_started' });

    cache.add('cl', 'btc', START + 1_000, 100);
    expect(service.evaluate(makeWindow(), book, START + MINUTE))
      .toEqual({ ok: false, reason: 'no_strike' });

    // Spot prices do not set the strike
    cache.add('bn', 'eth', START - 1_000, 3000);
    expect(service.evaluate(makeWindow({ asset: 'eth' }), book, START + MINUTE))
      .toEqual({ ok: false, reason: 'no_strike' });
  });

  it('needs a non-empty book', () => {
    cache.add('cl', 'btc', START - 1_000, 100);

    expect(service.evaluate(makeWindow(), new OrderBook('tok-up'), START + MINUTE))
      .toEqual({ ok: false, reason: 'empty_book' });
  });

  it('skips a book with one side missing', () => {
    cache.add('cl', 'btc', START - 1_000, 100);
    const now = START + MINUTE;

    book.applySnapshot([], [{ price: 0.9, size: 5 }]);
    expect(service.evaluate(makeWindow(), book, now))
      .toEqual({ ok: false, reason: 'one_sided_book' });

    book.applySnapshot([{ price: 0.1, size: 5 }], []);
    expect(service.evaluate(makeWindow(), book, now))
      .toEqual({ ok: false, reason: 'one_sided_book' });
  });
});
