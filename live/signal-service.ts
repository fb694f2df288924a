/**
 * Signal Service
 *
 * Prices one active market from the oracle cache and its order book:
 *   strike  = oracle price as of window start
 *   current = oracle price as of now
 *   vol     = std-dev of one-minute log returns over the lookback
 *   market  = top-of-book mid of the UP token, both sides quoted
 */

import { FairValueResult, MarketWindow, Misprice, PriceSource, Signal } from '../core/types';
import { PriceSeriesReader } from '../core/price-series-cache';
import { OrderBook } from '../core/order-book';
import { buildSignal, fairValue, findMisprice } from '../core/fair-value';
import { estimateVolatility } from '../core/vol-calculator';

const MINUTE_MS = 60_000;

export interface SignalServiceOptions {
  minEdge: number;
  sigmaFloor: number;
  defaultVolatility: number;
  volLookbackMinutes: number;
  source?: PriceSource;  // Series the strike settles on, 'cl' unless overridden
}

export type SignalSkipReason =
  | 'unknown_asset'
  | 'not_started'
  | 'no_strike'
  | 'no_price'
  | 'invalid_price'
  | 'empty_book'
  | 'one_sided_book';

export interface PricedSignal {
  ok: true;
  signal: Signal;
  misprice: Misprice | null;
  fair: FairValueResult;
  strike: number;
  current: number;
  volatility: number;
  marketPrice: number;
  minutesRemaining: number;
}

export type SignalEvaluation = PricedSignal | { ok: false; reason: SignalSkipReason };

export class SignalService {
  private readonly source: PriceSource;

  constructor(
    private readonly prices: PriceSeriesReader,
    private readonly options: SignalServiceOptions,
  ) {
    this.source = options.source ?? 'cl';
  }

  evaluate(window: MarketWindow, book: OrderBook, now: number = Date.now()): SignalEvaluation {
    if (window.asset === 'unknown') return { ok: false, reason: 'unknown_asset' };

    const startMs = window.startTime.getTime();
    if (now < startMs) return { ok: false, reason: 'not_started' };

    const strike = this.prices.asOf(this.source, window.asset, startMs);
    if (!strike) return { ok: false, reason: 'no_strike' };

    const current = this.prices.asOf(this.source, window.asset, now);
    if (!current) return { ok: false, reason: 'no_price' };

    const history = this.prices.sample(
      this.source,
      window.asset,
      now - this.options.volLookbackMinutes * MINUTE_MS,
      now,
      MINUTE_MS,
    );
    const volatility = estimateVolatility(history, this.options.defaultVolatility);

    const minutesRemaining = (window.endTime.getTime() - now) / MINUTE_MS;
    const outcome = fairValue(current.price, strike.price, volatility, minutesRemaining, this.options.sigmaFloor);
    if (!outcome.ok) return { ok: false, reason: 'invalid_price' };

    if (book.isEmpty()) return { ok: false, reason: 'empty_book' };
    // The 0.5 fill of a missing side is for persisted rows only
    if (!book.bestBid() || !book.bestAsk()) return { ok: false, reason: 'one_sided_book' };

    const quote = book.topOfBook();
    const misprice = findMisprice(quote.midPrice, outcome.value.fairYes, this.options.minEdge);

    return {
      ok: true,
      signal: buildSignal(window.marketId, misprice, quote, outcome.value, now),
      misprice,
      fair: outcome.value,
      strike: strike.price,
      current: current.price,
      volatility,
      marketPrice: quote.midPrice,
      minutesRemaining,
    };
  }
}
