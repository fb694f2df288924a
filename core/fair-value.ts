/**
 * Fair Value Calculator
 *
 * Lognormal fair value for 15-minute up/down markets settled on the oracle:
 *   z = ln(S/K) / (σ_min · √m)
 *   P(UP) = Φ(z)
 *
 * where S is the current oracle price, K the oracle price at window open,
 * σ_min the per-minute vol and m the minutes left. No drift term and no
 * smile/kurtosis adjustment.
 */

import {
  FairValueOutcome,
  Misprice,
  Signal,
  FairValueResult,
  TopOfBook,
} from './types';

export const DEFAULT_SIGMA_FLOOR = 0.001;
export const DEFAULT_MIN_EDGE = 0.05;

// =============================================================================
// MATH UTILITIES
// =============================================================================

/**
 * Standard normal CDF approximation (Abramowitz & Stegun 7.1.26)
 * Accurate to ~1e-7
 */
export function normalCDF(x: number): number {
  if (x === Infinity) return 1;
  if (x === -Infinity) return 0;
  if (x === 0) return 0.5;

  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  const absX = Math.abs(x) / Math.SQRT2;

  const t = 1.0 / (1.0 + p * absX);
  const y = 1.0 - (((((a5 * t + a4) * t) + a3) * t + a2) * t + a1) * t * Math.exp(-absX * absX);

  return 0.5 * (1.0 + sign * y);
}

function isPositivePrice(x: number): boolean {
  return Number.isFinite(x) && x > 0;
}

// =============================================================================
// FAIR VALUE
// =============================================================================

/**
 * Probability that the market settles UP.
 *
 * @param currentPrice - Latest oracle price
 * @param strikePrice - Oracle price at window open
 * @param volatilityPerMinute - Std-dev of one-minute log returns
 * @param minutesRemaining - Until the window closes
 * @param sigmaFloor - Lower bound for σ√m
 */
export function fairValue(
  currentPrice: number,
  strikePrice: number,
  volatilityPerMinute: number,
  minutesRemaining: number,
  sigmaFloor: number = DEFAULT_SIGMA_FLOOR,
): FairValueOutcome {
  if (!isPositivePrice(currentPrice) || !isPositivePrice(strikePrice)) {
    return { ok: false, error: 'invalid_price' };
  }

  const logDistance = Math.log(currentPrice / strikePrice);

  // Expired: settle on where the oracle is now, no blending
  if (!(minutesRemaining > 0)) {
    const up = currentPrice > strikePrice;
    return {
      ok: true,
      value: {
        fairYes: up ? 1 : 0,
        fairNo: up ? 0 : 1,
        zScore: up ? Infinity : -Infinity,
        logDistance,
        sigmaRemaining: 0,
      },
    };
  }

  const rawSigma = volatilityPerMinute * Math.sqrt(minutesRemaining);
  const sigmaRemaining = Number.isFinite(rawSigma) && rawSigma > sigmaFloor ? rawSigma : sigmaFloor;

  const zScore = logDistance / sigmaRemaining;
  const fairYes = normalCDF(zScore);

  return {
    ok: true,
    value: {
      fairYes,
      fairNo: 1 - fairYes,
      zScore,
      logDistance,
      sigmaRemaining,
    },
  };
}

// =============================================================================
// MISPRICE DETECTION
// =============================================================================

/**
 * Flag a gap between the market's YES price and the model.
 * Returns null below `minEdge` or for a market price outside [0, 1].
 */
export function findMisprice(
  marketPriceYes: number,
  fairValueYes: number,
  minEdge: number = DEFAULT_MIN_EDGE,
): Misprice | null {
  if (!Number.isFinite(marketPriceYes) || marketPriceYes < 0 || marketPriceYes > 1) {
    return null;
  }
  if (!Number.isFinite(fairValueYes)) return null;

  const edge = Math.abs(marketPriceYes - fairValueYes);
  if (edge < minEdge) return null;

  if (marketPriceYes > fairValueYes) {
    return {
      type: 'overpriced_yes',
      action: 'short_yes',
      marketPrice: marketPriceYes,
      fairValue: fairValueYes,
      edge,
    };
  }

  return {
    type: 'underpriced_yes',
    action: 'long_yes',
    marketPrice: marketPriceYes,
    fairValue: fairValueYes,
    edge,
  };
}

// =============================================================================
// SIGNALS
// =============================================================================

/**
 * Turn a misprice into a signal.
 * Longs enter at the best ask, shorts at the best bid; confidence is the
 * model probability of the side taken.
 */
export function buildSignal(
  marketId: string,
  misprice: Misprice | null,
  quote: TopOfBook,
  fair: FairValueResult,
  now: number = Date.now(),
): Signal {
  if (!misprice) {
    const none: Signal = {
      marketId,
      action: 'none',
      entryPrice: quote.midPrice,
      edge: 0,
      confidence: 0,
      createdAt: now,
    };
    return Object.freeze(none);
  }

  const long = misprice.type === 'underpriced_yes';
  const signal: Signal = {
    marketId,
    action: long ? 'long' : 'short',
    entryPrice: long ? quote.askPrice : quote.bidPrice,
    edge: misprice.edge,
    confidence: long ? fair.fairYes : fair.fairNo,
    createdAt: now,
  };
  return Object.freeze(signal);
}

/**
 * Format fair value for logging
 */
export function formatFairValue(fv: FairValueResult, currentPrice: number, strikePrice: number): string {
  const pctFromStrike = ((currentPrice - strikePrice) / strikePrice * 100).toFixed(3);
  return `z=${fv.zScore.toFixed(2)} | σ√m=${(fv.sigmaRemaining * 100).toFixed(3)}% | P(UP)=${(fv.fairYes * 100).toFixed(1)}% | price ${pctFromStrike}% from strike`;
}
