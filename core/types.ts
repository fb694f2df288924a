/**
 * Up/Down Capture - Types
 */

// =============================================================================
// ORACLE SERIES
// =============================================================================

/** Feed tag a price series is keyed by: Chainlink oracle topic or spot exchange topic */
export type PriceSource = 'cl' | 'bn';

export const KNOWN_ASSETS = ['btc', 'eth', 'sol', 'xrp'] as const;
export type Asset = typeof KNOWN_ASSETS[number];

export function isKnownAsset(value: string): value is Asset {
  return KNOWN_ASSETS.some(asset => asset === value);
}

export interface PricePoint {
  timestamp: number;  // ms since epoch, as reported by the feed
  price: number;
}

// =============================================================================
// ORDER BOOK
// =============================================================================

export interface BookLevel {
  price: number;
  size: number;
}

export interface BookSnapshot {
  readonly bids: readonly BookLevel[];  // best (highest) first
  readonly asks: readonly BookLevel[];  // best (lowest) first
}

export interface TopOfBook {
  bidPrice: number;
  bidSize: number;
  askPrice: number;
  askSize: number;
  spread: number;
  midPrice: number;
}

// =============================================================================
// MARKETS
// =============================================================================

export const WINDOW_DURATION_MS = 15 * 60 * 1000;

export interface MarketWindow {
  marketId: string;
  conditionId: string;
  slug: string;
  asset: Asset | 'unknown';
  tokenIds: [string, string];  // [UP, DOWN]
  startTime: Date;             // Strike is the oracle price at this instant
  endTime: Date;               // startTime + 15 minutes
}

// =============================================================================
// PRICING
// =============================================================================

export interface FairValueResult {
  fairYes: number;
  fairNo: number;
  zScore: number;
  logDistance: number;     // ln(current / strike)
  sigmaRemaining: number;  // σ√m after flooring
}

export type FairValueError = 'invalid_price';

export type FairValueOutcome =
  | { ok: true; value: FairValueResult }
  | { ok: false; error: FairValueError };

export type MispriceType = 'overpriced_yes' | 'underpriced_yes';

export interface Misprice {
  type: MispriceType;
  action: 'short_yes' | 'long_yes';
  marketPrice: number;
  fairValue: number;
  edge: number;
}

// =============================================================================
// SIGNALS
// =============================================================================

export type SignalAction = 'long' | 'short' | 'none';

export interface Signal {
  readonly marketId: string;
  readonly action: SignalAction;
  readonly entryPrice: number;
  readonly edge: number;
  readonly confidence: number;  // 0-1
  readonly createdAt: number;
}
