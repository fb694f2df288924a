/**
 * Append-only JSON-lines record of emitted signals.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MarketWindow } from '../core/types';
import { createLogger, safeErrorData } from '../core/logger';
import { PricedSignal } from './signal-service';

const log = createLogger('SignalLog');

export interface SignalRecord {
  marketId: string;
  slug: string;
  asset: string;
  action: string;
  entryPrice: number;
  edge: number;
  confidence: number;
  createdAt: number;
  createdAtIso: string;
  marketPrice: number;
  fairYes: number;
  strike: number;
  current: number;
  volatility: number;
  minutesRemaining: number;
}

export function toSignalRecord(window: MarketWindow, priced: PricedSignal): SignalRecord {
  const { signal } = priced;
  return {
    marketId: signal.marketId,
    slug: window.slug,
    asset: window.asset,
    action: signal.action,
    entryPrice: signal.entryPrice,
    edge: signal.edge,
    confidence: signal.confidence,
    createdAt: signal.createdAt,
    createdAtIso: new Date(signal.createdAt).toISOString(),
    marketPrice: priced.marketPrice,
    fairYes: priced.fair.fairYes,
    strike: priced.strike,
    current: priced.current,
    volatility: priced.volatility,
    minutesRemaining: priced.minutesRemaining,
  };
}

export class SignalLog {
  private written = 0;

  constructor(readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  /** Returns false when the line could not be written */
  append(record: SignalRecord): boolean {
    try {
      fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`);
      this.written++;
      return true;
    } catch (err) {
      log.error('signal.append_failed', { ...safeErrorData(err), marketId: record.marketId });
      return false;
    }
  }

  count(): number {
    return this.written;
  }
}
