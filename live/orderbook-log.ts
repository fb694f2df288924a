/**
 * Order Book Log
 *
 * Append-only CSV of top-of-book rows, one file per market under
 * <dataDir>/live/<marketId>.csv. The header is written once, when the file
 * is new or empty; restarts keep appending to the same file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TopOfBook } from '../core/types';
import { createLogger, Logger, safeErrorData } from '../core/logger';

export const BOOK_LOG_COLUMNS = [
  'timestamp_ms',
  'timestamp_iso',
  'bid_price_1',
  'bid_size_1',
  'ask_price_1',
  'ask_size_1',
  'spread',
  'mid_price',
  'market_id',
] as const;

export const BOOK_LOG_HEADER = BOOK_LOG_COLUMNS.join(',');

export interface BookRow {
  timestampMs: number;
  marketId: string;
  top: TopOfBook;
}

/** Where handled book updates end up */
export interface BookRowSink {
  append(row: BookRow): void;
}

export function formatBookRow(row: BookRow): string {
  const { top } = row;
  return [
    row.timestampMs,
    new Date(row.timestampMs).toISOString(),
    top.bidPrice,
    top.bidSize,
    top.askPrice,
    top.askSize,
    top.spread,
    top.midPrice,
    row.marketId,
  ].join(',');
}

/** File name safe form of a market id */
export function bookLogPath(dir: string, marketId: string): string {
  return path.join(dir, `${marketId.replace(/[^A-Za-z0-9_-]/g, '_')}.csv`);
}

export class OrderBookLog implements BookRowSink {
  private rows = 0;
  private failures = 0;
  private closed = false;
  private log: Logger;

  constructor(readonly filePath: string) {
    this.log = createLogger('OrderBookLog', { file: path.basename(filePath) });

    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const isNew = !fs.existsSync(filePath) || fs.statSync(filePath).size === 0;
    if (isNew) {
      fs.appendFileSync(filePath, `${BOOK_LOG_HEADER}\n`);
    }
  }

  append(row: BookRow): void {
    if (this.closed) return;

    try {
      fs.appendFileSync(this.filePath, `${formatBookRow(row)}\n`);
      this.rows++;
    } catch (err) {
      this.failures++;
      this.log.error('log.append_failed', { ...safeErrorData(err), failures: this.failures });
    }
  }

  rowsWritten(): number {
    return this.rows;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.log.debug('log.closed', { rows: this.rows, failures: this.failures });
  }
}
