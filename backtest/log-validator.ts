/**
 * Capture Log Validator
 *
 * Quality checks over a captured order-book CSV before it is used offline.
 *
 * | check            | PASS when                                   | else |
 * |------------------|---------------------------------------------|------|
 * | columns          | all required columns present                | FAIL |
 * | nulls            | non-numeric cells < 1% of rows              | FAIL |
 * | price_range      | > 90% of bids and of asks in (0, 1)         | FAIL |
 * | crossed          | bid > ask in < 5% of rows                   | FAIL |
 * | timestamps       | duplicate timestamps < 10% of rows          | FAIL |
 * | spread           | mean spread in (0.001, 0.5)                 | WARN |
 * | mid_price        | mean |mid − (bid+ask)/2| < 0.01             | WARN |
 *
 * A file passes when no check FAILs.
 */

import * as fs from 'fs';
import * as path from 'path';

export const REQUIRED_COLUMNS = ['timestamp_ms', 'bid_price_1', 'ask_price_1', 'spread', 'mid_price'] as const;
type RequiredColumn = typeof REQUIRED_COLUMNS[number];

export type CheckStatus = 'PASS' | 'FAIL' | 'WARN';

export interface CheckResult {
  name: string;
  status: CheckStatus;
  detail: string;
}

export interface LogValidationReport {
  file: string;
  rows: number;
  checks: CheckResult[];
  passed: boolean;
}

type Column = Array<number | null>;

function parseCell(cell: string | undefined): number | null {
  if (cell === undefined || cell.trim() === '') return null;
  const n = Number(cell);
  return Number.isFinite(n) ? n : null;
}

function present(values: Column): number[] {
  return values.filter((v): v is number => v !== null);
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? NaN : values.reduce((a, b) => a + b, 0) / values.length;
}

function pct(part: number, whole: number): string {
  return whole === 0 ? '0.0%' : `${((part / whole) * 100).toFixed(1)}%`;
}

/**
 * Validate CSV text. `file` is only used for labelling.
 */
export function validateBookLog(csv: string, file: string = '<memory>'): LogValidationReport {
  const lines = csv.split(/\r?\n/).filter(line => line.trim() !== '');
  const header = (lines[0] ?? '').split(',').map(h => h.trim());
  const body = lines.slice(1).map(line => line.split(','));
  const rows = body.length;
  const checks: CheckResult[] = [];

  const missing = REQUIRED_COLUMNS.filter(col => !header.includes(col));
  if (missing.length > 0) {
    checks.push({ name: 'columns', status: 'FAIL', detail: `missing: ${missing.join(', ')}` });
    return { file, rows, checks, passed: false };
  }
  checks.push({ name: 'columns', status: 'PASS', detail: 'all required columns present' });

  const column = (name: RequiredColumn): Column => {
    const idx = header.indexOf(name);
    return body.map(cells => parseCell(cells[idx]));
  };
  const ts = column('timestamp_ms');
  const bid = column('bid_price_1');
  const ask = column('ask_price_1');
  const spread = column('spread');
  const mid = column('mid_price');

  // Nulls
  const nulls = [ts, bid, ask, spread, mid].reduce((sum, col) => sum + col.filter(v => v === null).length, 0);
  checks.push({
    name: 'nulls',
    status: nulls < rows * 0.01 ? 'PASS' : 'FAIL',
    detail: `${nulls} empty or non-numeric cells`,
  });

  // Price range
  const inRange = (col: Column): number => present(col).filter(p => p > 0 && p < 1).length;
  const bidsOk = inRange(bid);
  const asksOk = inRange(ask);
  checks.push({
    name: 'price_range',
    status: bidsOk > rows * 0.9 && asksOk > rows * 0.9 ? 'PASS' : 'FAIL',
    detail: `bids ${pct(bidsOk, rows)}, asks ${pct(asksOk, rows)} in (0, 1)`,
  });

  // Crossed books
  let crossed = 0;
  for (let i = 0; i < rows; i++) {
    const b = bid[i];
    const a = ask[i];
    if (b !== null && b !== undefined && a !== null && a !== undefined && b > a) crossed++;
  }
  checks.push({
    name: 'crossed',
    status: crossed < rows * 0.05 ? 'PASS' : 'FAIL',
    detail: `${crossed} crossed rows (${pct(crossed, rows)})`,
  });

  // Duplicate timestamps (after sorting)
  const sorted = present(ts).sort((a, b) => a - b);
  let duplicates = 0;
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i] <= sorted[i - 1]) duplicates++;
  }
  checks.push({
    name: 'timestamps',
    status: duplicates < rows * 0.1 ? 'PASS' : 'FAIL',
    detail: `${duplicates} duplicate timestamps`,
  });

  // Spread sanity
  const avgSpread = mean(present(spread));
  checks.push({
    name: 'spread',
    status: avgSpread > 0.001 && avgSpread < 0.5 ? 'PASS' : 'WARN',
    detail: `mean spread ${Number.isNaN(avgSpread) ? 'n/a' : avgSpread.toFixed(4)}`,
  });

  // Mid consistency
  const midErrors: number[] = [];
  for (let i = 0; i < rows; i++) {
    const b = bid[i];
    const a = ask[i];
    const m = mid[i];
    if (b === null || a === null || m === null || b === undefined || a === undefined || m === undefined) continue;
    midErrors.push(Math.abs(m - (b + a) / 2));
  }
  const avgMidError = mean(midErrors);
  checks.push({
    name: 'mid_price',
    status: avgMidError < 0.01 ? 'PASS' : 'WARN',
    detail: `mean mid deviation ${Number.isNaN(avgMidError) ? 'n/a' : avgMidError.toFixed(6)}`,
  });

  return { file, rows, checks, passed: checks.every(c => c.status !== 'FAIL') };
}

export function validateBookLogFile(filePath: string): LogValidationReport {
  return validateBookLog(fs.readFileSync(filePath, 'utf-8'), path.basename(filePath));
}

/** Every *.csv in a directory, sorted by name */
export function validateBookLogDir(dir: string): LogValidationReport[] {
  return fs.readdirSync(dir)
    .filter(name => name.endsWith('.csv'))
    .sort()
    .map(name => validateBookLogFile(path.join(dir, name)));
}

export function formatValidationReport(report: LogValidationReport): string {
  const lines = [`${report.file}: ${report.passed ? 'PASS' : 'FAIL'} (${report.rows} rows)`];
  for (const check of report.checks) {
    lines.push(`  [${check.status}] ${check.name}: ${check.detail}`);
  }
  return lines.join('\n');
}
