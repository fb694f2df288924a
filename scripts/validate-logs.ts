#!/usr/bin/env npx ts-node
/**
 * Captured Order Book Log Check
 *
 * Usage:
 *   npm run validate-logs                 # every CSV under <CAPTURE_DATA_DIR>/live
 *   npm run validate-logs -- data/live/123.csv
 *
 * Exits 1 when any file fails.
 */

import * as dotenv from 'dotenv';
dotenv.config();

import * as fs from 'fs';
import * as path from 'path';

import { loadCaptureConfig } from '../core/config';
import {
  LogValidationReport,
  formatValidationReport,
  validateBookLogDir,
  validateBookLogFile,
} from '../backtest/log-validator';

function main(): void {
  const target = process.argv[2] ?? path.join(loadCaptureConfig().dataDir, 'live');

  if (!fs.existsSync(target)) {
    console.error(`Not found: ${target}`);
    process.exit(1);
  }

  const reports: LogValidationReport[] = fs.statSync(target).isDirectory()
    ? validateBookLogDir(target)
    : [validateBookLogFile(target)];

  if (reports.length === 0) {
    console.log(`No CSV files in ${target}`);
    return;
  }

  for (const report of reports) {
    console.log(formatValidationReport(report));
  }

  const failed = reports.filter(r => !r.passed).length;
  console.log(`\n${reports.length - failed}/${reports.length} files passed`);
  if (failed > 0) process.exit(1);
}

main();
