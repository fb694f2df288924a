#!/usr/bin/env npx ts-node
/**
 * Grade Captured Signals
 *
 * Usage:
 *   npm run grade-signals -- settlements.json                      # <CAPTURE_DATA_DIR>/signals.jsonl
 *   npm run grade-signals -- settlements.json data/signals.jsonl
 *
 * Loss penalty and P&L multiplier come from CAPTURE_LOSS_PENALTY and
 * CAPTURE_PNL_MULTIPLIER.
 */

import * as dotenv from 'dotenv';
dotenv.config();

import * as fs from 'fs';
import * as path from 'path';

import { loadCaptureConfig, validateCaptureConfig } from '../core/config';
import { evaluateSignals, formatEvaluation } from '../backtest/signal-evaluator';
import { evaluatorConfigFrom, loadSettledSignals } from '../backtest/signal-grading';

function main(): void {
  const config = loadCaptureConfig();
  validateCaptureConfig(config);

  const settlementsPath = process.argv[2];
  const signalsPath = process.argv[3] ?? path.join(config.dataDir, 'signals.jsonl');

  if (!settlementsPath) {
    console.error('Usage: npm run grade-signals -- <settlements.json> [signals.jsonl]');
    process.exit(1);
  }
  for (const file of [settlementsPath, signalsPath]) {
    if (!fs.existsSync(file)) {
      console.error(`Not found: ${file}`);
      process.exit(1);
    }
  }

  const evaluator = evaluatorConfigFrom(config);
  const { pairs, unsettled, malformed } = loadSettledSignals(signalsPath, settlementsPath);

  console.log(`Signals: ${pairs.length} settled | ${unsettled.length} markets unsettled | ${malformed} malformed lines`);
  console.log(`Loss penalty: ${evaluator.lossPenaltyFactor} | P&L multiplier: ${evaluator.pnlMultiplier}\n`);
  console.log(formatEvaluation(evaluateSignals(pairs, evaluator)));
}

main();
