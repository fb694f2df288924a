/**
 * Signal Grading Inputs
 *
 * Turns the captured signals.jsonl and a settlement file into the pairs
 * `evaluateSignals` grades.
 *
 * Settlement file: JSON object of marketId → final UP token price, e.g.
 *   { "123": 1, "124": 0 }
 */

import * as fs from 'fs';
import { CaptureConfig } from '../core/config';
import { Signal, SignalAction } from '../core/types';
import { getNumber, getString, isRecord, toNumber, tryParseJson } from '../live/payload';
import { EvaluatorConfig, SettledSignal } from './signal-evaluator';

export interface ParsedSignals {
  signals: Signal[];
  malformed: number;  // Lines that are not a signal record
}

export interface PairedSignals {
  pairs: SettledSignal[];
  unsettled: string[];  // Market ids with signals but no settlement
}

function isSignalAction(value: string | undefined): value is SignalAction {
  return value === 'long' || value === 'short' || value === 'none';
}

export function evaluatorConfigFrom(config: CaptureConfig): EvaluatorConfig {
  return {
    lossPenaltyFactor: config.lossPenaltyFactor,
    pnlMultiplier: config.pnlMultiplier,
  };
}

export function parseSignalRecords(jsonl: string): ParsedSignals {
  const signals: Signal[] = [];
  let malformed = 0;

  for (const line of jsonl.split(/\r?\n/)) {
    if (line.trim() === '') continue;
    const record = tryParseJson(line);
    if (!isRecord(record)) {
      malformed++;
      continue;
    }

    const marketId = getString(record, 'marketId');
    const action = getString(record, 'action');
    const entryPrice = getNumber(record, 'entryPrice');
    const edge = getNumber(record, 'edge');
    const confidence = getNumber(record, 'confidence');
    const createdAt = getNumber(record, 'createdAt');
    if (
      marketId === undefined || !isSignalAction(action) || entryPrice === undefined
      || edge === undefined || confidence === undefined || createdAt === undefined
    ) {
      malformed++;
      continue;
    }

    signals.push({ marketId, action, entryPrice, edge, confidence, createdAt });
  }

  return { signals, malformed };
}

export function parseSettlements(json: string): Map<string, number> {
  const parsed = tryParseJson(json);
  if (!isRecord(parsed)) {
    throw new Error('settlement file must be a JSON object of marketId → price');
  }

  const settlements = new Map<string, number>();
  for (const [marketId, raw] of Object.entries(parsed)) {
    const price = toNumber(raw);
    if (price === undefined) {
      throw new Error(`settlement for ${marketId} is not a number`);
    }
    settlements.set(marketId, price);
  }
  return settlements;
}

/** Pair each signal with its market's settlement; unsettled markets are reported, not graded */
export function pairWithSettlements(signals: readonly Signal[], settlements: ReadonlyMap<string, number>): PairedSignals {
  const pairs: SettledSignal[] = [];
  const unsettled = new Set<string>();

  for (const signal of signals) {
    const settlementPrice = settlements.get(signal.marketId);
    if (settlementPrice === undefined) {
      unsettled.add(signal.marketId);
      continue;
    }
    pairs.push({ signal, settlementPrice });
  }

  return { pairs, unsettled: Array.from(unsettled).sort() };
}

export function loadSettledSignals(signalsPath: string, settlementsPath: string): PairedSignals & { malformed: number } {
  const { signals, malformed } = parseSignalRecords(fs.readFileSync(signalsPath, 'utf-8'));
  const settlements = parseSettlements(fs.readFileSync(settlementsPath, 'utf-8'));
  return { ...pairWithSettlements(signals, settlements), malformed };
}
