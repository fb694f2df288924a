/**
 * Signal Evaluator
 *
 * Grades signals against realized settlement prices.
 *
 * Per trade:
 *   long  wins if settlement > entry, short wins if settlement < entry
 *   pnl = directional delta × confidence × pnlMultiplier
 *   losses are further scaled by lossPenaltyFactor
 *
 * Aggregates win rate, P&L, population std-dev and a Sharpe-like
 * mean/std ratio (0 with fewer than two trades or zero dispersion).
 */

import { Signal } from '../core/types';

// =============================================================================
// TYPES
// =============================================================================

export interface EvaluatorConfig {
  lossPenaltyFactor: number;  // Applied to losing trades only
  pnlMultiplier: number;      // Sizing / leverage scale applied to every trade
}

export const DEFAULT_EVALUATOR_CONFIG: EvaluatorConfig = {
  lossPenaltyFactor: 0.5,
  pnlMultiplier: 1,
};

export interface SettledSignal {
  signal: Signal | null;
  settlementPrice: number;
}

export interface GradedTrade {
  marketId: string;
  action: 'long' | 'short';
  entryPrice: number;
  settlementPrice: number;
  confidence: number;
  won: boolean;
  pnl: number;
}

export interface EvaluationStats {
  kind: 'report';
  signalsSeen: number;      // Pairs handed in, including empty ones
  trades: number;
  wins: number;
  winRate: number;
  totalPnl: number;
  avgPnlPerTrade: number;
  stdDev: number;
  sharpeRatio: number;
  graded: GradedTrade[];
}

export interface NoSignalsResult {
  kind: 'no_signals';
  signalsSeen: number;
  reason: string;
}

export type EvaluationReport = EvaluationStats | NoSignalsResult;

// =============================================================================
// GRADING
// =============================================================================

/**
 * Grade one signal. Returns null for empty / 'none' signals or a
 * non-finite settlement.
 */
export function gradeSignal(
  signal: Signal | null,
  settlementPrice: number,
  config: EvaluatorConfig = DEFAULT_EVALUATOR_CONFIG,
): GradedTrade | null {
  if (!signal || signal.action === 'none') return null;
  if (!Number.isFinite(settlementPrice)) return null;

  const action = signal.action;
  const { entryPrice, confidence } = signal;
  const delta = action === 'long'
    ? settlementPrice - entryPrice
    : entryPrice - settlementPrice;
  const won = delta > 0;

  let pnl = delta * confidence * config.pnlMultiplier;
  if (!won) pnl *= config.lossPenaltyFactor;
  // Flat trades: report 0, not -0
  if (pnl === 0) pnl = 0;

  return {
    marketId: signal.marketId,
    action,
    entryPrice,
    settlementPrice,
    confidence,
    won,
    pnl,
  };
}

function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Population standard deviation */
function stdDev(values: readonly number[]): number {
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

export function evaluateSignals(
  pairs: readonly SettledSignal[],
  config: EvaluatorConfig = DEFAULT_EVALUATOR_CONFIG,
): EvaluationReport {
  const graded: GradedTrade[] = [];
  for (const { signal, settlementPrice } of pairs) {
    const trade = gradeSignal(signal, settlementPrice, config);
    if (trade) graded.push(trade);
  }

  if (graded.length === 0) {
    return {
      kind: 'no_signals',
      signalsSeen: pairs.length,
      reason: 'No actionable signals to grade',
    };
  }

  const pnls = graded.map(t => t.pnl);
  const wins = graded.filter(t => t.won).length;
  const totalPnl = pnls.reduce((a, b) => a + b, 0);
  const avgPnlPerTrade = totalPnl / graded.length;
  const sd = stdDev(pnls);

  return {
    kind: 'report',
    signalsSeen: pairs.length,
    trades: graded.length,
    wins,
    winRate: wins / graded.length,
    totalPnl,
    avgPnlPerTrade,
    stdDev: sd,
    sharpeRatio: sd > 0 && graded.length > 1 ? avgPnlPerTrade / sd : 0,
    graded,
  };
}

/**
 * Format a report for logging
 */
export function formatEvaluation(report: EvaluationReport): string {
  if (report.kind === 'no_signals') {
    return `No signals (${report.signalsSeen} seen): ${report.reason}`;
  }
  return [
    `Trades: ${report.trades} | Wins: ${report.wins} (${(report.winRate * 100).toFixed(1)}%)`,
    `P&L: ${report.totalPnl.toFixed(4)} total | ${report.avgPnlPerTrade.toFixed(4)}/trade | σ ${report.stdDev.toFixed(4)}`,
    `Sharpe: ${report.sharpeRatio.toFixed(2)}`,
  ].join('\n');
}
