/**
 * Up/Down Capture - Configuration
 * Intervals, buffers and model parameters for the capture engine.
 * Every component takes its slice of this at construction.
 */

import { createLogger } from './logger';

export interface CaptureConfig {
  // Endpoints
  gammaUrl: string;             // Market catalog (paged HTTP)
  clobWsUrl: string;            // Per-token order-book stream
  rtdsWsUrl: string;            // Oracle price stream
  dataDir: string;              // Root for persisted logs (books under <dataDir>/live)

  // Scheduling
  scanIntervalSec: number;      // Re-run the market scan
  schedulerTickSec: number;     // Check window brackets
  startBufferSec: number;       // Start listening this long before the window opens
  stopBufferSec: number;        // Keep listening this long after the window closes
  maxListeners: number;         // Cap on concurrent order-book listeners

  // Discovery
  horizonSec: number;           // Keep windows starting within now ± horizon
  scanPageSize: number;
  scanMaxPages: number;
  requestTimeoutMs: number;

  // Streams
  bookLevels: number;           // Top-N levels kept per side
  priceMaxAgeSec: number;       // Retention per oracle series, relative to its newest point
  receiveTimeoutSec: number;    // Max wait per oracle message before reconnecting
  reconnectDelayMs: number;     // Fixed delay, no backoff
  pingIntervalSec: number;      // Order-book keep-alive

  // Model
  minEdge: number;              // |market - fair| needed to flag a misprice
  sigmaFloor: number;           // Lower bound for σ√m
  defaultVolatility: number;    // Per-minute vol when history is too short
  volLookbackMinutes: number;   // One-minute samples used for the vol estimate
  signalIntervalSec: number;    // Signal emission cadence per active market
  statsIntervalSec: number;     // Capture stats log cadence

  /**
   * Grading: losses are scaled by lossPenaltyFactor, every trade by pnlMultiplier.
   * Both are tuning constants carried over as-is, not derived values.
   */
  lossPenaltyFactor: number;
  pnlMultiplier: number;
}

export const DEFAULT_CAPTURE_CONFIG: CaptureConfig = {
  gammaUrl: 'https://gamma-api.polymarket.com',
  clobWsUrl: 'wss://ws-subscriptions-clob.polymarket.com/ws/market',
  rtdsWsUrl: 'wss://ws-live-data.polymarket.com',
  dataDir: 'data',

  scanIntervalSec: 600,
  schedulerTickSec: 1,
  startBufferSec: 10,
  stopBufferSec: 10,
  maxListeners: 40,

  horizonSec: 2 * 3600,
  scanPageSize: 200,
  scanMaxPages: 20,
  requestTimeoutMs: 15_000,

  bookLevels: 5,
  priceMaxAgeSec: 30 * 60,
  receiveTimeoutSec: 30,
  reconnectDelayMs: 200,
  pingIntervalSec: 10,

  minEdge: 0.05,
  sigmaFloor: 0.001,
  defaultVolatility: 0.01,
  volLookbackMinutes: 15,
  signalIntervalSec: 30,
  statsIntervalSec: 300,

  lossPenaltyFactor: 0.5,
  pnlMultiplier: 1,
};

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function str(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

export function loadCaptureConfig(env: Env = process.env): CaptureConfig {
  const d = DEFAULT_CAPTURE_CONFIG;

  return {
    gammaUrl: str(env, 'CAPTURE_GAMMA_URL', d.gammaUrl),
    clobWsUrl: str(env, 'CAPTURE_CLOB_WS_URL', d.clobWsUrl),
    rtdsWsUrl: str(env, 'CAPTURE_RTDS_WS_URL', d.rtdsWsUrl),
    dataDir: str(env, 'CAPTURE_DATA_DIR', d.dataDir),

    scanIntervalSec: num(env, 'CAPTURE_SCAN_INTERVAL_SEC', d.scanIntervalSec),
    schedulerTickSec: num(env, 'CAPTURE_TICK_SEC', d.schedulerTickSec),
    startBufferSec: num(env, 'CAPTURE_START_BUFFER_SEC', d.startBufferSec),
    stopBufferSec: num(env, 'CAPTURE_STOP_BUFFER_SEC', d.stopBufferSec),
    maxListeners: num(env, 'CAPTURE_MAX_LISTENERS', d.maxListeners),

    horizonSec: num(env, 'CAPTURE_HORIZON_SEC', d.horizonSec),
    scanPageSize: num(env, 'CAPTURE_SCAN_PAGE_SIZE', d.scanPageSize),
    scanMaxPages: num(env, 'CAPTURE_SCAN_MAX_PAGES', d.scanMaxPages),
    requestTimeoutMs: num(env, 'CAPTURE_REQUEST_TIMEOUT_MS', d.requestTimeoutMs),

    bookLevels: num(env, 'CAPTURE_BOOK_LEVELS', d.bookLevels),
    priceMaxAgeSec: num(env, 'CAPTURE_PRICE_MAX_AGE_SEC', d.priceMaxAgeSec),
    receiveTimeoutSec: num(env, 'CAPTURE_RECEIVE_TIMEOUT_SEC', d.receiveTimeoutSec),
    reconnectDelayMs: num(env, 'CAPTURE_RECONNECT_DELAY_MS', d.reconnectDelayMs),
    pingIntervalSec: num(env, 'CAPTURE_PING_INTERVAL_SEC', d.pingIntervalSec),

    minEdge: num(env, 'CAPTURE_MIN_EDGE', d.minEdge),
    sigmaFloor: num(env, 'CAPTURE_SIGMA_FLOOR', d.sigmaFloor),
    defaultVolatility: num(env, 'CAPTURE_DEFAULT_VOL', d.defaultVolatility),
    volLookbackMinutes: num(env, 'CAPTURE_VOL_LOOKBACK_MIN', d.volLookbackMinutes),
    signalIntervalSec: num(env, 'CAPTURE_SIGNAL_INTERVAL_SEC', d.signalIntervalSec),
    statsIntervalSec: num(env, 'CAPTURE_STATS_INTERVAL_SEC', d.statsIntervalSec),

    lossPenaltyFactor: num(env, 'CAPTURE_LOSS_PENALTY', d.lossPenaltyFactor),
    pnlMultiplier: num(env, 'CAPTURE_PNL_MULTIPLIER', d.pnlMultiplier),
  };
}

export function validateCaptureConfig(config: CaptureConfig): void {
  const positive: Array<[keyof CaptureConfig, string]> = [
    ['scanIntervalSec', 'CAPTURE_SCAN_INTERVAL_SEC'],
    ['schedulerTickSec', 'CAPTURE_TICK_SEC'],
    ['maxListeners', 'CAPTURE_MAX_LISTENERS'],
    ['horizonSec', 'CAPTURE_HORIZON_SEC'],
    ['scanPageSize', 'CAPTURE_SCAN_PAGE_SIZE'],
    ['scanMaxPages', 'CAPTURE_SCAN_MAX_PAGES'],
    ['requestTimeoutMs', 'CAPTURE_REQUEST_TIMEOUT_MS'],
    ['priceMaxAgeSec', 'CAPTURE_PRICE_MAX_AGE_SEC'],
    ['receiveTimeoutSec', 'CAPTURE_RECEIVE_TIMEOUT_SEC'],
    ['pingIntervalSec', 'CAPTURE_PING_INTERVAL_SEC'],
    ['sigmaFloor', 'CAPTURE_SIGMA_FLOOR'],
    ['defaultVolatility', 'CAPTURE_DEFAULT_VOL'],
    ['volLookbackMinutes', 'CAPTURE_VOL_LOOKBACK_MIN'],
    ['signalIntervalSec', 'CAPTURE_SIGNAL_INTERVAL_SEC'],
    ['statsIntervalSec', 'CAPTURE_STATS_INTERVAL_SEC'],
    ['pnlMultiplier', 'CAPTURE_PNL_MULTIPLIER'],
  ];

  for (const [field, envName] of positive) {
    const value = config[field];
    if (typeof value !== 'number' || value <= 0) {
      throw new Error(`${envName} must be a positive number (got ${String(value)})`);
    }
  }

  if (!Number.isInteger(config.bookLevels) || config.bookLevels < 1) {
    throw new Error('CAPTURE_BOOK_LEVELS must be an integer >= 1');
  }
  if (config.startBufferSec < 0 || config.stopBufferSec < 0) {
    throw new Error('CAPTURE_START_BUFFER_SEC and CAPTURE_STOP_BUFFER_SEC must be >= 0');
  }
  if (config.reconnectDelayMs < 0) {
    throw new Error('CAPTURE_RECONNECT_DELAY_MS must be >= 0');
  }
  if (config.minEdge <= 0 || config.minEdge >= 1) {
    throw new Error('CAPTURE_MIN_EDGE should be between 0 and 1 (exclusive)');
  }
  if (config.lossPenaltyFactor < 0) {
    throw new Error('CAPTURE_LOSS_PENALTY must be >= 0');
  }
}

export function logCaptureConfig(config: CaptureConfig): void {
  createLogger('Config').info('config.loaded', {
    gammaUrl: config.gammaUrl,
    dataDir: config.dataDir,
    scanIntervalSec: config.scanIntervalSec,
    bracketSec: `-${config.startBufferSec}/+${config.stopBufferSec}`,
    maxListeners: config.maxListeners,
    bookLevels: config.bookLevels,
    retentionMin: config.priceMaxAgeSec / 60,
    receiveTimeoutSec: config.receiveTimeoutSec,
    minEdgeCents: Math.round(config.minEdge * 100),
    lossPenaltyFactor: config.lossPenaltyFactor,
  });
}
