/**
 * Central Logger
 *
 * Leveled, timestamped, structured logging with redaction and rate limiting.
 *
 * Env vars:
 *   LOG_LEVEL  = error | warn | info | debug | trace  (default: per mode)
 *   LOG_FORMAT = pretty | json                        (default: per mode)
 *   LOG_MODE   = dev | live-test | prod               (default: dev)
 *
 * Usage:
 *   import { createLogger } from './logger';
 *   const log = createLogger('OracleListener');
 *   log.info('ws.subscribed', { topics: 2, connId: 3 });
 */

import * as crypto from 'crypto';
import axios from 'axios';

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';
export type LogFormat = 'pretty' | 'json';
export type LogMode = 'dev' | 'live-test' | 'prod';

export type LogData = Record<string, unknown>;
type LogFn = (event: string, data?: LogData) => void;

export interface Logger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  trace: LogFn;
  isEnabled: (level: LogLevel) => boolean;
  /** Create a child logger with additional default fields */
  child: (fields: LogData) => Logger;
}

// =============================================================================
// LEVEL ORDERING
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// =============================================================================
// REDACTION
// =============================================================================

const REDACT_KEYS = new Set([
  'authorization', 'cookie', 'apikey', 'secret', 'token',
  'signature', 'passphrase', 'privatekey', 'password',
]);

const MAX_STRING_LENGTH = 200;
const MAX_DEPTH = 3;
const MAX_ITEMS = 10;
const MAX_KEYS = 20;

function sanitizeValue(key: string, value: unknown, depth: number): unknown {
  if (REDACT_KEYS.has(key.toLowerCase())) return '[REDACTED]';
  if (value === null || value === undefined) return value;

  if (typeof value === 'string') {
    return value.length > MAX_STRING_LENGTH
      ? value.slice(0, MAX_STRING_LENGTH - 12) + ' [truncated]'
      : value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();

  if (depth >= MAX_DEPTH) return '[depth limit]';

  if (Array.isArray(value)) {
    return value.slice(0, MAX_ITEMS).map((v, i) => sanitizeValue(String(i), v, depth + 1));
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    const result: LogData = {};
    for (const [k, v] of entries.slice(0, MAX_KEYS)) {
      result[k] = sanitizeValue(k, v, depth + 1);
    }
    if (entries.length > MAX_KEYS) {
      result['...'] = `${entries.length - MAX_KEYS} more keys`;
    }
    return result;
  }

  return String(value);
}

function sanitizeData(data: LogData): LogData {
  const result: LogData = {};
  for (const [k, v] of Object.entries(data)) {
    result[k] = sanitizeValue(k, v, 0);
  }
  return result;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

const MODE_PRESETS: Record<LogMode, { level: LogLevel; format: LogFormat }> = {
  dev:         { level: 'debug', format: 'pretty' },
  'live-test': { level: 'info',  format: 'pretty' },
  prod:        { level: 'info',  format: 'json' },
};

function resolveMode(): LogMode {
  const env = (process.env.LOG_MODE || 'dev').toLowerCase();
  if (env === 'dev' || env === 'live-test' || env === 'prod') return env;
  return 'dev';
}

function resolveLevel(mode: LogMode): LogLevel {
  const explicit = process.env.LOG_LEVEL?.toLowerCase();
  if (explicit && isLogLevel(explicit)) return explicit;
  return MODE_PRESETS[mode].level;
}

function resolveFormat(mode: LogMode): LogFormat {
  const explicit = process.env.LOG_FORMAT?.toLowerCase();
  if (explicit === 'pretty' || explicit === 'json') return explicit;
  return MODE_PRESETS[mode].format;
}

const mode = resolveMode();
let currentLevel: LogLevel = resolveLevel(mode);
const currentFormat: LogFormat = resolveFormat(mode);

/** Process-scoped run ID for correlation */
export const RUN_ID: string = crypto.randomUUID().slice(0, 8);

/**
 * Override the log level at runtime.
 * Returns the previous level.
 */
export function setLogLevel(level: LogLevel): LogLevel {
  const prev = currentLevel;
  currentLevel = level;
  return prev;
}

// =============================================================================
// FORMATTING
// =============================================================================

const LEVEL_TAG: Record<LogLevel, string> = {
  error: 'ERR ',
  warn:  'WARN',
  info:  'INFO',
  debug: 'DBG ',
  trace: 'TRC ',
};

function formatPretty(ts: string, level: LogLevel, module: string, event: string, data: LogData): string {
  const pairs: string[] = [];
  for (const [k, v] of Object.entries(data)) {
    if (v === undefined || v === null) continue;
    pairs.push(`${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`);
  }

  const line = `${ts} [${LEVEL_TAG[level]}] [${module}] ${event}`;
  return pairs.length > 0 ? `${line} | ${pairs.join(' ')}` : line;
}

function formatJson(ts: string, level: LogLevel, module: string, event: string, data: LogData): string {
  return JSON.stringify({ ts, level, module, event, ...data });
}

// =============================================================================
// RATE LIMITING
// =============================================================================

const rateLimitState = new Map<string, { last: number; suppressed: number }>();

/**
 * Decide whether a rate-limited event may be emitted now.
 * On release, reports how many were swallowed since the last emit.
 */
function checkRateLimit(key: string, intervalMs: number): { emit: boolean; suppressed: number } {
  const now = Date.now();
  const state = rateLimitState.get(key);

  if (!state || now - state.last >= intervalMs) {
    rateLimitState.set(key, { last: now, suppressed: 0 });
    return { emit: true, suppressed: state?.suppressed ?? 0 };
  }

  state.suppressed++;
  return { emit: false, suppressed: 0 };
}

// =============================================================================
// CORE EMIT
// =============================================================================

function emit(level: LogLevel, module: string, event: string, baseFields: LogData, data?: LogData): void {
  if (LEVEL_ORDER[level] > LEVEL_ORDER[currentLevel]) return;

  const ts = new Date().toISOString();
  const merged: LogData = data ? { ...baseFields, ...sanitizeData(data) } : { ...baseFields };
  merged.runId = RUN_ID;

  const line = currentFormat === 'json'
    ? formatJson(ts, level, module, event, merged)
    : formatPretty(ts, level, module, event, merged);

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

function makeLogger(module: string, baseFields: LogData): Logger {
  const logFn = (level: LogLevel): LogFn =>
    (event, data) => emit(level, module, event, baseFields, data);

  return {
    error: logFn('error'),
    warn: logFn('warn'),
    info: logFn('info'),
    debug: logFn('debug'),
    trace: logFn('trace'),
    isEnabled: (level) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel],
    child: (fields) => makeLogger(module, { ...baseFields, ...fields }),
  };
}

/**
 * Create a logger scoped to a module name.
 */
export function createLogger(module: string, fields?: LogData): Logger {
  return makeLogger(module, fields ?? {});
}

// =============================================================================
// RATE-LIMITED LOGGING
// =============================================================================

/**
 * Emit a log only if the rate limit interval has passed for the given key.
 * When suppressed messages are released, logs the count.
 */
export function rateLimitedLog(
  logger: Logger,
  level: LogLevel,
  key: string,
  intervalMs: number,
  event: string,
  data?: LogData,
): void {
  if (!logger.isEnabled(level)) return;

  const { emit: shouldEmit, suppressed } = checkRateLimit(key, intervalMs);
  if (!shouldEmit) return;

  logger[level](event, suppressed > 0 ? { ...data, suppressedCount: suppressed } : data);
}

// =============================================================================
// SAFE ERROR EXTRACTION
// =============================================================================

function truncate(value: unknown): string {
  return String(value).slice(0, MAX_STRING_LENGTH);
}

/**
 * Extract structured error info from an axios error or generic Error.
 * Never dumps raw response bodies.
 */
export function safeErrorData(err: unknown): LogData {
  if (err === null || err === undefined) return { error: 'unknown' };

  if (axios.isAxiosError(err)) {
    const result: LogData = { error: truncate(err.message) };
    if (err.response) result.httpStatus = err.response.status;
    if (err.config?.url) result.url = truncate(err.config.url);
    if (err.code) result.errorCode = err.code;
    return result;
  }

  if (err instanceof Error) {
    const result: LogData = { error: truncate(err.message) };
    if ('code' in err && typeof err.code === 'string') result.errorCode = err.code;
    return result;
  }

  return { error: truncate(err) };
}
