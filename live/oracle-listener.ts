/**
 * Oracle Price Listener
 *
 * Long-lived subscription to the real-time data stream (RTDS) feeding the
 * price cache with Chainlink and spot prices.
 *
 * States: disconnected → connecting → subscribed → receiving
 *         any failure or a silent socket → disconnected → (fixed delay) connecting
 *
 * The listener never gives up on its own; only stop() ends it. The reconnect
 * delay is fixed (no exponential backoff).
 */

import { PriceSeriesWriter } from '../core/price-series-cache';
import { Asset, PriceSource, isKnownAsset } from '../core/types';
import { createLogger, rateLimitedLog, safeErrorData, Logger } from '../core/logger';
import { StreamSocket, SocketFactory, createWebSocket, rawToString } from './stream-socket';
import { getNumber, getString, isRecord, tryParseJson } from './payload';

// =============================================================================
// TYPES
// =============================================================================

export type OracleListenerState = 'disconnected' | 'connecting' | 'subscribed' | 'receiving';

export interface OracleListenerOptions {
  url: string;
  receiveTimeoutMs: number;
  reconnectDelayMs: number;
}

export interface OracleUpdate {
  source: PriceSource;
  asset: Asset;
  timestamp: number;
  price: number;
}

export interface OracleStats {
  connects: number;
  reconnects: number;
  timeouts: number;
  messages: number;
  accepted: number;
  dropped: number;
  lastUpdateAt: number;
}

export const CHAINLINK_TOPIC = 'crypto_prices_chainlink';
export const SPOT_TOPIC = 'crypto_prices';

export const ORACLE_SUBSCRIPTION = {
  action: 'subscribe',
  subscriptions: [
    { topic: CHAINLINK_TOPIC, type: 'update', filters: '' },
    { topic: SPOT_TOPIC, type: 'update', filters: '' },
  ],
};

// =============================================================================
// MESSAGE PARSING
// =============================================================================

/**
 * Extract a price update from one RTDS message.
 *
 * Chainlink symbols look like "btc/usd" (source "cl"), spot symbols like
 * "btcusdt" (source "bn"). Returns null for anything else, including
 * non-positive values.
 */
export function parseOracleMessage(raw: string): OracleUpdate | null {
  if (!raw.trim()) return null;

  const msg = tryParseJson(raw);
  if (!isRecord(msg)) return null;

  const payload = isRecord(msg.payload) ? msg.payload : {};
  const topic = getString(msg, 'topic') ?? getString(payload, 'topic');
  const timestamp = getNumber(payload, 'timestamp');
  const price = getNumber(payload, 'value');
  const symbol = (getString(payload, 'symbol') ?? '').toLowerCase();

  if (timestamp === undefined || price === undefined || price <= 0) return null;

  if (topic === CHAINLINK_TOPIC) {
    const sep = symbol.indexOf('/');
    if (sep <= 0) return null;
    const asset = symbol.slice(0, sep);
    return isKnownAsset(asset)
      ? { source: 'cl', asset, timestamp: Math.trunc(timestamp), price }
      : null;
  }

  if (topic === SPOT_TOPIC) {
    if (!symbol.endsWith('usdt')) return null;
    const asset = symbol.slice(0, -4);
    return isKnownAsset(asset)
      ? { source: 'bn', asset, timestamp: Math.trunc(timestamp), price }
      : null;
  }

  return null;
}

// =============================================================================
// LISTENER
// =============================================================================

export class OracleListener {
  private state: OracleListenerState = 'disconnected';
  private socket: StreamSocket | null = null;
  private receiveTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private connId = 0;
  private log: Logger = createLogger('OracleListener', { mode: 'live' });
  private stats: OracleStats = {
    connects: 0,
    reconnects: 0,
    timeouts: 0,
    messages: 0,
    accepted: 0,
    dropped: 0,
    lastUpdateAt: 0,
  };

  constructor(
    private readonly cache: PriceSeriesWriter,
    private readonly options: OracleListenerOptions,
    private readonly socketFactory: SocketFactory = createWebSocket,
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.connect();
  }

  /** Process shutdown only: closes the socket and cancels any pending reconnect */
  stop(): void {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.teardown();
    this.state = 'disconnected';
    this.log.info('listener.stopped', { ...this.stats });
  }

  getState(): OracleListenerState {
    return this.state;
  }

  getStats(): OracleStats {
    return { ...this.stats };
  }

  private connect(): void {
    this.connId++;
    this.stats.connects++;
    this.state = 'connecting';
    this.log.info('ws.connecting', { connId: this.connId });

    let socket: StreamSocket;
    try {
      socket = this.socketFactory(this.options.url);
    } catch (err) {
      this.log.error('ws.create_failed', { ...safeErrorData(err), connId: this.connId });
      this.scheduleReconnect('create_failed');
      return;
    }

    this.socket = socket;
    // Also bounds a handshake that never completes
    this.armReceiveTimer();

    socket.on('open', () => {
      if (this.socket !== socket) return;
      try {
        socket.send(JSON.stringify(ORACLE_SUBSCRIPTION));
      } catch (err) {
        this.log.warn('ws.subscribe_failed', { ...safeErrorData(err), connId: this.connId });
        this.drop('subscribe_failed');
        return;
      }
      this.state = 'subscribed';
      this.log.info('ws.subscribed', { connId: this.connId, topics: ORACLE_SUBSCRIPTION.subscriptions.length });
      this.armReceiveTimer();
    });

    socket.on('message', (data) => {
      if (this.socket !== socket) return;
      this.state = 'receiving';
      this.armReceiveTimer();
      this.handleMessage(rawToString(data));
    });

    socket.on('error', (err) => {
      if (this.socket !== socket) return;
      rateLimitedLog(this.log, 'error', 'rtds_ws_error', 60_000, 'ws.error', {
        ...safeErrorData(err),
        connId: this.connId,
      });
      this.drop('error');
    });

    socket.on('close', (code) => {
      if (this.socket !== socket) return;
      this.drop('close', code);
    });
  }

  private handleMessage(text: string): void {
    this.stats.messages++;

    const update = parseOracleMessage(text);
    if (!update) {
      this.stats.dropped++;
      return;
    }

    this.cache.add(update.source, update.asset, update.timestamp, update.price);
    this.stats.accepted++;
    this.stats.lastUpdateAt = update.timestamp;
  }

  private armReceiveTimer(): void {
    this.clearReceiveTimer();
    this.receiveTimer = setTimeout(() => {
      this.receiveTimer = null;
      this.stats.timeouts++;
      this.log.warn('ws.receive_timeout', {
        connId: this.connId,
        timeoutMs: this.options.receiveTimeoutMs,
        state: this.state,
      });
      this.drop('timeout');
    }, this.options.receiveTimeoutMs);
  }

  private clearReceiveTimer(): void {
    if (this.receiveTimer) {
      clearTimeout(this.receiveTimer);
      this.receiveTimer = null;
    }
  }

  /** Close the current connection and reconnect after the fixed delay */
  private drop(reason: string, code?: number): void {
    this.teardown();
    this.log.warn('ws.disconnected', { reason, code, connId: this.connId });
    this.scheduleReconnect(reason);
  }

  private teardown(): void {
    this.clearReceiveTimer();

    const socket = this.socket;
    if (!socket) return;
    this.socket = null;

    socket.removeAllListeners();
    // terminate() on a connecting socket reports an abort through 'error'
    socket.on('error', (err) => this.log.trace('ws.error_after_close', safeErrorData(err)));
    socket.terminate();
  }

  private scheduleReconnect(reason: string): void {
    this.state = 'disconnected';
    if (!this.running || this.reconnectTimer) return;

    this.stats.reconnects++;
    this.log.info('ws.reconnecting', {
      reason,
      delayMs: this.options.reconnectDelayMs,
      attempt: this.stats.reconnects,
    });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.running) this.connect();
    }, this.options.reconnectDelayMs);
  }
}
