/**
 * Order Book Listener
 *
 * One websocket per market, subscribed to the UP token's book channel.
 *
 * States: connecting → subscribed → streaming → closed
 *
 * A socket that has not opened within handshakeTimeoutMs is closed.
 * PING goes out once on open, then every pingIntervalMs.
 *
 * Unlike the oracle listener this one does not reconnect. Any failure ends
 * it in `closed` and fires onClosed; the coordinator decides whether to
 * start a replacement.
 */

import { createLogger, rateLimitedLog, safeErrorData, Logger } from '../core/logger';
import { StreamSocket, SocketFactory, createWebSocket, rawToString } from './stream-socket';
import { JsonRecord, isRecord, tryParseJson } from './payload';

export type BookListenerState = 'connecting' | 'subscribed' | 'streaming' | 'closed';

export type BookEventHandler = (event: JsonRecord) => void;

export interface BookListenerOptions {
  url: string;
  pingIntervalMs: number;
  handshakeTimeoutMs?: number;
}

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30_000;

export interface BookListenerStats {
  messages: number;
  events: number;
  dropped: number;
  handlerErrors: number;
}

/**
 * The stream sends either a single event object or a batch array.
 * Anything that is not an object is dropped.
 */
export function normalizeEvents(payload: unknown): JsonRecord[] {
  if (isRecord(payload)) return [payload];
  if (Array.isArray(payload)) return payload.filter(isRecord);
  return [];
}

export class OrderBookListener {
  private state: BookListenerState = 'connecting';
  private socket: StreamSocket | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private handshakeTimer: ReturnType<typeof setTimeout> | null = null;
  private started = false;
  private closeReason: string | null = null;
  private log: Logger;
  private stats: BookListenerStats = { messages: 0, events: 0, dropped: 0, handlerErrors: 0 };

  constructor(
    readonly marketId: string,
    readonly tokenId: string,
    private readonly handler: BookEventHandler,
    private readonly options: BookListenerOptions,
    private readonly onClosed?: (reason: string) => void,
    private readonly socketFactory: SocketFactory = createWebSocket,
  ) {
    this.log = createLogger('BookListener', { mode: 'live', marketId });
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    let socket: StreamSocket;
    try {
      socket = this.socketFactory(this.options.url);
    } catch (err) {
      this.log.error('ws.create_failed', safeErrorData(err));
      this.close('create_failed');
      return;
    }
    this.socket = socket;
    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null;
      this.log.warn('ws.handshake_timeout', { timeoutMs: this.handshakeTimeoutMs() });
      this.close('handshake_timeout');
    }, this.handshakeTimeoutMs());

    socket.on('open', () => this.handleOpen(socket));
    socket.on('message', (data) => this.handleMessage(rawToString(data)));
    socket.on('error', (err) => {
      rateLimitedLog(this.log, 'warn', `book_ws_error:${this.marketId}`, 60_000, 'ws.error', safeErrorData(err));
      this.close('error');
    });
    socket.on('close', (code) => this.close(`remote_close:${code}`));
  }

  /** Idempotent */
  stop(): void {
    this.close('stopped');
  }

  getState(): BookListenerState {
    return this.state;
  }

  getCloseReason(): string | null {
    return this.closeReason;
  }

  getStats(): BookListenerStats {
    return { ...this.stats };
  }

  private handshakeTimeoutMs(): number {
    return this.options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }
  }

  private handleOpen(socket: StreamSocket): void {
    if (this.state === 'closed') return;
    this.clearHandshakeTimer();

    try {
      socket.send(JSON.stringify({ type: 'market', assets_ids: [this.tokenId] }));
    } catch (err) {
      this.log.warn('ws.subscribe_failed', safeErrorData(err));
      this.close('subscribe_failed');
      return;
    }

    this.state = 'subscribed';
    this.log.info('ws.subscribed', { tokenId: this.tokenId });

    this.pingTimer = setInterval(() => this.ping(socket), this.options.pingIntervalMs);
    this.ping(socket);
  }

  private ping(socket: StreamSocket): void {
    const onFailure = (err: unknown): void => {
      this.log.warn('ws.ping_failed', safeErrorData(err));
      this.close('ping_failed');
    };

    try {
      socket.send('PING', (err) => {
        if (err) onFailure(err);
      });
    } catch (err) {
      onFailure(err);
    }
  }

  private handleMessage(text: string): void {
    if (this.state === 'closed') return;
    this.stats.messages++;

    if (text === 'PONG') return;

    const events = normalizeEvents(tryParseJson(text));
    if (events.length === 0) {
      this.stats.dropped++;
      return;
    }

    this.state = 'streaming';
    for (const event of events) {
      this.stats.events++;
      try {
        this.handler(event);
      } catch (err) {
        this.stats.handlerErrors++;
        rateLimitedLog(this.log, 'error', `book_handler:${this.marketId}`, 60_000, 'book.handler_failed', safeErrorData(err));
      }
    }
  }

  private close(reason: string): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.closeReason = reason;
    this.clearHandshakeTimer();

    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.removeAllListeners();
      socket.on('error', (err) => this.log.trace('ws.error_after_close', safeErrorData(err)));
      socket.terminate();
    }

    this.log.info('ws.closed', { reason, ...this.stats });
    this.onClosed?.(reason);
  }
}
