/**
 * Capture Coordinator
 *
 * Owns the set of known market windows and one capture task per window:
 *
 *   rescan (every scanIntervalSec)  → merge new windows
 *   tick   (every schedulerTickSec) → for each window
 *       now > end + stopBuffer            → tear down task, forget window
 *       now ≥ start − startBuffer, no task → start listener (subject to cap)
 *       task listener closed early         → start a replacement
 *       started and signal due             → evaluate and emit
 *   stats  (every statsIntervalSec) → one capture.stats line
 */

import * as path from 'path';
import { MarketWindow } from '../core/types';
import { OrderBook } from '../core/order-book';
import { createLogger, rateLimitedLog, safeErrorData } from '../core/logger';
import { WindowSource } from './market-scanner';
import { OrderBookListener } from './orderbook-listener';
import { BookCaptureHandler, CaptureStats } from './book-capture';
import { OrderBookLog, bookLogPath } from './orderbook-log';
import { PricedSignal, SignalService } from './signal-service';
import { SocketFactory, createWebSocket } from './stream-socket';

const log = createLogger('Coordinator', { mode: 'live' });

export interface CoordinatorOptions {
  clobWsUrl: string;
  dataDir: string;
  schedulerTickSec: number;
  scanIntervalSec: number;
  startBufferSec: number;
  stopBufferSec: number;
  maxListeners: number;
  bookLevels: number;
  pingIntervalSec: number;
  signalIntervalSec: number;
  statsIntervalSec: number;
}

export type SignalSink = (window: MarketWindow, priced: PricedSignal) => void;

export interface CoordinatorDeps {
  signals?: SignalService;
  onSignal?: SignalSink;
  socketFactory?: SocketFactory;
}

interface CaptureTask {
  window: MarketWindow;
  book: OrderBook;
  bookLog: OrderBookLog;
  handler: BookCaptureHandler;
  listener: OrderBookListener;
  restarts: number;
  lastSignalAt: number;
}

export interface MarketCaptureStats extends CaptureStats {
  marketId: string;
  slug: string;
  listenerState: string;
  restarts: number;
}

export interface CoordinatorStats {
  knownWindows: number;
  activeTasks: number;
  markets: MarketCaptureStats[];
}

export class CaptureCoordinator {
  private windows = new Map<string, MarketWindow>();
  private tasks = new Map<string, CaptureTask>();
  private timers: ReturnType<typeof setInterval>[] = [];
  private scanInFlight: Promise<void> | null = null;
  private readonly socketFactory: SocketFactory;

  constructor(
    private readonly source: WindowSource,
    private readonly options: CoordinatorOptions,
    private readonly deps: CoordinatorDeps = {},
  ) {
    this.socketFactory = deps.socketFactory ?? createWebSocket;
  }

  async start(): Promise<void> {
    await this.rescan();
    this.tick();

    this.timers.push(
      setInterval(() => this.tick(), this.options.schedulerTickSec * 1000),
      setInterval(() => {
        this.rescan().catch((err: unknown) => log.error('scan.failed', safeErrorData(err)));
      }, this.options.scanIntervalSec * 1000),
      setInterval(() => this.logStats(), this.options.statsIntervalSec * 1000),
    );

    log.info('coordinator.started', { windows: this.windows.size });
  }

  stop(): void {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];

    for (const marketId of Array.from(this.tasks.keys())) {
      this.teardown(marketId, 'shutdown');
    }
    log.info('coordinator.stopped', { windows: this.windows.size });
  }

  /**
   * Pull windows from the source and merge the ones not seen yet.
   * Overlapping calls share one in-flight scan.
   */
  rescan(now: number = Date.now()): Promise<void> {
    if (!this.scanInFlight) {
      this.scanInFlight = this.runScan(now).finally(() => {
        this.scanInFlight = null;
      });
    }
    return this.scanInFlight;
  }

  tick(now: number = Date.now()): void {
    const startBufferMs = this.options.startBufferSec * 1000;
    const stopBufferMs = this.options.stopBufferSec * 1000;

    for (const [marketId, window] of Array.from(this.windows)) {
      const openAt = window.startTime.getTime() - startBufferMs;
      const closeAt = window.endTime.getTime() + stopBufferMs;

      if (now > closeAt) {
        this.teardown(marketId, 'window_closed');
        this.windows.delete(marketId);
        continue;
      }
      if (now < openAt) continue;

      const task = this.tasks.get(marketId);
      if (!task) {
        this.startTask(window);
        continue;
      }

      if (task.listener.getState() === 'closed') {
        this.restartListener(task);
      }
      this.maybeEmitSignal(task, now);
    }
  }

  getStats(): CoordinatorStats {
    return {
      knownWindows: this.windows.size,
      activeTasks: this.tasks.size,
      markets: Array.from(this.tasks.values()).map(task => ({
        marketId: task.window.marketId,
        slug: task.window.slug,
        listenerState: task.listener.getState(),
        restarts: task.restarts,
        ...task.handler.getStats(),
      })),
    };
  }

  hasTask(marketId: string): boolean {
    return this.tasks.has(marketId);
  }

  knowsWindow(marketId: string): boolean {
    return this.windows.has(marketId);
  }

  private async runScan(now: number): Promise<void> {
    let found: MarketWindow[];
    try {
      found = await this.source.scan(now);
    } catch (err) {
      log.error('scan.failed', safeErrorData(err));
      return;
    }

    const stopBufferMs = this.options.stopBufferSec * 1000;
    let added = 0;
    for (const window of found) {
      if (this.windows.has(window.marketId)) continue;
      if (window.endTime.getTime() + stopBufferMs < now) continue;
      this.windows.set(window.marketId, window);
      added++;
    }

    if (added > 0) {
      log.info('scan.merged', { added, known: this.windows.size });
    }
  }

  private startTask(window: MarketWindow): void {
    if (this.tasks.size >= this.options.maxListeners) {
      rateLimitedLog(log, 'warn', 'listener_cap', 60_000, 'listener.cap_reached', {
        maxListeners: this.options.maxListeners,
        waiting: window.marketId,
      });
      return;
    }

    const book = new OrderBook(window.tokenIds[0], this.options.bookLevels);
    let bookLog: OrderBookLog;
    try {
      bookLog = new OrderBookLog(bookLogPath(path.join(this.options.dataDir, 'live'), window.marketId));
    } catch (err) {
      // Window stays known; the next tick tries again
      rateLimitedLog(log, 'error', `task_start:${window.marketId}`, 60_000, 'task.start_failed', {
        marketId: window.marketId,
        ...safeErrorData(err),
      });
      return;
    }
    const handler = new BookCaptureHandler(window.marketId, book, bookLog);

    const task: CaptureTask = {
      window,
      book,
      bookLog,
      handler,
      listener: this.createListener(window, handler),
      restarts: 0,
      lastSignalAt: 0,
    };
    this.tasks.set(window.marketId, task);
    task.listener.start();

    log.info('task.started', {
      marketId: window.marketId,
      slug: window.slug,
      asset: window.asset,
      tokenId: book.tokenId,
      active: this.tasks.size,
    });
  }

  private createListener(window: MarketWindow, handler: BookCaptureHandler): OrderBookListener {
    return new OrderBookListener(
      window.marketId,
      window.tokenIds[0],
      handler.handle,
      { url: this.options.clobWsUrl, pingIntervalMs: this.options.pingIntervalSec * 1000 },
      (reason) => {
        if (reason !== 'stopped') {
          log.warn('listener.closed_early', { marketId: window.marketId, reason });
        }
      },
      this.socketFactory,
    );
  }

  private restartListener(task: CaptureTask): void {
    task.restarts++;
    task.listener = this.createListener(task.window, task.handler);
    task.listener.start();
    log.info('listener.restarted', { marketId: task.window.marketId, restarts: task.restarts });
  }

  private maybeEmitSignal(task: CaptureTask, now: number): void {
    const { signals, onSignal } = this.deps;
    if (!signals || !onSignal) return;
    if (now < task.window.startTime.getTime()) return;
    if (now - task.lastSignalAt < this.options.signalIntervalSec * 1000) return;

    task.lastSignalAt = now;
    const result = signals.evaluate(task.window, task.book, now);
    if (!result.ok) {
      rateLimitedLog(log, 'debug', `signal_skip:${task.window.marketId}`, 60_000, 'signal.skipped', {
        marketId: task.window.marketId,
        reason: result.reason,
      });
      return;
    }
    onSignal(task.window, result);
  }

  private teardown(marketId: string, reason: string): void {
    const task = this.tasks.get(marketId);
    if (!task) return;

    this.tasks.delete(marketId);
    task.listener.stop();
    task.bookLog.close();

    log.info('task.stopped', {
      marketId,
      reason,
      rows: task.bookLog.rowsWritten(),
      restarts: task.restarts,
      active: this.tasks.size,
    });
  }

  private logStats(): void {
    const stats = this.getStats();
    log.info('capture.stats', {
      knownWindows: stats.knownWindows,
      activeTasks: stats.activeTasks,
      markets: stats.markets.map(m => ({
        slug: m.slug,
        state: m.listenerState,
        valid: m.validUpdates,
        invalid: m.invalidUpdates,
        restarts: m.restarts,
      })),
    });
  }
}
