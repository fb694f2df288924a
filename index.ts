/**
 * Up/Down Capture - Entry Point
 *
 * Streams oracle prices and per-market order books for 15-minute crypto
 * up/down markets, persists top-of-book rows and emits fair-value signals.
 *
 * Usage: npm start
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

import { CaptureConfig, loadCaptureConfig, validateCaptureConfig, logCaptureConfig } from './core/config';
import { createLogger, safeErrorData } from './core/logger';
import { PriceSeriesCache } from './core/price-series-cache';
import { formatFairValue } from './core/fair-value';
import { MarketWindowScanner } from './live/market-scanner';
import { OracleListener } from './live/oracle-listener';
import { CaptureCoordinator } from './live/capture-coordinator';
import { SignalService } from './live/signal-service';
import { SignalLog, toSignalRecord } from './live/signal-log';

dotenv.config();

const log = createLogger('Main');

class UpDownCapture {
  private config: CaptureConfig;
  private cache: PriceSeriesCache;
  private oracle: OracleListener;
  private coordinator: CaptureCoordinator;
  private signalLog: SignalLog;
  private isRunning = false;

  constructor() {
    this.config = loadCaptureConfig();
    validateCaptureConfig(this.config);
    logCaptureConfig(this.config);

    const c = this.config;
    this.cache = new PriceSeriesCache(c.priceMaxAgeSec * 1000);
    this.oracle = new OracleListener(this.cache, {
      url: c.rtdsWsUrl,
      receiveTimeoutMs: c.receiveTimeoutSec * 1000,
      reconnectDelayMs: c.reconnectDelayMs,
    });

    const scanner = new MarketWindowScanner({
      gammaUrl: c.gammaUrl,
      horizonSec: c.horizonSec,
      pageSize: c.scanPageSize,
      maxPages: c.scanMaxPages,
      requestTimeoutMs: c.requestTimeoutMs,
    });

    const signals = new SignalService(this.cache, {
      minEdge: c.minEdge,
      sigmaFloor: c.sigmaFloor,
      defaultVolatility: c.defaultVolatility,
      volLookbackMinutes: c.volLookbackMinutes,
    });
    this.signalLog = new SignalLog(path.join(c.dataDir, 'signals.jsonl'));

    this.coordinator = new CaptureCoordinator(scanner, {
      clobWsUrl: c.clobWsUrl,
      dataDir: c.dataDir,
      schedulerTickSec: c.schedulerTickSec,
      scanIntervalSec: c.scanIntervalSec,
      startBufferSec: c.startBufferSec,
      stopBufferSec: c.stopBufferSec,
      maxListeners: c.maxListeners,
      bookLevels: c.bookLevels,
      pingIntervalSec: c.pingIntervalSec,
      signalIntervalSec: c.signalIntervalSec,
      statsIntervalSec: c.statsIntervalSec,
    }, {
      signals,
      onSignal: (window, priced) => {
        if (priced.signal.action !== 'none') {
          log.info('signal.emitted', {
            slug: window.slug,
            action: priced.signal.action,
            entry: priced.signal.entryPrice,
            edge: priced.signal.edge,
            model: formatFairValue(priced.fair, priced.current, priced.strike),
          });
        }
        this.signalLog.append(toSignalRecord(window, priced));
      },
    });
  }

  async start(): Promise<void> {
    this.isRunning = true;
    this.oracle.start();
    await this.coordinator.start();
  }

  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;

    this.coordinator.stop();
    this.oracle.stop();
    log.info('shutdown.complete', { signalsWritten: this.signalLog.count(), oracle: this.oracle.getStats() });
  }
}

async function main(): Promise<void> {
  const capture = new UpDownCapture();

  process.on('SIGINT', () => {
    capture.stop();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    capture.stop();
    process.exit(0);
  });

  await capture.start();
}

main().catch((error: unknown) => {
  log.error('startup.failed', safeErrorData(error));
  process.exit(1);
});
