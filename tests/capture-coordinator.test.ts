/**
 * CaptureCoordinator with an in-memory window source and fake sockets.
 * Book CSVs go to os.tmpdir().
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { CaptureCoordinator, CoordinatorOptions, SignalSink } from '../live/capture-coordinator';
import { WindowSource } from '../live/market-scanner';
import { SignalService } from '../live/signal-service';
import { PriceSeriesCache } from '../core/price-series-cache';
import { MarketWindow, WINDOW_DURATION_MS } from '../core/types';
import { BOOK_LOG_HEADER } from '../live/orderbook-log';
import { fakeSocketFactory, FakeSocket } from './helpers/fake-socket';

const T = Date.UTC(2026, 0, 1, 12, 0, 0);

function makeWindow(id: string, startMs: number): MarketWindow {
  return {
    marketId: id,
    conditionId: `0x${id}`,
    slug: `btc-updown-15m-${id}`,
    asset: 'btc',
    tokenIds: [`up-${id}`, `down-${id}`],
    startTime: new Date(startMs),
    endTime: new Date(startMs + WINDOW_DURATION_MS),
  };
}

class StaticSource implements WindowSource {
  calls = 0;
  constructor(public windows: MarketWindow[]) {}
  async scan(): Promise<MarketWindow[]> {
    this.calls++;
    return this.windows;
  }
}

describe('CaptureCoordinator', () => {
  let dir: string;
  let sockets: FakeSocket[];
  let options: CoordinatorOptions;
  let coordinator: CaptureCoordinator | null;

  function build(source: WindowSource, extra: Partial<CoordinatorOptions> = {}, onSignal?: SignalSink, signals?: SignalService): CaptureCoordinator {
    const fake = fakeSocketFactory();
    sockets = fake.sockets;
    coordinator = new CaptureCoordinator(source, { ...options, ...extra }, {
      socketFactory: fake.factory,
      onSignal,
      signals,
    });
    return coordinator;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'coordinator-test-'));
    coordinator = null;
    options = {
      clobWsUrl: 'wss://clob.test/ws/market',
      dataDir: dir,
      schedulerTickSec: 1,
      scanIntervalSec: 600,
      startBufferSec: 10,
      stopBufferSec: 10,
      maxListeners: 40,
      bookLevels: 5,
      pingIntervalSec: 10,
      signalIntervalSec: 30,
      statsIntervalSec: 300,
    };
  });

  afterEach(() => {
    coordinator?.stop();
    vi.useRealTimers();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('merges new windows and skips ones already past their bracket', async () => {
    const finished = makeWindow('old', T - WINDOW_DURATION_MS - 11_000);
    const source = new StaticSource([makeWindow('a', T + 5_000), finished]);
    const c = build(source);

    await c.rescan(T);

    expect(c.knowsWindow('a')).toBe(true);
    expect(c.knowsWindow('old')).toBe(false);
  });

  it('starts a listener once the start buffer is reached', async () => {
    const c = build(new StaticSource([makeWindow('a', T + 5_000), makeWindow('b', T + 60_000)]));
    await c.rescan(T);

    c.tick(T);
    expect(c.hasTask('a')).toBe(true);
    expect(c.hasTask('b')).toBe(false);
    expect(sockets).toHaveLength(1);

    sockets[0].emit('open');
    expect(sockets[0].sent[0]).toBe('{"type":"market","assets_ids":["up-a"]}');

    c.tick(T + 50_000);
    expect(c.hasTask('b')).toBe(true);
    expect(sockets).toHaveLength(2);

    // Existing tasks are not started twice
    c.tick(T + 51_000);
    expect(sockets).toHaveLength(2);
  });

  it('persists book updates to the per-market CSV', async () => {
    const c = build(new StaticSource([makeWindow('a', T)]));
    await c.rescan(T);
    c.tick(T);

    sockets[0].emit('open');
    sockets[0].receive({
      event_type: 'book',
      asset_id: 'up-a',
      timestamp: '1767268800000',
      bids: [{ price: '0.5', size: '10' }],
      asks: [{ price: '0.75', size: '20' }],
    });

    const lines = fs.readFileSync(path.join(dir, 'live', 'a.csv'), 'utf-8').trim().split('\n');
    expect(lines).toEqual([
      BOOK_LOG_HEADER,
      '1767268800000,2026-01-01T12:00:00.000Z,0.5,10,0.75,20,0.25,0.625,a',
    ]);
    expect(c.getStats().markets[0]).toMatchObject({ marketId: 'a', validUpdates: 1, listenerState: 'streaming' });
  });

  it('keeps ticking when a book log cannot be opened, and retries', async () => {
    const blocker = path.join(dir, 'live');
    fs.writeFileSync(blocker, 'not a directory');
    const c = build(new StaticSource([makeWindow('a', T)]));
    await c.rescan(T);

    expect(() => c.tick(T)).not.toThrow();
    expect(c.hasTask('a')).toBe(false);
    expect(c.knowsWindow('a')).toBe(true);
    expect(sockets).toHaveLength(0);

    fs.rmSync(blocker);
    c.tick(T + 1_000);

    expect(c.hasTask('a')).toBe(true);
    expect(sockets).toHaveLength(1);
    expect(fs.readFileSync(path.join(dir, 'live', 'a.csv'), 'utf-8')).toBe(`${BOOK_LOG_HEADER}\n`);
  });

  it('caps concurrent listeners', async () => {
    const c = build(new StaticSource([makeWindow('a', T), makeWindow('b', T), makeWindow('c', T)]), { maxListeners: 2 });
    await c.rescan(T);

    c.tick(T);

    expect(c.getStats().activeTasks).toBe(2);
    expect(sockets).toHaveLength(2);
    expect(c.hasTask('c')).toBe(false);
  });

  it('restarts a listener that closed inside the bracket', async () => {
    const c = build(new StaticSource([makeWindow('a', T)]));
    await c.rescan(T);
    c.tick(T);

    sockets[0].emit('close', 1006);
    c.tick(T + 1_000);

    expect(sockets).toHaveLength(2);
    expect(c.getStats().markets[0].restarts).toBe(1);
    sockets[1].emit('open');
    expect(sockets[1].sent[0]).toBe('{"type":"market","assets_ids":["up-a"]}');
  });

  it('tears down and forgets a window past its stop buffer', async () => {
    const window = makeWindow('a', T);
    const c = build(new StaticSource([window]));
    await c.rescan(T);
    c.tick(T);

    const closeAt = window.endTime.getTime() + 10_000;
    c.tick(closeAt);
    expect(c.hasTask('a')).toBe(true);

    c.tick(closeAt + 1);
    expect(c.hasTask('a')).toBe(false);
    expect(c.knowsWindow('a')).toBe(false);
    expect(sockets[0].terminated).toBe(true);
  });

  it('emits signals for started windows on the signal interval', async () => {
    const cache = new PriceSeriesCache();
    cache.add('cl', 'btc', T - 1_000, 100);
    const signals = new SignalService(cache, {
      minEdge: 0.05,
      sigmaFloor: 0.001,
      defaultVolatility: 0.01,
      volLookbackMinutes: 15,
    });
    const onSignal = vi.fn<SignalSink>();
    const c = build(new StaticSource([makeWindow('a', T + 5_000)]), {}, onSignal, signals);
    await c.rescan(T);

    c.tick(T);
    sockets[0].emit('open');
    sockets[0].receive({
      event_type: 'book',
      asset_id: 'up-a',
      timestamp: String(T),
      bids: [{ price: '0.49', size: '10' }],
      asks: [{ price: '0.51', size: '10' }],
    });

    // Window has not opened yet
    c.tick(T + 1_000);
    expect(onSignal).not.toHaveBeenCalled();

    c.tick(T + 6_000);
    expect(onSignal).toHaveBeenCalledTimes(1);
    const [window, priced] = onSignal.mock.calls[0];
    expect(window.marketId).toBe('a');
    expect(priced.signal.action).toBe('none');
    expect(priced.strike).toBe(100);

    c.tick(T + 7_000);
    expect(onSignal).toHaveBeenCalledTimes(1);

    c.tick(T + 36_000);
    expect(onSignal).toHaveBeenCalledTimes(2);
  });

  it('scans and ticks on start, then stops every task', async () => {
    vi.useFakeTimers({ now: T });
    const source = new StaticSource([makeWindow('a', T)]);
    const c = build(source);

    await c.start();
    expect(source.calls).toBe(1);
    expect(c.hasTask('a')).toBe(true);

    await vi.advanceTimersByTimeAsync(600_000);
    expect(source.calls).toBe(2);

    c.stop();
    expect(c.getStats().activeTasks).toBe(0);
    expect(sockets.every(s => s.terminated)).toBe(true);
  });
});
