import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OracleListener, ORACLE_SUBSCRIPTION, parseOracleMessage } from '../live/oracle-listener';
import { PriceSeriesCache } from '../core/price-series-cache';
import { fakeSocketFactory, lastSocket, FakeSocket } from './helpers/fake-socket';

const OPTIONS = { url: 'wss://rtds.test', receiveTimeoutMs: 30_000, reconnectDelayMs: 200 };

function chainlink(symbol: string, timestamp: number, value: unknown): Record<string, unknown> {
  return { topic: 'crypto_prices_chainlink', type: 'update', payload: { symbol, timestamp, value } };
}

describe('parseOracleMessage', () => {
  it('routes Chainlink symbols to the cl source', () => {
    expect(parseOracleMessage(JSON.stringify(chainlink('btc/usd', 1000, 65000)))).toEqual({
      source: 'cl',
      asset: 'btc',
      timestamp: 1000,
      price: 65000,
    });
  });

  it('routes spot symbols to the bn source, reading the topic from the payload', () => {
    const msg = { payload: { topic: 'crypto_prices', symbol: 'ETHUSDT', timestamp: 2000.7, value: '3500.5' } };
    expect(parseOracleMessage(JSON.stringify(msg))).toEqual({
      source: 'bn',
      asset: 'eth',
      timestamp: 2000,
      price: 3500.5,
    });
  });

  it('drops bad values, unknown assets, unknown topics and malformed text', () => {
    expect(parseOracleMessage(JSON.stringify(chainlink('btc/usd', 1000, 0)))).toBeNull();
    expect(parseOracleMessage(JSON.stringify(chainlink('btc/usd', 1000, -5)))).toBeNull();
    expect(parseOracleMessage(JSON.stringify(chainlink('btc/usd', 1000, 'NaN')))).toBeNull();
    expect(parseOracleMessage(JSON.stringify(chainlink('doge/usd', 1000, 1)))).toBeNull();
    expect(parseOracleMessage(JSON.stringify(chainlink('btcusd', 1000, 1)))).toBeNull();
    expect(parseOracleMessage(JSON.stringify({ topic: 'activity', payload: { symbol: 'btc/usd', timestamp: 1, value: 1 } }))).toBeNull();
    expect(parseOracleMessage('not json')).toBeNull();
    expect(parseOracleMessage('')).toBeNull();
    expect(parseOracleMessage('[1,2]')).toBeNull();
  });
});

describe('OracleListener', () => {
  let cache: PriceSeriesCache;
  let sockets: FakeSocket[];
  let listener: OracleListener;

  beforeEach(() => {
    vi.useFakeTimers();
    cache = new PriceSeriesCache();
    const fake = fakeSocketFactory();
    sockets = fake.sockets;
    listener = new OracleListener(cache, OPTIONS, fake.factory);
  });

  afterEach(() => {
    listener.stop();
    vi.useRealTimers();
  });

  it('subscribes to both price topics on open', () => {
    listener.start();
    expect(listener.getState()).toBe('connecting');
    expect(sockets).toHaveLength(1);
    expect(sockets[0].url).toBe('wss://rtds.test');

    sockets[0].emit('open');

    expect(listener.getState()).toBe('subscribed');
    expect(sockets[0].sent).toEqual([JSON.stringify(ORACLE_SUBSCRIPTION)]);
    expect(JSON.parse(sockets[0].sent[0])).toEqual({
      action: 'subscribe',
      subscriptions: [
        { topic: 'crypto_prices_chainlink', type: 'update', filters: '' },
        { topic: 'crypto_prices', type: 'update', filters: '' },
      ],
    });
  });

  it('writes recognised updates into the cache and counts drops', () => {
    listener.start();
    const socket = lastSocket(sockets);
    socket.emit('open');

    socket.receive(chainlink('btc/usd', 1000, 65000));
    socket.receive({ topic: 'crypto_prices', payload: { symbol: 'solusdt', timestamp: 1500, value: 150 } });
    socket.receive(chainlink('doge/usd', 1000, 1));
    socket.receive('garbage');

    expect(listener.getState()).toBe('receiving');
    expect(cache.asOf('cl', 'btc', 1000)).toEqual({ timestamp: 1000, price: 65000 });
    expect(cache.asOf('bn', 'sol', 2000)).toEqual({ timestamp: 1500, price: 150 });
    expect(listener.getStats()).toMatchObject({ messages: 4, accepted: 2, dropped: 2, lastUpdateAt: 1500 });
  });

  it('reconnects after the receive timeout', () => {
    listener.start();
    sockets[0].emit('open');

    vi.advanceTimersByTime(29_999);
    expect(sockets[0].terminated).toBe(false);

    vi.advanceTimersByTime(1);
    expect(sockets[0].terminated).toBe(true);
    expect(listener.getState()).toBe('disconnected');
    expect(listener.getStats().timeouts).toBe(1);

    vi.advanceTimersByTime(199);
    expect(sockets).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(sockets).toHaveLength(2);
    expect(listener.getState()).toBe('connecting');
  });

  it('re-arms the receive timeout on every message', () => {
    listener.start();
    const socket = lastSocket(sockets);
    socket.emit('open');

    vi.advanceTimersByTime(20_000);
    socket.receive(chainlink('btc/usd', 1000, 65000));
    vi.advanceTimersByTime(20_000);
    expect(socket.terminated).toBe(false);

    vi.advanceTimersByTime(10_000);
    expect(socket.terminated).toBe(true);
  });

  it('times out a handshake that never completes', () => {
    listener.start();

    vi.advanceTimersByTime(30_000);

    expect(sockets[0].terminated).toBe(true);
    vi.advanceTimersByTime(200);
    expect(sockets).toHaveLength(2);
  });

  it('schedules a single reconnect when error and close both fire', () => {
    listener.start();
    const socket = lastSocket(sockets);
    socket.emit('open');

    socket.emit('error', new Error('ECONNRESET'));
    socket.emit('close', 1006);
    vi.advanceTimersByTime(200);

    expect(sockets).toHaveLength(2);
    expect(listener.getStats().reconnects).toBe(1);

    sockets[1].emit('open');
    sockets[1].receive(chainlink('eth/usd', 5000, 3000));
    expect(cache.latest('cl', 'eth')).toEqual({ timestamp: 5000, price: 3000 });
  });

  it('ignores events from a replaced socket', () => {
    listener.start();
    sockets[0].emit('close', 1000);
    vi.advanceTimersByTime(200);

    sockets[0].receive(chainlink('btc/usd', 1000, 65000));

    expect(cache.size('cl', 'btc')).toBe(0);
    expect(listener.getStats().messages).toBe(0);
  });

  it('retries when the socket cannot be created', () => {
    let calls = 0;
    const fake = fakeSocketFactory();
    listener = new OracleListener(cache, OPTIONS, (url) => {
      calls++;
      if (calls === 1) throw new Error('bad url');
      return fake.factory(url);
    });

    listener.start();
    expect(fake.sockets).toHaveLength(0);
    expect(listener.getState()).toBe('disconnected');

    vi.advanceTimersByTime(200);
    expect(fake.sockets).toHaveLength(1);
  });

  it('stops reconnecting after stop()', () => {
    listener.start();
    sockets[0].emit('close', 1006);
    listener.stop();

    vi.advanceTimersByTime(5_000);

    expect(sockets).toHaveLength(1);
    expect(listener.getState()).toBe('disconnected');
  });
});
