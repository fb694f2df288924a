/**
 * Stream Socket
 *
 * The slice of a `ws` WebSocket the listeners use, so both streams can be
 * driven by an in-process stand-in.
 */

import WebSocket from 'ws';

export interface StreamSocket {
  send(data: string, cb?: (err?: Error) => void): void;
  close(): void;
  terminate(): void;
  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): this;
  on(event: 'close', listener: (code: number) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  removeAllListeners(): this;
}

export type SocketFactory = (url: string) => StreamSocket;

export const createWebSocket: SocketFactory = (url) => new WebSocket(url);

/**
 * Decode a ws payload to text
 */
export function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}
