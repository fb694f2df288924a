/**
 * In-process stand-in for a ws connection.
 * Tests drive it by emitting 'open' / 'message' / 'close' / 'error'.
 */

import { EventEmitter } from 'events';
import { StreamSocket, SocketFactory } from '../../live/stream-socket';

export class FakeSocket extends EventEmitter implements StreamSocket {
  readonly sent: string[] = [];
  terminated = false;
  sendFailure: 'none' | 'throw' | 'callback' = 'none';

  constructor(readonly url: string) {
    super();
  }

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.sendFailure === 'throw') throw new Error('socket not open');
    if (this.sendFailure === 'callback') {
      cb?.(new Error('write after end'));
      return;
    }
    this.sent.push(data);
    cb?.();
  }

  close(): void {
    this.terminated = true;
  }

  terminate(): void {
    this.terminated = true;
  }

  receive(payload: unknown): void {
    const text = typeof payload === 'string' ? payload : JSON.stringify(payload);
    this.emit('message', Buffer.from(text));
  }
}

export function fakeSocketFactory(): { factory: SocketFactory; sockets: FakeSocket[] } {
  const sockets: FakeSocket[] = [];
  const factory: SocketFactory = (url) => {
    const socket = new FakeSocket(url);
    sockets.push(socket);
    return socket;
  };
  return { factory, sockets };
}

/** Last socket handed out; fails the test when none was created */
export function lastSocket(sockets: FakeSocket[]): FakeSocket {
  const socket = sockets[sockets.length - 1];
  if (!socket) throw new Error('no socket created');
  return socket;
}
