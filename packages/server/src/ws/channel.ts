// @module: server-ws-channel
// @tags: websocket, transport

import WebSocket, { type RawData } from 'ws';

export type InboundFrame = { kind: 'text'; text: string } | { kind: 'binary' };

/** One client's bidirectional message stream. */
export interface SignalChannel {
  /** Resolves `null` once the client has gone away; rejects on a transport failure. */
  next(): Promise<InboundFrame | null>;
  send(text: string): Promise<void>;
  /** Sends a close frame; without a code the frame carries no status. */
  close(code?: number, reason?: string): Promise<void>;
}

interface Waiter {
  resolve: (frame: InboundFrame | null) => void;
  reject: (error: Error) => void;
}

const rawDataToString = (data: RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
};

export const createWsChannel = (socket: WebSocket): SignalChannel => {
  const frames: InboundFrame[] = [];
  let waiters: Waiter[] = [];
  let failure: Error | null = null;
  let ended = false;

  const settleWaiters = (): void => {
    const pending = waiters;
    waiters = [];
    for (const waiter of pending) {
      if (failure) {
        waiter.reject(failure);
      } else {
        waiter.resolve(null);
      }
    }
  };

  const push = (frame: InboundFrame): void => {
    const waiter = waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
      return;
    }

    frames.push(frame);
  };

  socket.on('message', (data: RawData, isBinary: boolean) => {
    if (ended) {
      return;
    }

    push(isBinary ? { kind: 'binary' } : { kind: 'text', text: rawDataToString(data) });
  });

  socket.on('error', (error: Error) => {
    failure ??= error;
    ended = true;
    settleWaiters();
  });

  socket.on('close', () => {
    ended = true;
    settleWaiters();
  });

  const next = (): Promise<InboundFrame | null> => {
    const buffered = frames.shift();
    if (buffered) {
      return Promise.resolve(buffered);
    }

    if (failure) {
      return Promise.reject(failure);
    }

    if (ended) {
      return Promise.resolve(null);
    }

    return new Promise<InboundFrame | null>((resolve, reject) => {
      waiters.push({ resolve, reject });
    });
  };

  const send = (text: string): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      if (socket.readyState !== WebSocket.OPEN) {
        reject(new Error('WebSocket is not open'));
        return;
      }

      socket.send(text, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }

        resolve();
      });
    });

  const close = async (code?: number, reason?: string): Promise<void> => {
    if (socket.readyState === WebSocket.CLOSING || socket.readyState === WebSocket.CLOSED) {
      return;
    }

    if (code === undefined) {
      socket.close();
      return;
    }

    socket.close(code, reason);
  };

  return { next, send, close };
};
