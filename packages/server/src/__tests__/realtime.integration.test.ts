import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import WebSocket, { type RawData } from 'ws';
import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import { closeReasonFromCode, joinTokenResponseSchema } from '@huddle/schemas';
import { loadConfig } from '../config.js';
import { createMetricsBundle } from '../metrics/registry.js';
import { createReadinessController } from '../readiness.js';
import type { RoomRegistry } from '../rooms/registry.js';
import { createServer } from '../server.js';
import { CLIENT_INIT_DATA } from './helpers/harness.js';

const ADMIN_HEADERS = { authorization: 'Bearer test-admin-key' };

const messageSchema = z.record(z.string(), z.unknown());
type Message = z.infer<typeof messageSchema>;

interface Waiter {
  predicate: (message: Message) => boolean;
  resolve: (message: Message) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

interface CloseFrame {
  code: number;
  reason: string;
}

const config = loadConfig({
  NODE_ENV: 'test',
  HOST: '127.0.0.1',
  PORT: '0',
  LOG_LEVEL: 'silent',
  JWT_SECRET: 'test-secret',
  ADMIN_API_KEY: 'test-admin-key',
  BOOTSTRAP_ROOMS: 'main',
});

class SignalTestClient {
  readonly messages: Message[] = [];
  readonly closed: Promise<CloseFrame>;
  private readonly socket: WebSocket;
  private waiters: Waiter[] = [];

  private constructor(socket: WebSocket) {
    this.socket = socket;
    this.closed = new Promise<CloseFrame>((resolve) => {
      socket.on('close', (code: number, reason: Buffer) => {
        resolve({ code, reason: reason.toString('utf8') });
        for (const waiter of this.waiters) {
          clearTimeout(waiter.timeout);
          waiter.reject(new Error(`Socket closed with ${code} while waiting for a message`));
        }
        this.waiters = [];
      });
    });

    socket.on('message', (data: RawData) => {
      const message = messageSchema.parse(JSON.parse(data.toString()));
      this.messages.push(message);
      for (const waiter of [...this.waiters]) {
        if (waiter.predicate(message)) {
          clearTimeout(waiter.timeout);
          this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
          waiter.resolve(message);
        }
      }
    });
  }

  static async connect(url: string): Promise<SignalTestClient> {
    const socket = new WebSocket(url);
    const client = new SignalTestClient(socket);
    await new Promise<void>((resolve, reject) => {
      socket.once('open', () => resolve());
      socket.once('error', reject);
    });
    return client;
  }

  send(value: unknown): void {
    this.socket.send(JSON.stringify(value));
  }

  sendRaw(text: string): void {
    this.socket.send(text);
  }

  waitFor(predicate: (message: Message) => boolean, timeoutMs = 5_000): Promise<Message> {
    const existing = this.messages.find((message) => predicate(message));
    if (existing) {
      return Promise.resolve(existing);
    }

    return new Promise<Message>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.waiters = this.waiters.filter((candidate) => candidate.timeout !== timeout);
        reject(new Error('Timed out waiting for message'));
      }, timeoutMs);
      this.waiters.push({ predicate, resolve, reject, timeout });
    });
  }

  async request(command: Message & { id: string }): Promise<Message> {
    this.send(command);
    return this.waitFor((message) => message.id === command.id);
  }

  async close(): Promise<CloseFrame> {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(1000);
    }
    return this.closed;
  }

  terminate(): void {
    this.socket.terminate();
  }
}

const waitUntil = async (condition: () => boolean, timeoutMs = 5_000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
};

describe.sequential('realtime integration', () => {
  let app: FastifyInstance;
  let rooms: RoomRegistry;
  let wsUrl: string;
  let clients: SignalTestClient[] = [];

  beforeEach(async () => {
    clients = [];
    const server = await createServer({
      config,
      readiness: createReadinessController(),
      metrics: createMetricsBundle({ collectDefaults: false }),
    });
    app = server.app;
    rooms = server.rooms;

    await app.listen({ host: config.HOST, port: 0 });
    const address = app.server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Failed to determine server address for tests');
    }

    wsUrl = `ws://127.0.0.1:${address.port}${config.WS_PATH}`;
  });

  afterEach(async () => {
    for (const client of clients) {
      client.terminate();
    }
    clients = [];
    await app.close();
  });

  const issueToken = async (userId: string): Promise<string> => {
    const response = await app.inject({
      method: 'POST',
      url: '/rooms/main/tokens',
      headers: ADMIN_HEADERS,
      payload: { userId, name: userId },
    });
    return joinTokenResponseSchema.parse(response.json()).token;
  };

  const connectClient = async (): Promise<SignalTestClient> => {
    const client = await SignalTestClient.connect(wsUrl);
    clients.push(client);
    return client;
  };

  const joinRoom = async (userId: string): Promise<SignalTestClient> => {
    const client = await connectClient();
    const authReply = await client.request({
      id: 'auth',
      type: 'authenticate',
      roomId: 'main',
      token: await issueToken(userId),
    });
    expect(authReply).toMatchObject({ type: 'authenticate', userId, roomId: 'main' });

    const initReply = await client.request({
      id: 'init',
      type: 'initializeTransports',
      initData: CLIENT_INIT_DATA,
    });
    expect(initReply.type).toBe('initializeTransports');
    return client;
  };

  it('completes the handshake and serves room info', async () => {
    const alice = await joinRoom('alice');

    const info = await alice.request({ id: 'info', type: 'roomInfo' });

    expect(info).toEqual({
      id: 'info',
      type: 'roomInfo',
      roomId: 'main',
      videoAllowed: false,
      users: { alice: { id: 'alice', name: 'alice', producing: [] } },
    });
  });

  it('closes with 1003 for a frame that is not a command', async () => {
    const client = await connectClient();

    client.sendRaw('definitely not json');
    const frame = await client.closed;

    expect(frame).toEqual({ code: 1003, reason: 'Unable to parse data' });
    expect(closeReasonFromCode(frame.code)).toBe('InvalidData');
  });

  it('closes with 4001 for an invalid token', async () => {
    const client = await connectClient();

    client.send({ type: 'authenticate', roomId: 'main', token: 'test-token' });

    await expect(client.closed).resolves.toEqual({ code: 4001, reason: 'Invalid token' });
  });

  it('kicks a member through the admin API', async () => {
    const alice = await joinRoom('alice');
    const bob = await joinRoom('bob');

    const response = await app.inject({
      method: 'DELETE',
      url: '/rooms/main/users/alice',
      headers: ADMIN_HEADERS,
    });
    expect(response.statusCode).toBe(204);

    const frame = await alice.closed;
    expect(closeReasonFromCode(frame.code)).toBe('Kicked');
    expect(frame.reason).toBe('You have been kicked!');
    await expect(bob.waitFor((message) => message.type === 'userLeft')).resolves.toEqual({
      type: 'userLeft',
      id: 'alice',
    });
  });

  it('closes every member with 4004 when the room is deleted', async () => {
    const alice = await joinRoom('alice');
    const bob = await joinRoom('bob');

    await app.inject({ method: 'DELETE', url: '/rooms/main', headers: ADMIN_HEADERS });

    await expect(alice.closed).resolves.toEqual({ code: 4004, reason: 'Room has been closed' });
    await expect(bob.closed).resolves.toEqual({ code: 4004, reason: 'Room has been closed' });
  });

  it('releases the membership when the client disconnects', async () => {
    const alice = await joinRoom('alice');
    const room = rooms.get('main');
    expect(room?.users.has('alice')).toBe(true);

    await alice.close();

    await waitUntil(() => room?.users.has('alice') === false);
    await waitUntil(() => app.realtime.connectionCount === 0);
  });
});
