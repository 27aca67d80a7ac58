// @module: server-runtime
// @tags: fastify, websocket, infrastructure

import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { WebSocketServer } from 'ws';
import type { ReadinessController } from './readiness.js';
import type { ServerConfig } from './config.js';
import { resolveCorsOrigins } from './config.js';
import { decodeJoinToken } from './auth/jwt.js';
import { roomRoutes } from './api/rooms.js';
import { createMetricsBundle, type MetricsBundle } from './metrics/registry.js';
import { createLoopbackMediaBackend } from './media/loopback.js';
import type { MediaBackend } from './media/types.js';
import { createRoomRegistry, type RoomRegistry } from './rooms/registry.js';
import { createRealtimeServer } from './ws/connection.js';

export interface CreateServerOptions {
  config: ServerConfig;
  readiness: ReadinessController;
  media?: MediaBackend;
  metrics?: MetricsBundle;
}

export interface SignalingServer {
  app: FastifyInstance;
  rooms: RoomRegistry;
}

export const createServer = async ({
  config,
  readiness,
  media = createLoopbackMediaBackend(),
  metrics = createMetricsBundle(),
}: CreateServerOptions): Promise<SignalingServer> => {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
    },
  });

  const rooms = createRoomRegistry({
    media,
    verifyToken: (token) => decodeJoinToken(token, config),
    eventBufferSize: config.ROOM_EVENT_BUFFER,
    logger: app.log.child({ scope: 'rooms' }),
  });
  for (const roomId of config.BOOTSTRAP_ROOMS) {
    await rooms.createRoom(roomId);
  }

  const realtime = createRealtimeServer({ rooms, media, metrics });

  app.decorate('readiness', readiness);
  app.decorate('realtime', realtime);
  await app.register(cors, {
    origin: resolveCorsOrigins(config.CLIENT_ORIGIN),
    credentials: true,
  });

  await app.register(roomRoutes, { config, rooms });

  app.get('/healthz', async () => ({
    status: 'ok',
    connections: app.realtime.connectionCount,
  }));

  app.get('/readyz', async (request, reply) => {
    const controller = app.readiness;
    if (!controller.isReady()) {
      await reply.code(503).send({ status: controller.status() });
      return;
    }

    return { status: 'ready' };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', metrics.registry.contentType);
    return reply.send(await metrics.registry.metrics());
  });

  const wss = new WebSocketServer({
    server: app.server,
    path: config.WS_PATH,
    maxPayload: config.MAX_WS_MESSAGE_BYTES,
  });

  wss.on('connection', (socket) => {
    realtime.handleConnection({
      app,
      socket,
      requestId: randomUUID(),
    });
  });

  wss.on('error', (error: Error) => {
    app.log.error({ err: error }, 'WebSocket server error');
  });

  // Upgraded sockets keep the HTTP server open, so they are drained before it closes.
  app.addHook('preClose', async () => {
    readiness.markDraining();
    await realtime.shutdown();
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
  });

  app.addHook('onClose', async () => {
    await rooms.close();
  });

  return { app, rooms };
};
