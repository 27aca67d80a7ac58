import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import WebSocket from 'ws';
import type { MediaBackend } from '../media/types.js';
import type { MetricsBundle } from '../metrics/registry.js';
import type { RoomDirectory } from '../rooms/types.js';
import { createWsChannel } from './channel.js';
import { runConnection } from './supervisor.js';

const SHUTDOWN_CLOSE_CODE = 1001;

interface ConnectionContext {
  app: FastifyInstance;
  socket: WebSocket;
  requestId: string;
}

interface RegisteredConnection {
  socket: WebSocket;
  logger: FastifyBaseLogger;
}

interface RealtimeDependencies {
  rooms: RoomDirectory;
  media: MediaBackend;
  metrics: MetricsBundle;
}

export interface RealtimeServer {
  handleConnection(context: ConnectionContext): void;
  readonly connectionCount: number;
  /** Resolves once every running session has finished its cleanup. */
  shutdown(): Promise<void>;
}

export const createRealtimeServer = ({
  rooms,
  media,
  metrics,
}: RealtimeDependencies): RealtimeServer => {
  const connections = new Map<string, RegisteredConnection>();
  const sessions = new Set<Promise<void>>();

  const handleConnection = ({ app, socket, requestId }: ConnectionContext): void => {
    const logger = app.log.child({ scope: 'ws', requestId });
    metrics.activeConnections.inc();
    connections.set(requestId, { socket, logger });
    logger.info('Signaling connection opened');

    socket.on('error', (error: Error) => {
      logger.error({ err: error }, 'WebSocket transport error');
    });

    const session = runConnection({
      channel: createWsChannel(socket),
      rooms,
      media,
      logger,
      metrics,
    })
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Unhandled error while running signaling session');
      })
      .finally(() => {
        connections.delete(requestId);
        metrics.activeConnections.dec();
        sessions.delete(session);
      });
    sessions.add(session);
  };

  const shutdown = async (): Promise<void> => {
    for (const connection of connections.values()) {
      try {
        connection.socket.close(SHUTDOWN_CLOSE_CODE, 'Server shutting down');
      } catch (error) {
        connection.logger.error({ err: error }, 'Error while closing signaling socket');
      }
    }

    await Promise.allSettled([...sessions]);
  };

  return {
    handleConnection,
    get connectionCount() {
      return connections.size;
    },
    shutdown,
  };
};
