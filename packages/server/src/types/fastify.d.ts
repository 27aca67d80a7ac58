import 'fastify';
import type { ReadinessController } from '../readiness.js';
import type { RealtimeServer } from '../ws/connection.js';

declare module 'fastify' {
  interface FastifyInstance {
    readiness: ReadinessController;
    realtime: RealtimeServer;
  }
}
