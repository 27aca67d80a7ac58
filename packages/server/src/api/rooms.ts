import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import {
  joinTokenRequestSchema,
  roomCreateRequestSchema,
  roomParamsSchema,
  roomUserParamsSchema,
  type RoomSummary,
} from '@huddle/schemas';
import { randomUUID } from 'node:crypto';
import { extractBearerToken, matchesApiKey } from '../auth/http.js';
import { signJoinToken } from '../auth/jwt.js';
import type { ServerConfig } from '../config.js';
import { RoomRegistryError, type RoomRegistry } from '../rooms/registry.js';
import type { Room } from '../rooms/types.js';

interface RoomRoutesOptions {
  config: ServerConfig;
  rooms: RoomRegistry;
}

const toRoomSummary = (room: Room): RoomSummary => ({
  id: room.id,
  videoAllowed: false,
  users: room.users.snapshot().map((user) => user.toInfo()),
});

export const roomRoutes: FastifyPluginAsync<RoomRoutesOptions> = async (
  app: FastifyInstance,
  options: RoomRoutesOptions,
): Promise<void> => {
  const { config, rooms } = options;

  const requireAdmin = async (request: FastifyRequest, reply: FastifyReply): Promise<boolean> => {
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      await reply.code(401).send({ message: 'Authentication required' });
      return false;
    }

    if (!matchesApiKey(token, config.ADMIN_API_KEY)) {
      request.log.warn('Rejected admin API key');
      await reply.code(401).send({ message: 'Invalid authentication token' });
      return false;
    }

    return true;
  };

  app.post('/rooms', async (request, reply) => {
    if (!(await requireAdmin(request, reply))) {
      return;
    }

    const bodyResult = roomCreateRequestSchema.safeParse(request.body);
    if (!bodyResult.success) {
      await reply.code(400).send({ message: 'Invalid request body', issues: bodyResult.error.issues });
      return;
    }

    try {
      const room = await rooms.createRoom(bodyResult.data.id);
      await reply.code(201).send({ room: toRoomSummary(room) });
    } catch (error) {
      if (error instanceof RoomRegistryError && error.code === 'room_exists') {
        await reply.code(409).send({ message: error.message });
        return;
      }

      throw error;
    }
  });

  app.get('/rooms', async (request, reply) => {
    if (!(await requireAdmin(request, reply))) {
      return;
    }

    await reply.send({ rooms: rooms.list().map((room) => toRoomSummary(room)) });
  });

  app.get('/rooms/:roomId', async (request, reply) => {
    if (!(await requireAdmin(request, reply))) {
      return;
    }

    const paramsResult = roomParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply.code(400).send({ message: 'Invalid room parameters', issues: paramsResult.error.issues });
      return;
    }

    const room = rooms.get(paramsResult.data.roomId);
    if (!room) {
      await reply.code(404).send({ message: 'Room not found' });
      return;
    }

    await reply.send({ room: toRoomSummary(room) });
  });

  app.delete('/rooms/:roomId', async (request, reply) => {
    if (!(await requireAdmin(request, reply))) {
      return;
    }

    const paramsResult = roomParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply.code(400).send({ message: 'Invalid room parameters', issues: paramsResult.error.issues });
      return;
    }

    const deleted = await rooms.deleteRoom(paramsResult.data.roomId);
    if (!deleted) {
      await reply.code(404).send({ message: 'Room not found' });
      return;
    }

    request.log.info({ roomId: paramsResult.data.roomId }, 'Room deleted by admin');
    await reply.code(204).send();
  });

  app.post('/rooms/:roomId/tokens', async (request, reply) => {
    if (!(await requireAdmin(request, reply))) {
      return;
    }

    const paramsResult = roomParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply.code(400).send({ message: 'Invalid room parameters', issues: paramsResult.error.issues });
      return;
    }
    const bodyResult = joinTokenRequestSchema.safeParse(request.body);
    if (!bodyResult.success) {
      await reply.code(400).send({ message: 'Invalid request body', issues: bodyResult.error.issues });
      return;
    }

    const room = rooms.get(paramsResult.data.roomId);
    if (!room) {
      await reply.code(404).send({ message: 'Room not found' });
      return;
    }

    const userId = bodyResult.data.userId ?? randomUUID();
    const token = signJoinToken({ userId, name: bodyResult.data.name, roomId: room.id }, config);

    reply.header('Cache-Control', 'no-store');
    await reply.code(201).send({ token, userId, expiresIn: config.TOKEN_TTL_SECONDS });
  });

  app.delete('/rooms/:roomId/users/:userId', async (request, reply) => {
    if (!(await requireAdmin(request, reply))) {
      return;
    }

    const paramsResult = roomUserParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply.code(400).send({ message: 'Invalid user parameters', issues: paramsResult.error.issues });
      return;
    }

    const { roomId, userId } = paramsResult.data;
    const room = rooms.get(roomId);
    if (!room) {
      await reply.code(404).send({ message: 'Room not found' });
      return;
    }

    const removed = await room.users.remove(userId);
    if (!removed) {
      await reply.code(404).send({ message: 'User not found' });
      return;
    }

    request.log.info({ roomId, userId }, 'User kicked by admin');
    await reply.code(204).send();
  });
};
