// @module: server-room-registry
// @tags: rooms, membership, broadcast

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { ProduceType, UserInfo } from '@huddle/schemas';
import type { JoinClaims, VerifiedJoinToken } from '../auth/types.js';
import type { MediaBackend, MediaProducer, MediaRouter } from '../media/types.js';
import { createRoomEventBus, type RoomEvent, type RoomEventBus } from './events.js';
import type { Room, RoomDirectory, RoomUser, UserRegistry } from './types.js';

const PRODUCE_TYPE_ORDER: readonly ProduceType[] = ['audio', 'video', 'screen'];

export class RoomRegistryError extends Error {
  constructor(
    message: string,
    public readonly code: 'room_exists',
  ) {
    super(message);
    this.name = 'RoomRegistryError';
  }
}

export interface RoomRegistry extends RoomDirectory {
  createRoom(roomId?: string): Promise<Room>;
  /** Resolves `false` when no room has that id. */
  deleteRoom(roomId: string): Promise<boolean>;
  list(): Room[];
  close(): Promise<void>;
}

export interface RoomRegistryOptions {
  media: MediaBackend;
  verifyToken: (token: string) => VerifiedJoinToken;
  eventBufferSize: number;
  logger: FastifyBaseLogger;
}

const createRoomUser = (claims: JoinClaims): RoomUser => {
  const producers = new Map<ProduceType, MediaProducer>();

  return {
    id: claims.userId,
    name: claims.name,
    producers,
    toInfo(): UserInfo {
      return {
        id: claims.userId,
        name: claims.name,
        producing: PRODUCE_TYPE_ORDER.filter((produceType) => {
          const producer = producers.get(produceType);
          return producer !== undefined && !producer.closed;
        }),
      };
    },
  };
};

const closeProducers = (user: RoomUser): void => {
  for (const producer of user.producers.values()) {
    producer.close();
  }
  user.producers.clear();
};

const createUserRegistry = (
  roomId: string,
  events: RoomEventBus,
  verifyToken: RoomRegistryOptions['verifyToken'],
  logger: FastifyBaseLogger,
): UserRegistry => {
  const users = new Map<string, RoomUser>();
  // token id -> expiry (epoch seconds); a join token admits one session
  const consumedTokens = new Map<string, number>();

  const pruneConsumedTokens = (): void => {
    const nowSeconds = Math.floor(Date.now() / 1000);
    for (const [tokenId, expiresAt] of consumedTokens) {
      if (expiresAt <= nowSeconds) {
        consumedTokens.delete(tokenId);
      }
    }
  };

  const register = async (token: string): Promise<RoomUser | null> => {
    if (events.closed) {
      return null;
    }

    let claims: VerifiedJoinToken;
    try {
      claims = verifyToken(token);
    } catch (error) {
      logger.warn({ err: error, roomId }, 'Rejected room join token');
      return null;
    }

    if (claims.roomId !== roomId) {
      logger.warn({ roomId, tokenRoomId: claims.roomId }, 'Join token issued for another room');
      return null;
    }

    pruneConsumedTokens();
    if (consumedTokens.has(claims.tokenId)) {
      logger.warn({ roomId, userId: claims.userId }, 'Join token already used');
      return null;
    }

    if (users.has(claims.userId)) {
      logger.warn({ roomId, userId: claims.userId }, 'Join token already in use');
      return null;
    }

    consumedTokens.set(claims.tokenId, claims.expiresAt);
    const user = createRoomUser(claims);
    users.set(user.id, user);
    events.publish({ type: 'userJoined', userId: user.id });
    logger.info({ roomId, userId: user.id }, 'User joined room');
    return user;
  };

  const remove = async (userId: string): Promise<boolean> => {
    const user = users.get(userId);
    if (!user) {
      return false;
    }

    users.delete(userId);
    closeProducers(user);
    events.publish({ type: 'userLeft', userId });
    logger.info({ roomId, userId }, 'User left room');
    return true;
  };

  return {
    register,
    remove,
    has: (userId) => users.has(userId),
    get: (userId) => users.get(userId) ?? null,
    snapshot: () => Array.from(users.values()),
  };
};

const createRoom = (
  id: string,
  router: MediaRouter,
  options: RoomRegistryOptions,
): Room & { shutdown(): void } => {
  const events = createRoomEventBus(options.eventBufferSize);
  const users = createUserRegistry(id, events, options.verifyToken, options.logger);
  let activeRouter: MediaRouter | null = router;

  return {
    id,
    users,
    router: () => activeRouter,
    subscribe: () => events.subscribe(),
    broadcast: (event: RoomEvent) => events.publish(event),
    shutdown(): void {
      events.publish({ type: 'roomDelete' });
      events.close();
      activeRouter?.close();
      activeRouter = null;
    },
  };
};

export const createRoomRegistry = (options: RoomRegistryOptions): RoomRegistry => {
  const rooms = new Map<string, Room & { shutdown(): void }>();
  const { logger } = options;

  const createRoomEntry = async (roomId?: string): Promise<Room> => {
    const id = roomId ?? randomUUID();
    if (rooms.has(id)) {
      throw new RoomRegistryError(`Room ${id} already exists`, 'room_exists');
    }

    const router = await options.media.createRouter();
    // Another caller may have claimed the id while the router was being created.
    if (rooms.has(id)) {
      router.close();
      throw new RoomRegistryError(`Room ${id} already exists`, 'room_exists');
    }

    const room = createRoom(id, router, options);
    rooms.set(id, room);
    logger.info({ roomId: id, routerId: router.id }, 'Room created');
    return room;
  };

  const deleteRoom = async (roomId: string): Promise<boolean> => {
    const room = rooms.get(roomId);
    if (!room) {
      return false;
    }

    rooms.delete(roomId);
    room.shutdown();
    logger.info({ roomId }, 'Room deleted');
    return true;
  };

  const close = async (): Promise<void> => {
    for (const room of rooms.values()) {
      room.shutdown();
    }
    rooms.clear();
  };

  return {
    get: (roomId) => rooms.get(roomId) ?? null,
    createRoom: createRoomEntry,
    deleteRoom,
    list: () => Array.from(rooms.values()),
    close,
  };
};
