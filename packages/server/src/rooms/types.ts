import type { ProduceType, UserInfo } from '@huddle/schemas';
import type { MediaProducer, MediaRouter } from '../media/types.js';
import type { RoomEvent, RoomSubscription } from './events.js';

export interface RoomUser {
  readonly id: string;
  readonly name: string;
  readonly producers: Map<ProduceType, MediaProducer>;
  toInfo(): UserInfo;
}

export interface UserRegistry {
  /** Resolves `null` for an invalid token, a token for another room, or a user already present. */
  register(token: string): Promise<RoomUser | null>;
  /** Idempotent; resolves `true` only for the call that removed the user. */
  remove(userId: string): Promise<boolean>;
  has(userId: string): boolean;
  get(userId: string): RoomUser | null;
  snapshot(): RoomUser[];
}

export interface Room {
  readonly id: string;
  readonly users: UserRegistry;
  router(): MediaRouter | null;
  subscribe(): RoomSubscription | null;
  broadcast(event: RoomEvent): void;
}

export interface RoomDirectory {
  get(roomId: string): Room | null;
}
