// @module: server-ws-handshake
// @tags: websocket, auth, webrtc

import type { MediaSession } from '../media/types.js';
import { SignalingCloseError } from './closeReason.js';
import { readCommand, sendReply, type SessionContext } from './context.js';
import { acceptsCommand, type ConnectionTracker, type StateOf } from './state.js';

/**
 * Waits for `authenticate`, registers the token with the room and replies with
 * the router's RTP capabilities. Resolves `null` when the client leaves first.
 */
export const authenticatePhase = async (
  context: SessionContext,
  tracker: ConnectionTracker,
): Promise<StateOf<'authenticated'> | null> => {
  const command = await readCommand(context);
  if (command === null) {
    return null;
  }

  if (!acceptsCommand('unauthenticated', command)) {
    context.logger.warn({ type: command.type }, 'Command received before authentication');
    throw new SignalingCloseError('InvalidState');
  }

  const room = context.rooms.get(command.roomId);
  if (!room) {
    context.logger.warn({ roomId: command.roomId }, 'Authentication for unknown room');
    throw new SignalingCloseError('Unauthorized');
  }

  const user = await room.users.register(command.token);
  if (!user) {
    throw new SignalingCloseError('Unauthorized');
  }

  const authenticated: StateOf<'authenticated'> = { phase: 'authenticated', room, user };
  tracker.advance(authenticated);
  context.logger.info({ roomId: room.id, userId: user.id }, 'Client authenticated');

  const router = room.router();
  if (!router) {
    throw new SignalingCloseError('RoomClosed');
  }

  await sendReply(context, command.id, {
    type: 'authenticate',
    userId: user.id,
    roomId: room.id,
    rtpCapabilities: router.rtpCapabilities,
  });

  return authenticated;
};

/**
 * Waits for `initializeTransports` and negotiates the connection's media
 * session. Resolves `null` when the client leaves first.
 */
export const initializeTransportPhase = async (
  context: SessionContext,
  tracker: ConnectionTracker,
  authenticated: StateOf<'authenticated'>,
): Promise<StateOf<'transportReady'> | null> => {
  const command = await readCommand(context);
  if (command === null) {
    return null;
  }

  if (!acceptsCommand('authenticated', command)) {
    context.logger.warn({ type: command.type }, 'Command received before transport initialization');
    throw new SignalingCloseError('InvalidState');
  }

  const { room, user } = authenticated;
  const router = room.router();
  if (!router) {
    throw new SignalingCloseError('RoomClosed');
  }

  let session: MediaSession;
  try {
    session = await context.media.initializeSession(router, command.initData);
  } catch (error) {
    context.logger.error({ err: error, userId: user.id }, 'Failed to initialize media session');
    throw new SignalingCloseError('ServerError', { cause: error });
  }

  const ready: StateOf<'transportReady'> = { phase: 'transportReady', room, user, session };
  tracker.advance(ready);

  await sendReply(context, command.id, {
    type: 'initializeTransports',
    replyData: session.getInitData(),
  });

  return ready;
};
