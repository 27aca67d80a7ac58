// @module: server-ws-event-loop
// @tags: websocket, broadcast, webrtc

import type { CloseReason, Command, CommandOf, SignalEvent, UserInfo } from '@huddle/schemas';
import type { RoomEvent, RoomSubscription } from '../rooms/events.js';
import type { InboundFrame } from './channel.js';
import { SignalingCloseError } from './closeReason.js';
import {
  parseCommand,
  readFrame,
  sendEvent,
  sendFailure,
  sendReply,
  type SessionContext,
} from './context.js';
import { acceptsCommand, type ConnectionTracker, type StateOf } from './state.js';

type ActiveSession = StateOf<'transportReady'>;

type LoopSignal =
  | { source: 'client'; frame: InboundFrame | null }
  | { source: 'room'; event: RoomEvent | null };

export type RoomEventAction =
  | { action: 'forward'; event: SignalEvent }
  | { action: 'suppress' }
  | { action: 'close'; reason: CloseReason };

/** Decides what a room broadcast means for the connection owned by `selfId`. */
export const translateRoomEvent = (event: RoomEvent, selfId: string): RoomEventAction => {
  switch (event.type) {
    case 'userJoined':
      return event.userId === selfId
        ? { action: 'suppress' }
        : { action: 'forward', event: { type: 'userJoined', id: event.userId } };
    case 'userLeft':
      return event.userId === selfId
        ? { action: 'close', reason: 'Kicked' }
        : { action: 'forward', event: { type: 'userLeft', id: event.userId } };
    case 'userStartProduce':
      return event.userId === selfId
        ? { action: 'suppress' }
        : {
            action: 'forward',
            event: { type: 'userStartProduce', id: event.userId, produceType: event.produceType },
          };
    case 'userStopProduce':
      return event.userId === selfId
        ? { action: 'suppress' }
        : {
            action: 'forward',
            event: { type: 'userStopProduce', id: event.userId, produceType: event.produceType },
          };
    case 'roomDelete':
      return { action: 'close', reason: 'RoomClosed' };
  }
};

const readRoomEvent = async (subscription: RoomSubscription): Promise<RoomEvent | null> => {
  try {
    return await subscription.next();
  } catch (error) {
    throw new SignalingCloseError('ServerError', { cause: error });
  }
};

type Attempt<Value> = { ok: true; value: Value } | { ok: false };

const attempt = async <Value>(
  context: SessionContext,
  command: Command,
  operation: () => Promise<Value>,
): Promise<Attempt<Value>> => {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    context.logger.warn({ err: error, type: command.type }, 'Media operation failed');
    return { ok: false };
  }
};

const producerKey = (userId: string, produceType: string): string => `${userId}/${produceType}`;

const handleConnectTransport = async (
  context: SessionContext,
  { session }: ActiveSession,
  command: CommandOf<'connectTransport'>,
): Promise<void> => {
  const result = await attempt(context, command, () =>
    session.connectTransport(command.connectData),
  );
  if (!result.ok) {
    await sendFailure(context, command, { kind: 'transport_connection_failure' });
    return;
  }

  await sendReply(context, command.id, { type: 'connectTransport' });
};

const handleRoomInfo = async (
  context: SessionContext,
  { room }: ActiveSession,
  command: CommandOf<'roomInfo'>,
): Promise<void> => {
  const users: Record<string, UserInfo> = {};
  for (const member of room.users.snapshot()) {
    users[member.id] = member.toInfo();
  }

  await sendReply(context, command.id, {
    type: 'roomInfo',
    roomId: room.id,
    // Video is not offered to rooms yet.
    videoAllowed: false,
    users,
  });
};

const handleStartProduce = async (
  context: SessionContext,
  { room, user, session }: ActiveSession,
  command: CommandOf<'startProduce'>,
): Promise<void> => {
  const { produceType } = command;
  const result = await attempt(context, command, () =>
    session.produce(produceType, command.rtpParameters),
  );
  if (!result.ok) {
    await sendFailure(context, command, { kind: 'producer_failure' });
    return;
  }

  // membership may have been released while the media backend was producing
  if (!room.users.has(user.id)) {
    result.value.close();
    context.logger.info({ produceType }, 'Discarded producer created after leaving the room');
    await sendFailure(context, command, { kind: 'producer_failure' });
    return;
  }

  user.producers.set(produceType, result.value);
  room.broadcast({ type: 'userStartProduce', userId: user.id, produceType });
  await sendReply(context, command.id, { type: 'startProduce', producerId: result.value.id });
};

const handleStopProduce = async (
  context: SessionContext,
  { room, user }: ActiveSession,
  command: CommandOf<'stopProduce'>,
): Promise<void> => {
  const { produceType } = command;
  const producer = user.producers.get(produceType);
  if (!producer) {
    await sendFailure(context, command, {
      kind: 'producer_not_found',
      producerId: producerKey(user.id, produceType),
    });
    return;
  }

  user.producers.delete(produceType);
  producer.close();
  room.broadcast({ type: 'userStopProduce', userId: user.id, produceType });
  await sendReply(context, command.id, { type: 'stopProduce' });
};

const handleConsume = async (
  context: SessionContext,
  { room, session }: ActiveSession,
  command: CommandOf<'consume'>,
): Promise<void> => {
  const target = room.users.get(command.userId);
  if (!target) {
    await sendFailure(context, command, { kind: 'user_not_found', userId: command.userId });
    return;
  }

  const producer = target.producers.get(command.produceType);
  if (!producer || producer.closed) {
    await sendFailure(context, command, {
      kind: 'producer_not_found',
      producerId: producerKey(target.id, command.produceType),
    });
    return;
  }

  const result = await attempt(context, command, () => session.consume(producer));
  if (!result.ok) {
    await sendFailure(context, command, { kind: 'consumer_failure' });
    return;
  }

  await sendReply(context, command.id, { type: 'consume', consumerData: result.value });
};

const handleResumeConsumer = async (
  context: SessionContext,
  { session }: ActiveSession,
  command: CommandOf<'resumeConsumer'>,
): Promise<void> => {
  const result = await attempt(context, command, () => session.resumeConsumer(command.consumerId));
  if (!result.ok) {
    await sendFailure(context, command, { kind: 'consumer_failure' });
    return;
  }

  if (!result.value) {
    await sendFailure(context, command, {
      kind: 'consumer_not_found',
      consumerId: command.consumerId,
    });
    return;
  }

  await sendReply(context, command.id, { type: 'resumeConsumer' });
};

const handleCommand = async (
  context: SessionContext,
  active: ActiveSession,
  command: Command,
): Promise<void> => {
  if (!acceptsCommand('transportReady', command)) {
    context.logger.warn({ type: command.type }, 'Command not permitted in active session');
    throw new SignalingCloseError('InvalidState');
  }

  switch (command.type) {
    case 'connectTransport':
      return handleConnectTransport(context, active, command);
    case 'roomInfo':
      return handleRoomInfo(context, active, command);
    case 'startProduce':
      return handleStartProduce(context, active, command);
    case 'stopProduce':
      return handleStopProduce(context, active, command);
    case 'consume':
      return handleConsume(context, active, command);
    case 'resumeConsumer':
      return handleResumeConsumer(context, active, command);
  }
};

const handleRoomEvent = async (
  context: SessionContext,
  active: ActiveSession,
  event: RoomEvent,
): Promise<void> => {
  const outcome = translateRoomEvent(event, active.user.id);
  switch (outcome.action) {
    case 'suppress':
      return;
    case 'close':
      context.logger.info({ event: event.type, reason: outcome.reason }, 'Room ended the session');
      throw new SignalingCloseError(outcome.reason);
    case 'forward':
      await sendEvent(context, outcome.event);
  }
};

/**
 * Serves client commands and room broadcasts until the client leaves or
 * either side produces a terminal outcome. The source that lost a race keeps
 * its pending read for the next iteration, and the order in which the two are
 * offered alternates so a busy source cannot starve the other.
 */
export const runEventLoop = async (
  context: SessionContext,
  tracker: ConnectionTracker,
): Promise<void> => {
  const active = tracker.state;
  if (active.phase !== 'transportReady') {
    throw new Error(`Event loop started in ${active.phase} phase`);
  }

  const subscription = active.room.subscribe();
  if (!subscription) {
    throw new SignalingCloseError('RoomClosed');
  }

  try {
    // Removed between registration and subscribing; the userLeft event was missed.
    if (!active.room.users.has(active.user.id)) {
      throw new SignalingCloseError('Kicked');
    }

    let clientSignal: Promise<LoopSignal> | null = null;
    let roomSignal: Promise<LoopSignal> | null = null;
    let roomFirst = false;

    for (;;) {
      clientSignal ??= readFrame(context).then(
        (frame): LoopSignal => ({ source: 'client', frame }),
      );
      roomSignal ??= readRoomEvent(subscription).then(
        (event): LoopSignal => ({ source: 'room', event }),
      );

      const contenders = roomFirst ? [roomSignal, clientSignal] : [clientSignal, roomSignal];
      roomFirst = !roomFirst;
      const signal = await Promise.race(contenders);

      if (signal.source === 'client') {
        clientSignal = null;
        if (signal.frame === null) {
          return;
        }

        if (signal.frame.kind === 'text') {
          await handleCommand(context, active, parseCommand(context, signal.frame.text));
        }
        continue;
      }

      roomSignal = null;
      if (signal.event === null) {
        throw new SignalingCloseError('RoomClosed');
      }

      await handleRoomEvent(context, active, signal.event);
    }
  } finally {
    subscription.close();
  }
};
