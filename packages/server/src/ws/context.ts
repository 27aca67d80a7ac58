import type { FastifyBaseLogger } from 'fastify';
import type {
  Command,
  CorrelationId,
  Reply,
  SignalEvent,
  SignalFailure,
} from '@huddle/schemas';
import type { MediaBackend } from '../media/types.js';
import type { MetricsBundle } from '../metrics/registry.js';
import type { RoomDirectory } from '../rooms/types.js';
import type { InboundFrame, SignalChannel } from './channel.js';
import { SignalingCloseError } from './closeReason.js';
import { decodeCommand, encodeError, encodeEvent, encodeReply } from './codec.js';

export interface SessionContext {
  channel: SignalChannel;
  rooms: RoomDirectory;
  media: MediaBackend;
  logger: FastifyBaseLogger;
  metrics: Pick<MetricsBundle, 'commands' | 'connectionCloses'>;
}

/** Next inbound frame; a receive failure ends the session with `ServerError`. */
export const readFrame = async (context: SessionContext): Promise<InboundFrame | null> => {
  try {
    return await context.channel.next();
  } catch (error) {
    throw new SignalingCloseError('ServerError', { cause: error });
  }
};

export const parseCommand = (context: SessionContext, text: string): Command => {
  const command = decodeCommand(text);
  context.metrics.commands.inc({ type: command.type });
  context.logger.debug({ type: command.type, id: command.id ?? null }, 'Received command');
  return command;
};

/**
 * Next text command, skipping frames that carry no text. Resolves `null` once
 * the client has gone away.
 */
export const readCommand = async (context: SessionContext): Promise<Command | null> => {
  for (;;) {
    const frame = await readFrame(context);
    if (frame === null) {
      return null;
    }

    if (frame.kind === 'text') {
      return parseCommand(context, frame.text);
    }
  }
};

const sendText = async (context: SessionContext, text: string): Promise<void> => {
  try {
    await context.channel.send(text);
  } catch (error) {
    throw new SignalingCloseError('ServerError', { cause: error });
  }
};

export const sendReply = (context: SessionContext, id: CorrelationId, reply: Reply): Promise<void> =>
  sendText(context, encodeReply(id, reply));

export const sendEvent = (context: SessionContext, event: SignalEvent): Promise<void> =>
  sendText(context, encodeEvent(event));

export const sendFailure = (
  context: SessionContext,
  command: Pick<Command, 'id' | 'type'>,
  failure: SignalFailure,
): Promise<void> => {
  context.logger.warn(
    { type: command.type, id: command.id ?? null, error: failure.kind },
    'Reporting command failure',
  );
  return sendText(context, encodeError(command, failure));
};
