// @module: server-ws-codec
// @tags: websocket, serialization

import {
  commandSchema,
  describeSignalFailure,
  withCorrelationId,
  type Command,
  type CorrelationId,
  type Reply,
  type SignalEvent,
  type SignalFailure,
} from '@huddle/schemas';
import { SignalingCloseError } from './closeReason.js';

/** Parses a text frame into a command; any failure ends the session with `InvalidData`. */
export const decodeCommand = (text: string): Command => {
  let candidate: unknown;
  try {
    candidate = JSON.parse(text);
  } catch (error) {
    throw new SignalingCloseError('InvalidData', { cause: error });
  }

  const parsed = commandSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new SignalingCloseError('InvalidData', { cause: parsed.error });
  }

  return parsed.data;
};

export const encodeReply = (id: CorrelationId, reply: Reply): string =>
  JSON.stringify(withCorrelationId(id, reply));

export const encodeEvent = (event: SignalEvent): string => JSON.stringify(event);

export const encodeError = (
  command: Pick<Command, 'id' | 'type'>,
  failure: SignalFailure,
): string =>
  JSON.stringify(
    withCorrelationId(command.id, {
      type: command.type,
      error: failure.kind,
      message: describeSignalFailure(failure),
    }),
  );
