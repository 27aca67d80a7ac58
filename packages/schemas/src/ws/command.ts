// @module: shared-ws-command
// @tags: websocket, schema, commands
import { z } from 'zod';
import { buildCommandSchema } from './envelope.js';
import {
  produceTypeSchema,
  rtpParametersSchema,
  transportConnectRequestSchema,
  transportInitRequestSchema,
} from './media.js';

export const authenticateCommandSchema = buildCommandSchema('authenticate', {
  roomId: z.string().min(1, 'roomId is required'),
  token: z.string().min(1, 'token is required'),
});

export const initializeTransportsCommandSchema = buildCommandSchema('initializeTransports', {
  initData: transportInitRequestSchema,
});

export const connectTransportCommandSchema = buildCommandSchema('connectTransport', {
  connectData: transportConnectRequestSchema,
});

export const roomInfoCommandSchema = buildCommandSchema('roomInfo', {});

export const startProduceCommandSchema = buildCommandSchema('startProduce', {
  produceType: produceTypeSchema,
  rtpParameters: rtpParametersSchema,
});

export const stopProduceCommandSchema = buildCommandSchema('stopProduce', {
  produceType: produceTypeSchema,
});

export const consumeCommandSchema = buildCommandSchema('consume', {
  userId: z.string().min(1, 'userId is required'),
  produceType: produceTypeSchema,
});

export const resumeConsumerCommandSchema = buildCommandSchema('resumeConsumer', {
  consumerId: z.string().min(1, 'consumerId is required'),
});

export const commandSchema = z.discriminatedUnion('type', [
  authenticateCommandSchema,
  initializeTransportsCommandSchema,
  connectTransportCommandSchema,
  roomInfoCommandSchema,
  startProduceCommandSchema,
  stopProduceCommandSchema,
  consumeCommandSchema,
  resumeConsumerCommandSchema,
]);

export type Command = z.infer<typeof commandSchema>;
export type CommandType = Command['type'];
export type CommandOf<Type extends CommandType> = Extract<Command, { type: Type }>;
