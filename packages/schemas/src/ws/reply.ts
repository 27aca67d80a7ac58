// @module: shared-ws-reply
// @tags: websocket, schema, replies
import { z } from 'zod';
import { correlationIdSchema } from './envelope.js';
import {
  consumerDataSchema,
  produceTypeSchema,
  rtpCapabilitiesSchema,
  transportInitReplySchema,
} from './media.js';

export const userInfoSchema = z.object({
  id: z.string().min(1, 'user id required'),
  name: z.string().min(1, 'user name required'),
  producing: z.array(produceTypeSchema),
});

export const authenticateReplySchema = z.object({
  type: z.literal('authenticate'),
  userId: z.string().min(1),
  roomId: z.string().min(1),
  rtpCapabilities: rtpCapabilitiesSchema,
});

export const initializeTransportsReplySchema = z.object({
  type: z.literal('initializeTransports'),
  replyData: transportInitReplySchema,
});

export const connectTransportReplySchema = z.object({
  type: z.literal('connectTransport'),
});

export const roomInfoReplySchema = z.object({
  type: z.literal('roomInfo'),
  roomId: z.string().min(1),
  videoAllowed: z.literal(false),
  users: z.record(z.string(), userInfoSchema),
});

export const startProduceReplySchema = z.object({
  type: z.literal('startProduce'),
  producerId: z.string().min(1),
});

export const stopProduceReplySchema = z.object({
  type: z.literal('stopProduce'),
});

export const consumeReplySchema = z.object({
  type: z.literal('consume'),
  consumerData: consumerDataSchema,
});

export const resumeConsumerReplySchema = z.object({
  type: z.literal('resumeConsumer'),
});

export const replySchema = z.discriminatedUnion('type', [
  authenticateReplySchema,
  initializeTransportsReplySchema,
  connectTransportReplySchema,
  roomInfoReplySchema,
  startProduceReplySchema,
  stopProduceReplySchema,
  consumeReplySchema,
  resumeConsumerReplySchema,
]);

/** Reply as it appears on the wire, with the triggering command's id. */
export const replyEnvelopeSchema = z.intersection(
  z.object({ id: correlationIdSchema }),
  replySchema,
);

export type UserInfo = z.infer<typeof userInfoSchema>;
export type Reply = z.infer<typeof replySchema>;
export type ReplyType = Reply['type'];
export type ReplyEnvelope = z.infer<typeof replyEnvelopeSchema>;
