// @module: shared-ws-event
// @tags: websocket, schema, broadcast
import { z } from 'zod';
import { produceTypeSchema } from './media.js';

export const userJoinedEventSchema = z.object({
  type: z.literal('userJoined'),
  id: z.string().min(1),
});

export const userLeftEventSchema = z.object({
  type: z.literal('userLeft'),
  id: z.string().min(1),
});

export const userStartProduceEventSchema = z.object({
  type: z.literal('userStartProduce'),
  id: z.string().min(1),
  produceType: produceTypeSchema,
});

export const userStopProduceEventSchema = z.object({
  type: z.literal('userStopProduce'),
  id: z.string().min(1),
  produceType: produceTypeSchema,
});

export const signalEventSchema = z.discriminatedUnion('type', [
  userJoinedEventSchema,
  userLeftEventSchema,
  userStartProduceEventSchema,
  userStopProduceEventSchema,
]);

export type SignalEvent = z.infer<typeof signalEventSchema>;
