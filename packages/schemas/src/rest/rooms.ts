import { z } from 'zod';
import { userInfoSchema } from '../ws/reply.js';

export const roomIdSchema = z
  .string()
  .min(1, 'room id must not be empty')
  .max(64, 'room id must be at most 64 characters')
  .regex(/^[A-Za-z0-9_-]+$/, 'room id may only contain letters, digits, "-" and "_"');

export const roomCreateRequestSchema = z
  .object({
    id: roomIdSchema.optional(),
  })
  .default({});

export const roomParamsSchema = z.object({
  roomId: z.string().min(1),
});

export const roomUserParamsSchema = roomParamsSchema.extend({
  userId: z.string().min(1),
});

export const joinTokenRequestSchema = z.object({
  userId: z.string().min(1).max(64).optional(),
  name: z.string().trim().min(1, 'name is required').max(64),
});

export const roomSummarySchema = z.object({
  id: z.string().min(1),
  videoAllowed: z.literal(false),
  users: z.array(userInfoSchema),
});

export const roomResponseSchema = z.object({
  room: roomSummarySchema,
});

export const roomListResponseSchema = z.object({
  rooms: z.array(roomSummarySchema),
});

export const joinTokenResponseSchema = z.object({
  token: z.string().min(1),
  userId: z.string().min(1),
  expiresIn: z.number().int().positive(),
});

export type RoomCreateRequest = z.infer<typeof roomCreateRequestSchema>;
export type JoinTokenRequest = z.infer<typeof joinTokenRequestSchema>;
export type RoomSummary = z.infer<typeof roomSummarySchema>;
export type JoinTokenResponse = z.infer<typeof joinTokenResponseSchema>;
