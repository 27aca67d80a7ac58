// @module: shared-ws-close
// @tags: websocket, close-codes
import { z } from 'zod';

/** Terminal outcomes of a signaling session and the close frame each one sends. */
export const CLOSE_REASONS = {
  InvalidData: { code: 1003, text: 'Unable to parse data' },
  InvalidState: { code: 1002, text: 'Command executed in invalid state' },
  Unauthorized: { code: 4001, text: 'Invalid token' },
  Kicked: { code: 4003, text: 'You have been kicked!' },
  RoomClosed: { code: 4004, text: 'Room has been closed' },
  ServerError: { code: 1011, text: 'Internal Server Error' },
} as const;

export type CloseReason = keyof typeof CLOSE_REASONS;

export const closeReasonSchema = z.enum([
  'InvalidData',
  'InvalidState',
  'Unauthorized',
  'Kicked',
  'RoomClosed',
  'ServerError',
]);

export type CloseCode = (typeof CLOSE_REASONS)[CloseReason]['code'];

export const closeCodeOf = (reason: CloseReason): CloseCode => CLOSE_REASONS[reason].code;

export const closeTextOf = (reason: CloseReason): string => CLOSE_REASONS[reason].text;

export const closeReasonFromCode = (code: number): CloseReason | null => {
  const match = closeReasonSchema.options.find((reason) => CLOSE_REASONS[reason].code === code);
  return match ?? null;
};
