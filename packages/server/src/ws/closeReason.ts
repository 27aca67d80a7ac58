import type { CloseReason } from '@huddle/schemas';

/** Ends the session with the given close reason. */
export class SignalingCloseError extends Error {
  readonly reason: CloseReason;

  constructor(reason: CloseReason, options?: { cause?: unknown }) {
    super(`Signaling session closed: ${reason}`, options);
    this.name = 'SignalingCloseError';
    this.reason = reason;
  }
}

export type SessionOutcome = { ok: true } | { ok: false; reason: CloseReason };

export const toCloseReason = (error: unknown): CloseReason =>
  error instanceof SignalingCloseError ? error.reason : 'ServerError';
