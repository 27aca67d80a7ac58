// @module: server-ws-supervisor
// @tags: websocket, lifecycle, cleanup

import { closeCodeOf, closeTextOf } from '@huddle/schemas';
import { toCloseReason, type SessionOutcome } from './closeReason.js';
import type { SessionContext } from './context.js';
import { runEventLoop } from './eventLoop.js';
import { authenticatePhase, initializeTransportPhase } from './handshake.js';
import { createConnectionTracker, type ConnectionTracker } from './state.js';

const runPhases = async (
  context: SessionContext,
  tracker: ConnectionTracker,
): Promise<SessionOutcome> => {
  const authenticated = await authenticatePhase(context, tracker);
  if (!authenticated) {
    return { ok: true };
  }

  const ready = await initializeTransportPhase(context, tracker, authenticated);
  if (!ready) {
    return { ok: true };
  }

  await runEventLoop(context, tracker);
  return { ok: true };
};

const releaseMembership = async (
  context: SessionContext,
  tracker: ConnectionTracker,
): Promise<void> => {
  const { state } = tracker;
  if (state.phase === 'transportReady') {
    try {
      state.session.close();
    } catch (error) {
      context.logger.error({ err: error }, 'Failed to close media session');
    }
  }

  const membership = tracker.membership();
  if (!membership) {
    return;
  }

  try {
    await membership.room.users.remove(membership.user.id);
  } catch (error) {
    context.logger.error(
      { err: error, roomId: membership.room.id, userId: membership.user.id },
      'Failed to remove user from room',
    );
  }
};

const sendCloseFrame = async (context: SessionContext, outcome: SessionOutcome): Promise<void> => {
  try {
    if (outcome.ok) {
      await context.channel.close();
      return;
    }

    await context.channel.close(closeCodeOf(outcome.reason), closeTextOf(outcome.reason));
  } catch (error) {
    context.logger.warn({ err: error }, 'Failed to send close frame');
  }
};

/**
 * Runs one client's session to completion: handshake, then the event loop.
 * Room membership acquired along the way is released exactly once before the
 * close frame goes out, whichever phase ended the session.
 */
export const runConnection = async (context: SessionContext): Promise<SessionOutcome> => {
  const tracker = createConnectionTracker();
  let outcome: SessionOutcome = { ok: false, reason: 'ServerError' };
  let userId: string | null = null;

  try {
    outcome = await runPhases(context, tracker);
  } catch (error) {
    const reason = toCloseReason(error);
    if (reason === 'ServerError') {
      context.logger.error({ err: error }, 'Signaling session failed');
    }
    outcome = { ok: false, reason };
  } finally {
    userId = tracker.membership()?.user.id ?? null;
    await releaseMembership(context, tracker);
    tracker.advance({ phase: 'closed', reason: outcome.ok ? null : outcome.reason });
  }

  await sendCloseFrame(context, outcome);
  context.metrics.connectionCloses.inc({ reason: outcome.ok ? 'Normal' : outcome.reason });

  if (outcome.ok) {
    context.logger.info({ userId }, 'Signaling session ended');
  } else {
    context.logger.info(
      { userId, code: closeCodeOf(outcome.reason), reason: closeTextOf(outcome.reason) },
      'Signaling session closed',
    );
  }

  return outcome;
};
