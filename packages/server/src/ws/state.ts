import type { Command, CommandOf, CloseReason } from '@huddle/schemas';
import type { MediaSession } from '../media/types.js';
import type { Room, RoomUser } from '../rooms/types.js';

export type ConnectionState =
  | { phase: 'unauthenticated' }
  | { phase: 'authenticated'; room: Room; user: RoomUser }
  | { phase: 'transportReady'; room: Room; user: RoomUser; session: MediaSession }
  | { phase: 'closed'; reason: CloseReason | null };

export type ConnectionPhase = ConnectionState['phase'];

export type StateOf<Phase extends ConnectionPhase> = Extract<ConnectionState, { phase: Phase }>;

/** Commands each phase accepts; anything else ends the session with `InvalidState`. */
interface PhaseCommands {
  unauthenticated: 'authenticate';
  authenticated: 'initializeTransports';
  transportReady:
    | 'connectTransport'
    | 'roomInfo'
    | 'startProduce'
    | 'stopProduce'
    | 'consume'
    | 'resumeConsumer';
  closed: never;
}

const PERMITTED_COMMANDS: { [Phase in ConnectionPhase]: ReadonlySet<PhaseCommands[Phase]> } = {
  unauthenticated: new Set(['authenticate'] as const),
  authenticated: new Set(['initializeTransports'] as const),
  transportReady: new Set([
    'connectTransport',
    'roomInfo',
    'startProduce',
    'stopProduce',
    'consume',
    'resumeConsumer',
  ] as const),
  closed: new Set<never>(),
};

const PHASE_ORDER: Record<ConnectionPhase, number> = {
  unauthenticated: 0,
  authenticated: 1,
  transportReady: 2,
  closed: 3,
};

export const acceptsCommand = <Phase extends ConnectionPhase>(
  phase: Phase,
  command: Command,
): command is CommandOf<PhaseCommands[Phase]> => {
  const permitted: ReadonlySet<string> = PERMITTED_COMMANDS[phase];
  return permitted.has(command.type);
};

export interface ConnectionTracker {
  readonly state: ConnectionState;
  /** Moves strictly forward; revisiting or skipping back to a phase throws. */
  advance(next: ConnectionState): void;
  /** Room membership held for the interval [authenticated, closed). */
  membership(): { room: Room; user: RoomUser } | null;
}

export const createConnectionTracker = (): ConnectionTracker => {
  let state: ConnectionState = { phase: 'unauthenticated' };

  return {
    get state() {
      return state;
    },
    advance(next: ConnectionState): void {
      if (PHASE_ORDER[next.phase] <= PHASE_ORDER[state.phase]) {
        throw new Error(`Illegal connection transition ${state.phase} -> ${next.phase}`);
      }

      state = next;
    },
    membership() {
      if (state.phase === 'authenticated' || state.phase === 'transportReady') {
        return { room: state.room, user: state.user };
      }

      return null;
    },
  };
};
