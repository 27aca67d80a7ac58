import { describe, expect, it } from 'vitest';
import { decodeCommand } from '../ws/codec.js';
import { acceptsCommand, createConnectionTracker } from '../ws/state.js';
import { createHarness } from './helpers/harness.js';

const roomInfo = decodeCommand('{"type":"roomInfo"}');
const authenticate = decodeCommand('{"type":"authenticate","roomId":"main","token":"test-token"}');
const initialize = decodeCommand(
  JSON.stringify({ type: 'initializeTransports', initData: { rtpCapabilities: { codecs: [] } } }),
);

describe('acceptsCommand', () => {
  it('only lets authenticate through before authentication', () => {
    expect(acceptsCommand('unauthenticated', authenticate)).toBe(true);
    expect(acceptsCommand('unauthenticated', initialize)).toBe(false);
    expect(acceptsCommand('unauthenticated', roomInfo)).toBe(false);
  });

  it('only lets initializeTransports through after authentication', () => {
    expect(acceptsCommand('authenticated', initialize)).toBe(true);
    expect(acceptsCommand('authenticated', authenticate)).toBe(false);
    expect(acceptsCommand('authenticated', roomInfo)).toBe(false);
  });

  it('accepts media commands once transports are ready', () => {
    expect(acceptsCommand('transportReady', roomInfo)).toBe(true);
    expect(acceptsCommand('transportReady', authenticate)).toBe(false);
    expect(acceptsCommand('transportReady', initialize)).toBe(false);
  });

  it('accepts nothing once closed', () => {
    expect(acceptsCommand('closed', roomInfo)).toBe(false);
  });
});

describe('createConnectionTracker', () => {
  it('starts unauthenticated without membership', () => {
    const tracker = createConnectionTracker();

    expect(tracker.state).toEqual({ phase: 'unauthenticated' });
    expect(tracker.membership()).toBeNull();
  });

  it('holds membership from authentication until close', async () => {
    const harness = await createHarness();
    const user = await harness.room.users.register(harness.token('u-1'));
    if (!user) {
      throw new Error('registration failed');
    }

    const tracker = createConnectionTracker();
    tracker.advance({ phase: 'authenticated', room: harness.room, user });
    expect(tracker.membership()).toEqual({ room: harness.room, user });

    tracker.advance({ phase: 'closed', reason: 'Kicked' });
    expect(tracker.membership()).toBeNull();
    expect(tracker.state).toEqual({ phase: 'closed', reason: 'Kicked' });
  });

  it('refuses to move backwards or stay in place', async () => {
    const harness = await createHarness();
    const user = await harness.room.users.register(harness.token('u-1'));
    if (!user) {
      throw new Error('registration failed');
    }

    const tracker = createConnectionTracker();
    tracker.advance({ phase: 'authenticated', room: harness.room, user });

    expect(() => tracker.advance({ phase: 'unauthenticated' })).toThrow(
      'Illegal connection transition authenticated -> unauthenticated',
    );
    expect(() => tracker.advance({ phase: 'authenticated', room: harness.room, user })).toThrow(
      'Illegal connection transition authenticated -> authenticated',
    );
  });

  it('can close straight from the initial phase', () => {
    const tracker = createConnectionTracker();
    tracker.advance({ phase: 'closed', reason: null });

    expect(tracker.state).toEqual({ phase: 'closed', reason: null });
    expect(() => tracker.advance({ phase: 'closed', reason: null })).toThrow(
      'Illegal connection transition closed -> closed',
    );
  });
});
