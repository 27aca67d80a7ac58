import { describe, expect, it } from 'vitest';
import { createLoopbackMediaBackend } from '../media/loopback.js';
import { RoomRegistryError } from '../rooms/registry.js';
import { CLIENT_DTLS_PARAMETERS, CLIENT_INIT_DATA, createHarness } from './helpers/harness.js';

describe('room registry', () => {
  it('creates rooms with generated ids and refuses duplicates', async () => {
    const harness = await createHarness();

    const generated = await harness.rooms.createRoom();
    expect(generated.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(generated.router()).not.toBeNull();

    await expect(harness.rooms.createRoom('main')).rejects.toBeInstanceOf(RoomRegistryError);
    await expect(harness.rooms.createRoom('main')).rejects.toMatchObject({
      message: 'Room main already exists',
      code: 'room_exists',
    });
    expect(harness.rooms.list().map((room) => room.id)).toEqual(['main', generated.id]);
  });

  it('deletes rooms once, closing their router', async () => {
    const harness = await createHarness();
    const router = harness.room.router();

    await expect(harness.rooms.deleteRoom('main')).resolves.toBe(true);
    await expect(harness.rooms.deleteRoom('main')).resolves.toBe(false);

    expect(harness.rooms.get('main')).toBeNull();
    expect(harness.room.router()).toBeNull();
    expect(router?.closed).toBe(true);
  });

  it('publishes roomDelete to subscribers before ending their streams', async () => {
    const harness = await createHarness();
    const subscription = harness.room.subscribe();

    await harness.rooms.deleteRoom('main');

    await expect(subscription?.next()).resolves.toEqual({ type: 'roomDelete' });
    await expect(subscription?.next()).resolves.toBeNull();
    expect(harness.room.subscribe()).toBeNull();
  });

  it('shuts every room down on close', async () => {
    const harness = await createHarness();
    const other = await harness.rooms.createRoom('other');

    await harness.rooms.close();

    expect(harness.rooms.list()).toEqual([]);
    expect(harness.room.router()).toBeNull();
    expect(other.router()).toBeNull();
  });
});

describe('user registry', () => {
  it('registers a user from a valid token and announces the join', async () => {
    const harness = await createHarness();
    const subscription = harness.room.subscribe();

    const user = await harness.room.users.register(harness.token('u-1', { name: 'Ada' }));

    expect(user?.id).toBe('u-1');
    expect(user?.toInfo()).toEqual({ id: 'u-1', name: 'Ada', producing: [] });
    expect(harness.room.users.has('u-1')).toBe(true);
    await expect(subscription?.next()).resolves.toEqual({ type: 'userJoined', userId: 'u-1' });
  });

  it('rejects invalid tokens, tokens for other rooms and tokens already in use', async () => {
    const harness = await createHarness();
    await harness.rooms.createRoom('other');

    await expect(harness.room.users.register('not-a-token')).resolves.toBeNull();
    await expect(
      harness.room.users.register(harness.token('u-1', { roomId: 'other' })),
    ).resolves.toBeNull();

    await harness.room.users.register(harness.token('u-1'));
    await expect(harness.room.users.register(harness.token('u-1'))).resolves.toBeNull();
    expect(harness.room.users.snapshot()).toHaveLength(1);
  });

  it('admits a join token once, even after its user has left', async () => {
    const harness = await createHarness();
    const token = harness.token('u-1');

    await expect(harness.room.users.register(token)).resolves.not.toBeNull();
    await harness.room.users.remove('u-1');

    await expect(harness.room.users.register(token)).resolves.toBeNull();
    expect(harness.room.users.has('u-1')).toBe(false);
    await expect(harness.room.users.register(harness.token('u-1'))).resolves.not.toBeNull();
  });

  it('refuses registration once the room is deleted', async () => {
    const harness = await createHarness();
    await harness.rooms.deleteRoom('main');

    await expect(harness.room.users.register(harness.token('u-1'))).resolves.toBeNull();
  });

  it('removes a user once, closing their producers and announcing the departure', async () => {
    const harness = await createHarness();
    const user = await harness.room.users.register(harness.token('u-1'));
    const router = harness.room.router();
    if (!user || !router) {
      throw new Error('room setup failed');
    }

    const session = await harness.media.initializeSession(router, CLIENT_INIT_DATA);
    await session.connectTransport({
      transportId: session.getInitData().sendTransport.id,
      dtlsParameters: CLIENT_DTLS_PARAMETERS,
    });
    const producer = await session.produce('audio', {});
    user.producers.set('audio', producer);
    expect(user.toInfo().producing).toEqual(['audio']);

    const subscription = harness.room.subscribe();
    await expect(harness.room.users.remove('u-1')).resolves.toBe(true);
    await expect(harness.room.users.remove('u-1')).resolves.toBe(false);

    expect(producer.closed).toBe(true);
    expect(harness.room.users.get('u-1')).toBeNull();
    await expect(subscription?.next()).resolves.toEqual({ type: 'userLeft', userId: 'u-1' });
  });

  it('lists producing types in a fixed order and skips closed producers', async () => {
    const media = createLoopbackMediaBackend();
    const harness = await createHarness({ media });
    const user = await harness.room.users.register(harness.token('u-1'));
    const router = harness.room.router();
    if (!user || !router) {
      throw new Error('room setup failed');
    }

    const session = await media.initializeSession(router, CLIENT_INIT_DATA);
    await session.connectTransport({
      transportId: session.getInitData().sendTransport.id,
      dtlsParameters: CLIENT_DTLS_PARAMETERS,
    });
    const screen = await session.produce('screen', {});
    const audio = await session.produce('audio', {});
    const video = await session.produce('video', {});
    user.producers.set('screen', screen);
    user.producers.set('audio', audio);
    user.producers.set('video', video);
    video.close();

    expect(user.toInfo().producing).toEqual(['audio', 'screen']);
  });
});
