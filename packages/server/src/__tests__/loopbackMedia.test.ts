import { describe, expect, it } from 'vitest';
import { transportInitReplySchema } from '@huddle/schemas';
import { createLoopbackMediaBackend } from '../media/loopback.js';
import { MediaOperationError, type MediaSession } from '../media/types.js';
import { CLIENT_DTLS_PARAMETERS, CLIENT_INIT_DATA } from './helpers/harness.js';

const openSession = async (
  initData = CLIENT_INIT_DATA,
): Promise<{ session: MediaSession; sendId: string; recvId: string }> => {
  const media = createLoopbackMediaBackend();
  const router = await media.createRouter();
  const session = await media.initializeSession(router, initData);
  const { sendTransport, recvTransport } = session.getInitData();
  return { session, sendId: sendTransport.id, recvId: recvTransport.id };
};

const connectBoth = async (session: MediaSession, sendId: string, recvId: string): Promise<void> => {
  await session.connectTransport({ transportId: sendId, dtlsParameters: CLIENT_DTLS_PARAMETERS });
  await session.connectTransport({ transportId: recvId, dtlsParameters: CLIENT_DTLS_PARAMETERS });
};

describe('loopback media backend', () => {
  it('advertises opus and VP8 router capabilities', async () => {
    const router = await createLoopbackMediaBackend().createRouter();

    expect(router.rtpCapabilities.codecs.map((codec) => codec.mimeType)).toEqual([
      'audio/opus',
      'video/VP8',
      'video/H264',
    ]);
  });

  it('describes two distinct transports that satisfy the reply schema', async () => {
    const { session, sendId, recvId } = await openSession();
    const initData = transportInitReplySchema.parse(session.getInitData());

    expect(sendId).not.toBe(recvId);
    expect(initData.sendTransport.iceCandidates[0]?.ip).toBe('127.0.0.1');
    expect(initData.sendTransport.dtlsParameters.fingerprints[0]?.value).toMatch(
      /^([0-9A-F]{2}:){31}[0-9A-F]{2}$/,
    );
  });

  it('refuses sessions on a closed router', async () => {
    const media = createLoopbackMediaBackend();
    const router = await media.createRouter();
    router.close();

    await expect(media.initializeSession(router, CLIENT_INIT_DATA)).rejects.toBeInstanceOf(
      MediaOperationError,
    );
  });

  it('connects each transport once and needs a fingerprint', async () => {
    const { session, sendId } = await openSession();

    await expect(
      session.connectTransport({ transportId: 'missing', dtlsParameters: CLIENT_DTLS_PARAMETERS }),
    ).rejects.toThrow('Unknown transport missing');
    await expect(
      session.connectTransport({ transportId: sendId, dtlsParameters: { fingerprints: [] } }),
    ).rejects.toThrow('DTLS parameters must include at least one fingerprint');

    await session.connectTransport({ transportId: sendId, dtlsParameters: CLIENT_DTLS_PARAMETERS });
    await expect(
      session.connectTransport({ transportId: sendId, dtlsParameters: CLIENT_DTLS_PARAMETERS }),
    ).rejects.toThrow(`Transport ${sendId} is already connected`);
  });

  it('produces only over a connected send transport, once per type', async () => {
    const { session, sendId } = await openSession();

    await expect(session.produce('audio', {})).rejects.toThrow('Send transport is not connected');

    await session.connectTransport({ transportId: sendId, dtlsParameters: CLIENT_DTLS_PARAMETERS });
    const producer = await session.produce('audio', { codecs: [] });
    expect(producer.produceType).toBe('audio');
    expect(producer.rtpParameters).toEqual({ codecs: [] });
    await expect(session.produce('audio', {})).rejects.toThrow('Already producing audio');

    producer.close();
    await expect(session.produce('audio', {})).resolves.toMatchObject({ produceType: 'audio' });
  });

  it('creates paused consumers that can be resumed', async () => {
    const { session, sendId, recvId } = await openSession();
    await connectBoth(session, sendId, recvId);
    const producer = await session.produce('video', { encodings: [] });

    const consumer = await session.consume(producer);

    expect(consumer).toMatchObject({
      producerId: producer.id,
      produceType: 'video',
      rtpParameters: { encodings: [] },
    });
    await expect(session.resumeConsumer(consumer.consumerId)).resolves.toBe(true);
    await expect(session.resumeConsumer('unknown-consumer')).resolves.toBe(false);
  });

  it('refuses to consume closed producers or kinds the client cannot decode', async () => {
    const audioOnly = {
      rtpCapabilities: {
        codecs: [{ kind: 'audio' as const, mimeType: 'audio/opus', clockRate: 48_000 }],
      },
    };
    const { session, sendId, recvId } = await openSession(audioOnly);
    await connectBoth(session, sendId, recvId);

    const screen = await session.produce('screen', {});
    await expect(session.consume(screen)).rejects.toThrow('Client cannot receive screen');

    const audio = await session.produce('audio', {});
    audio.close();
    await expect(session.consume(audio)).rejects.toThrow(`Producer ${audio.id} is closed`);
  });

  it('closes its producers and rejects further work once closed', async () => {
    const { session, sendId, recvId } = await openSession();
    await connectBoth(session, sendId, recvId);
    const producer = await session.produce('audio', {});

    session.close();

    expect(producer.closed).toBe(true);
    await expect(session.resumeConsumer('any')).rejects.toThrow('Media session is closed');
  });
});
