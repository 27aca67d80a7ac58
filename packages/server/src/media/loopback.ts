// @module: server-media-loopback
// @tags: webrtc, development, media

import { randomBytes, randomUUID } from 'node:crypto';
import {
  dtlsParametersSchema,
  type ConsumerData,
  type ProduceType,
  type RtpCapabilities,
  type RtpParameters,
  type TransportConnectRequest,
  type TransportDescription,
  type TransportInitReply,
  type TransportInitRequest,
} from '@huddle/schemas';
import {
  MediaOperationError,
  type MediaBackend,
  type MediaProducer,
  type MediaRouter,
  type MediaSession,
} from './types.js';

// In-process stand-in for an SFU worker: negotiates descriptors but forwards
// no packets.

const LOOPBACK_RTP_CAPABILITIES: RtpCapabilities = {
  codecs: [
    {
      kind: 'audio',
      mimeType: 'audio/opus',
      clockRate: 48_000,
      channels: 2,
      preferredPayloadType: 100,
    },
    {
      kind: 'video',
      mimeType: 'video/VP8',
      clockRate: 90_000,
      preferredPayloadType: 101,
    },
    {
      kind: 'video',
      mimeType: 'video/H264',
      clockRate: 90_000,
      preferredPayloadType: 102,
      parameters: {
        'packetization-mode': 1,
        'profile-level-id': '42e01f',
      },
    },
  ],
  headerExtensions: [],
};

const LOOPBACK_ANNOUNCED_IP = '127.0.0.1';
const LOOPBACK_BASE_PORT = 40_000;
const LOOPBACK_PORT_SPAN = 10_000;

const randomHex = (bytes: number): string => randomBytes(bytes).toString('hex');

const fingerprint = (): string =>
  (randomHex(32).toUpperCase().match(/.{2}/g) ?? []).join(':');

interface LoopbackTransport {
  description: TransportDescription;
  connected: boolean;
}

const createTransport = (): LoopbackTransport => ({
  description: {
    id: randomUUID(),
    iceParameters: {
      usernameFragment: randomHex(8),
      password: randomHex(16),
      iceLite: true,
    },
    iceCandidates: [
      {
        foundation: 'udpcandidate',
        priority: 1_076_302_079,
        ip: LOOPBACK_ANNOUNCED_IP,
        port: LOOPBACK_BASE_PORT + Math.floor(Math.random() * LOOPBACK_PORT_SPAN),
        protocol: 'udp',
        type: 'host',
      },
    ],
    dtlsParameters: {
      role: 'auto',
      fingerprints: [{ algorithm: 'sha-256', value: fingerprint() }],
    },
  },
  connected: false,
});

const cloneDescription = (description: TransportDescription): TransportDescription => ({
  id: description.id,
  iceParameters: { ...description.iceParameters },
  iceCandidates: description.iceCandidates.map((candidate) => ({ ...candidate })),
  dtlsParameters: {
    ...description.dtlsParameters,
    fingerprints: description.dtlsParameters.fingerprints.map((entry) => ({ ...entry })),
  },
});

const createRouter = (): MediaRouter => {
  let closed = false;
  return {
    id: randomUUID(),
    rtpCapabilities: LOOPBACK_RTP_CAPABILITIES,
    get closed() {
      return closed;
    },
    close(): void {
      closed = true;
    },
  };
};

const createProducer = (produceType: ProduceType, rtpParameters: RtpParameters): MediaProducer => {
  let closed = false;
  return {
    id: randomUUID(),
    produceType,
    rtpParameters,
    get closed() {
      return closed;
    },
    close(): void {
      closed = true;
    },
  };
};

const supportsProduceType = (capabilities: RtpCapabilities, produceType: ProduceType): boolean => {
  const kind = produceType === 'audio' ? 'audio' : 'video';
  return capabilities.codecs.some((codec) => codec.kind === kind);
};

const createSession = (router: MediaRouter, request: TransportInitRequest): MediaSession => {
  const sendTransport = createTransport();
  const recvTransport = createTransport();
  const transports = new Map<string, LoopbackTransport>([
    [sendTransport.description.id, sendTransport],
    [recvTransport.description.id, recvTransport],
  ]);
  const producers = new Map<ProduceType, MediaProducer>();
  const consumers = new Map<string, { data: ConsumerData; paused: boolean }>();
  let closed = false;

  const assertOpen = (): void => {
    if (closed || router.closed) {
      throw new MediaOperationError('Media session is closed');
    }
  };

  const getInitData = (): TransportInitReply => ({
    sendTransport: cloneDescription(sendTransport.description),
    recvTransport: cloneDescription(recvTransport.description),
  });

  const connectTransport = async (connectRequest: TransportConnectRequest): Promise<void> => {
    assertOpen();
    const transport = transports.get(connectRequest.transportId);
    if (!transport) {
      throw new MediaOperationError(`Unknown transport ${connectRequest.transportId}`);
    }

    if (transport.connected) {
      throw new MediaOperationError(`Transport ${connectRequest.transportId} is already connected`);
    }

    const dtls = dtlsParametersSchema.safeParse(connectRequest.dtlsParameters);
    if (!dtls.success || dtls.data.fingerprints.length === 0) {
      throw new MediaOperationError('DTLS parameters must include at least one fingerprint');
    }

    transport.connected = true;
  };

  const produce = async (
    produceType: ProduceType,
    rtpParameters: RtpParameters,
  ): Promise<MediaProducer> => {
    assertOpen();
    if (!sendTransport.connected) {
      throw new MediaOperationError('Send transport is not connected');
    }

    const existing = producers.get(produceType);
    if (existing && !existing.closed) {
      throw new MediaOperationError(`Already producing ${produceType}`);
    }

    const producer = createProducer(produceType, rtpParameters);
    producers.set(produceType, producer);
    return producer;
  };

  const consume = async (producer: MediaProducer): Promise<ConsumerData> => {
    assertOpen();
    if (!recvTransport.connected) {
      throw new MediaOperationError('Receive transport is not connected');
    }

    if (producer.closed) {
      throw new MediaOperationError(`Producer ${producer.id} is closed`);
    }

    if (!supportsProduceType(request.rtpCapabilities, producer.produceType)) {
      throw new MediaOperationError(`Client cannot receive ${producer.produceType}`);
    }

    const data: ConsumerData = {
      consumerId: randomUUID(),
      producerId: producer.id,
      produceType: producer.produceType,
      rtpParameters: { ...producer.rtpParameters },
    };
    consumers.set(data.consumerId, { data, paused: true });
    return data;
  };

  const resumeConsumer = async (consumerId: string): Promise<boolean> => {
    assertOpen();
    const consumer = consumers.get(consumerId);
    if (!consumer) {
      return false;
    }

    consumer.paused = false;
    return true;
  };

  const close = (): void => {
    if (closed) {
      return;
    }

    closed = true;
    for (const producer of producers.values()) {
      producer.close();
    }
    producers.clear();
    consumers.clear();
  };

  return {
    getInitData,
    connectTransport,
    produce,
    consume,
    resumeConsumer,
    close,
  };
};

export const createLoopbackMediaBackend = (): MediaBackend => ({
  createRouter: async () => createRouter(),
  initializeSession: async (router, request) => {
    if (router.closed) {
      throw new MediaOperationError('Router is closed');
    }

    return createSession(router, request);
  },
});
