import type {
  ConsumerData,
  ProduceType,
  RtpCapabilities,
  RtpParameters,
  TransportConnectRequest,
  TransportInitReply,
  TransportInitRequest,
} from '@huddle/schemas';

/** Room-level media routing context. */
export interface MediaRouter {
  readonly id: string;
  readonly rtpCapabilities: RtpCapabilities;
  readonly closed: boolean;
  close(): void;
}

export interface MediaProducer {
  readonly id: string;
  readonly produceType: ProduceType;
  readonly rtpParameters: RtpParameters;
  readonly closed: boolean;
  close(): void;
}

/** Transport pair negotiated for one connection. */
export interface MediaSession {
  getInitData(): TransportInitReply;
  connectTransport(request: TransportConnectRequest): Promise<void>;
  produce(produceType: ProduceType, rtpParameters: RtpParameters): Promise<MediaProducer>;
  consume(producer: MediaProducer): Promise<ConsumerData>;
  /** Resolves `false` when the consumer is unknown to this session. */
  resumeConsumer(consumerId: string): Promise<boolean>;
  close(): void;
}

export interface MediaBackend {
  createRouter(): Promise<MediaRouter>;
  initializeSession(router: MediaRouter, request: TransportInitRequest): Promise<MediaSession>;
}

export class MediaOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MediaOperationError';
  }
}
