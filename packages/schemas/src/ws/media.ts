// @module: shared-ws-media
// @tags: websocket, webrtc, schema
import { z } from 'zod';

export const produceTypeSchema = z.enum(['audio', 'video', 'screen']);

const opaqueObjectSchema = z.record(z.string(), z.unknown());

export const rtpCodecCapabilitySchema = z
  .object({
    kind: z.enum(['audio', 'video']),
    mimeType: z.string().min(1, 'codec mimeType required'),
    clockRate: z.number().int().positive(),
    channels: z.number().int().positive().optional(),
    preferredPayloadType: z.number().int().min(0).optional(),
    parameters: opaqueObjectSchema.optional(),
  })
  .passthrough();

export const rtpCapabilitiesSchema = z
  .object({
    codecs: z.array(rtpCodecCapabilitySchema),
    headerExtensions: z.array(opaqueObjectSchema).optional(),
  })
  .passthrough();

export const transportInitRequestSchema = z.object({
  rtpCapabilities: rtpCapabilitiesSchema,
});

export const iceParametersSchema = z.object({
  usernameFragment: z.string().min(1),
  password: z.string().min(1),
  iceLite: z.boolean().optional(),
});

export const iceCandidateSchema = z.object({
  foundation: z.string().min(1),
  priority: z.number().int().nonnegative(),
  ip: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  protocol: z.enum(['udp', 'tcp']),
  type: z.literal('host'),
});

export const dtlsFingerprintSchema = z.object({
  algorithm: z.string().min(1),
  value: z.string().min(1),
});

export const dtlsParametersSchema = z
  .object({
    role: z.enum(['auto', 'client', 'server']).optional(),
    fingerprints: z.array(dtlsFingerprintSchema),
  })
  .passthrough();

export const transportDescriptionSchema = z.object({
  id: z.string().min(1),
  iceParameters: iceParametersSchema,
  iceCandidates: z.array(iceCandidateSchema),
  dtlsParameters: dtlsParametersSchema,
});

export const transportInitReplySchema = z.object({
  sendTransport: transportDescriptionSchema,
  recvTransport: transportDescriptionSchema,
});

export const transportConnectRequestSchema = z.object({
  transportId: z.string().min(1, 'transportId is required'),
  dtlsParameters: opaqueObjectSchema,
});

export const rtpParametersSchema = opaqueObjectSchema;

export const consumerDataSchema = z.object({
  consumerId: z.string().min(1),
  producerId: z.string().min(1),
  produceType: produceTypeSchema,
  rtpParameters: rtpParametersSchema,
});

export type ProduceType = z.infer<typeof produceTypeSchema>;
export type RtpCodecCapability = z.infer<typeof rtpCodecCapabilitySchema>;
export type RtpCapabilities = z.infer<typeof rtpCapabilitiesSchema>;
export type RtpParameters = z.infer<typeof rtpParametersSchema>;
export type TransportInitRequest = z.infer<typeof transportInitRequestSchema>;
export type TransportDescription = z.infer<typeof transportDescriptionSchema>;
export type TransportInitReply = z.infer<typeof transportInitReplySchema>;
export type TransportConnectRequest = z.infer<typeof transportConnectRequestSchema>;
export type DtlsParameters = z.infer<typeof dtlsParametersSchema>;
export type ConsumerData = z.infer<typeof consumerDataSchema>;
