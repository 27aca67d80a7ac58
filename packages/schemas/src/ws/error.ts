// @module: shared-ws-error
// @tags: websocket, schema, errors
import { z } from 'zod';
import { correlationIdSchema } from './envelope.js';

export const signalErrorKindSchema = z.enum([
  'user_not_found',
  'transport_connection_failure',
  'producer_failure',
  'producer_not_found',
  'consumer_failure',
  'consumer_not_found',
]);

export const signalErrorEnvelopeSchema = z.object({
  id: correlationIdSchema,
  type: z.string().min(1).optional(),
  error: signalErrorKindSchema,
  message: z.string().min(1),
});

export type SignalErrorKind = z.infer<typeof signalErrorKindSchema>;
export type SignalErrorEnvelope = z.infer<typeof signalErrorEnvelopeSchema>;

/**
 * Command failures that are reported in-band while the session stays open.
 */
export type SignalFailure =
  | { kind: 'user_not_found'; userId: string }
  | { kind: 'transport_connection_failure' }
  | { kind: 'producer_failure' }
  | { kind: 'producer_not_found'; producerId: string }
  | { kind: 'consumer_failure' }
  | { kind: 'consumer_not_found'; consumerId: string };

export const describeSignalFailure = (failure: SignalFailure): string => {
  switch (failure.kind) {
    case 'user_not_found':
      return `User with ID ${failure.userId} doesn't exist`;
    case 'transport_connection_failure':
      return 'An error occurred while trying to connect transport';
    case 'producer_failure':
      return 'An unknown error occurred while setting up an RTC producer';
    case 'producer_not_found':
      return `Producer with ID ${failure.producerId} doesn't exist`;
    case 'consumer_failure':
      return 'An unknown error occurred while setting up an RTC consumer';
    case 'consumer_not_found':
      return `Consumer with ID ${failure.consumerId} doesn't exist`;
  }
};
