// @module: shared-ws-envelope
// @tags: websocket, schema, helpers
import { z } from 'zod';

/**
 * Correlation token echoed from a command into its reply or error. `null` is
 * accepted on the way in and normalised to an absent key.
 */
export const correlationIdSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export type CorrelationId = string | undefined;

/** Anything that carries a correlation id, with the key omitted when absent. */
export type Correlated<Body> = Body & { id?: string };

export const withCorrelationId = <Body extends object>(
  id: CorrelationId,
  body: Body,
): Correlated<Body> => (id === undefined ? body : { id, ...body });

export const buildCommandSchema = <
  Type extends string,
  Shape extends z.ZodRawShape,
>(
  type: Type,
  shape: Shape,
) =>
  z.object({
    id: correlationIdSchema,
    type: z.literal(type),
    ...shape,
  });
