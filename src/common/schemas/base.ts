/**
 * Common TypeBox schemas used across modules
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

/**
 * Value or null
 */
export const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

/**
 * Money amount serialized as a JSON number; null when not reported
 */
export const AmountSchema = Nullable(Type.Number({ description: 'Amount in US dollars' }));

/**
 * Entity code query parameter. Codes contain slashes, so they are not path params.
 */
export const EntityCodeQuerySchema = Type.Object(
  {
    code: Type.String({
      minLength: 1,
      description: 'Composite entity code, e.g. "016/020/32"',
    }),
  },
  { additionalProperties: false }
);

export type EntityCodeQuery = Static<typeof EntityCodeQuerySchema>;

export const EntitySummarySchema = Type.Object({
  code: Type.String(),
  name: Type.String(),
  entityType: Nullable(Type.String()),
  county: Nullable(Type.String()),
});

/**
 * Standard error response
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

/**
 * Error responses every data route may return
 */
export const QUERY_ERROR_RESPONSES = {
  400: ErrorResponseSchema,
  404: ErrorResponseSchema,
  500: ErrorResponseSchema,
  504: ErrorResponseSchema,
} as const;

/**
 * Wraps a data schema in the `{ ok: true, data }` envelope
 */
export const okEnvelope = <T extends TSchema>(data: T) =>
  Type.Object({ ok: Type.Literal(true), data });
