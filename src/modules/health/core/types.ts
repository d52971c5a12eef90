import { Type, type Static } from '@sinclair/typebox';

/** What a checker observed, before readiness names and classifies it */
export interface CheckOutcome {
  healthy: boolean;
  message?: string;
  latencyMs?: number;
}

export const HealthCheckResultSchema = Type.Object({
  name: Type.String({ description: 'Checked dependency, e.g. "warehouse" or "snapshot"' }),
  status: Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]),
  message: Type.Optional(Type.String()),
  latencyMs: Type.Optional(Type.Number()),
  critical: Type.Boolean({ description: 'A critical failure makes the service unhealthy' }),
});

export type HealthCheckResult = Static<typeof HealthCheckResultSchema>;

/** Where fiscal data is served from */
export const DataSourceSummarySchema = Type.Object({
  source: Type.Union([Type.Literal('warehouse'), Type.Literal('snapshot')]),
  location: Type.String({ description: 'Warehouse host and database, or snapshot file path' }),
});

export type DataSourceSummary = Static<typeof DataSourceSummarySchema>;

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessStatusSchema = Type.Union([
  Type.Literal('ok'),
  Type.Literal('degraded'),
  Type.Literal('unhealthy'),
]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Seconds since the routes were registered' }),
  dataSource: Type.Optional(DataSourceSummarySchema),
  checks: Type.Array(HealthCheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
