import { Type, type Static } from '@sinclair/typebox';

/**
 * Liveness check response - indicates if the process is running
 */
export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Process uptime in seconds' }),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export interface HealthDeps {
  version?: string | undefined;
}
