import { z } from 'zod';
import { HostTelemetry } from '../types/telemetry';
import { NodeStatus } from '../types/node-status';

/**
 * Zod schemas for telemetry received over HTTP
 */
export const ProcessTelemetrySchema = z.object({
  pid: z.number().int().nonnegative(),
  name: z.string(),
  used: z.number().nonnegative(),
  user: z.string().optional(),
});

export const GpuTelemetrySchema = z.object({
  id: z.string(),
  name: z.string(),
  utilization: z.number().min(0).max(100),
  memory_used: z.number().nonnegative(),
  memory_total: z.number().nonnegative(),
  temperature: z.number().int().nonnegative(),
  power_usage: z.number().nonnegative(),
  power_limit: z.number().nonnegative(),
  processes: z.array(ProcessTelemetrySchema),
});

export const HostTelemetrySchema: z.ZodType<HostTelemetry> = z.object({
  node_name: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  gpus: z.array(GpuTelemetrySchema),
});

const nodeStatusBase = {
  name: z.string(),
  host: z.string(),
  port: z.number().int(),
  alias: z.string(),
  last_update: z.string().nullable(),
};

export const NodeStatusSchema: z.ZodType<NodeStatus> = z.discriminatedUnion('status', [
  z.object({ ...nodeStatusBase, status: z.literal('unknown') }),
  z.object({ ...nodeStatusBase, status: z.literal('online'), data: HostTelemetrySchema }),
  z.object({ ...nodeStatusBase, status: z.literal('offline'), error: z.string() }),
]);

/**
 * One-line summary of a validation failure
 * Example: "gpus.0.memory_used: Expected number, received string"
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
