import { z } from 'zod';
import { AggregatorConfig, DEFAULT_AGGREGATOR_SETTINGS } from '../types/aggregator-config';
import { fileExists, readJson } from '../utils/file-utils';
import { ConfigError } from './errors';
import { describeIssues } from './telemetry-schema';

const PortSchema = z.number().int().min(1).max(65535);

// Longest delay setTimeout honours; larger values fire after 1ms
export const MAX_TIMER_MS = 2_147_483_647;

const TimerSchema = z.number().int().positive().max(MAX_TIMER_MS);

const NodeConfigSchema = z.object({
  name: z.string().min(1, 'Node name must not be empty'),
  host: z.string().min(1, 'Node host must not be empty'),
  port: PortSchema,
  alias: z.string().default(''),
});

/**
 * Zod schema for the aggregator config file (snake_case keys, like the wire format)
 */
export const AggregatorConfigSchema = z
  .object({
    nodes: z.array(NodeConfigSchema),
    aggregator: z
      .object({
        // 0 means "use the default", as in older config files
        port: z.number().int().min(0).max(65535).optional(),
        host: z.string().min(1).optional(),
        poll_interval_ms: TimerSchema.optional(),
        fetch_timeout_ms: TimerSchema.optional(),
        verbose: z.boolean().optional(),
        log_file: z.string().min(1).optional(),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.nodes.forEach((node, index) => {
      if (seen.has(node.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes', index, 'name'],
          message: `Duplicate node name "${node.name}"`,
        });
      }
      seen.add(node.name);
    });
  });

/**
 * Parse a port given on the command line
 * Accepts decimal digits only, in the range 1-65535
 */
export function parsePort(value: string): number {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new ConfigError('Invalid port: empty port string');
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`Invalid port: "${value}" is not a number`);
  }

  const port = parseInt(trimmed, 10);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`Invalid port: ${port} is out of range (1-65535)`);
  }
  return port;
}

/**
 * Validate already-parsed config JSON and apply defaults
 */
export function resolveAggregatorConfig(data: unknown, portOverride?: string): AggregatorConfig {
  const parsed = AggregatorConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }

  const { nodes, aggregator } = parsed.data;
  const defaults = DEFAULT_AGGREGATOR_SETTINGS;

  return {
    nodes,
    aggregator: {
      port: portOverride !== undefined ? parsePort(portOverride) : aggregator.port || defaults.port,
      host: aggregator.host ?? defaults.host,
      pollIntervalMs: aggregator.poll_interval_ms ?? defaults.pollIntervalMs,
      fetchTimeoutMs: aggregator.fetch_timeout_ms ?? defaults.fetchTimeoutMs,
      verbose: aggregator.verbose ?? defaults.verbose,
      logFile: aggregator.log_file,
    },
  };
}

/**
 * Load the aggregator config file
 * Throws ConfigError if it is missing, not JSON, or fails validation
 */
export async function loadAggregatorConfig(filePath: string, portOverride?: string): Promise<AggregatorConfig> {
  if (!(await fileExists(filePath))) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  let data: unknown;
  try {
    data = await readJson<unknown>(filePath);
  } catch (error) {
    throw new ConfigError(`Failed to read config ${filePath}: ${(error as Error).message}`);
  }

  return resolveAggregatorConfig(data, portOverride);
}

/**
 * Parse a positive integer command-line value
 * Capped at MAX_TIMER_MS since most of these end up as timer delays
 */
export function parsePositiveInteger(value: string, flag: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || parseInt(trimmed, 10) < 1) {
    throw new ConfigError(`Invalid ${flag}: "${value}" must be a positive integer`);
  }

  const parsed = parseInt(trimmed, 10);
  if (parsed > MAX_TIMER_MS) {
    throw new ConfigError(`Invalid ${flag}: ${parsed} exceeds the maximum of ${MAX_TIMER_MS}`);
  }
  return parsed;
}
