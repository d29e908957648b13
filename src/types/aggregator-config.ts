import { NodeConfig } from './node-status';

export interface AggregatorSettings {
  port: number;
  host: string;
  pollIntervalMs: number;   // Delay between the end of one tick and the start of the next
  fetchTimeoutMs: number;   // Per-node GET /gpu-info timeout
  verbose: boolean;         // Log every request
  logFile?: string;         // Optional JSON-lines request log
}

export interface AggregatorConfig {
  nodes: NodeConfig[];
  aggregator: AggregatorSettings;
}

/**
 * Default aggregator settings
 */
export const DEFAULT_AGGREGATOR_SETTINGS: AggregatorSettings = {
  port: 8080,
  host: '0.0.0.0',
  pollIntervalMs: 5000,
  fetchTimeoutMs: 5000,
  verbose: false,
};
