export interface CollectorConfig {
  port: number;
  host: string;
  smiPath: string;            // nvidia-smi binary
  rankProcesses: boolean;     // Resolve owners, sort by memory, keep the top N
  topProcesses: number;       // N for rankProcesses
  toolTimeoutMs?: number;     // Unset = wait for nvidia-smi indefinitely
  verbose: boolean;
}

/**
 * Default collector configuration
 */
export const DEFAULT_COLLECTOR_CONFIG: CollectorConfig = {
  port: 8081,
  host: '0.0.0.0',
  smiPath: 'nvidia-smi',
  rankProcesses: false,
  topProcesses: 2,
  verbose: false,
};
