/**
 * nvidia-smi could not be run: missing binary, non-zero exit, or timeout
 */
export class ToolInvocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolInvocationError';
  }
}

/**
 * nvidia-smi ran but its output is not a usable document
 */
export class TelemetryParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TelemetryParseError';
  }
}

/**
 * Aggregator configuration is missing or invalid (fatal at startup)
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
