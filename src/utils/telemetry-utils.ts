import { HostTelemetry } from '../types/telemetry';

export interface TelemetrySummary {
  gpuCount: number;
  avgUtilization: number;   // Percentage, 0 when there are no GPUs
  memoryUsed: number;       // Bytes, summed across GPUs
  memoryTotal: number;      // Bytes, summed across GPUs
  powerUsage: number;       // Milliwatts, summed across GPUs
  maxTemperature: number;   // Celsius
}

/**
 * Aggregate one host's GPUs into a single row
 */
export function summarizeTelemetry(telemetry: HostTelemetry): TelemetrySummary {
  const { gpus } = telemetry;
  const sum = (pick: (value: (typeof gpus)[number]) => number) =>
    gpus.reduce((total, gpu) => total + pick(gpu), 0);

  return {
    gpuCount: gpus.length,
    avgUtilization: gpus.length > 0 ? sum((gpu) => gpu.utilization) / gpus.length : 0,
    memoryUsed: sum((gpu) => gpu.memory_used),
    memoryTotal: sum((gpu) => gpu.memory_total),
    powerUsage: sum((gpu) => gpu.power_usage),
    maxTemperature: gpus.reduce((max, gpu) => Math.max(max, gpu.temperature), 0),
  };
}
