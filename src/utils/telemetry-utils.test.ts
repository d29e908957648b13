import { describe, it, expect } from 'vitest';
import { summarizeTelemetry } from './telemetry-utils';
import { createGpuTelemetry, createHostTelemetry } from '../../tests/fixtures/node-status';

describe('summarizeTelemetry()', () => {
  it('should sum and average across GPUs', () => {
    const summary = summarizeTelemetry(
      createHostTelemetry({
        gpus: [
          createGpuTelemetry({ utilization: 20, memory_used: 100, memory_total: 1000, power_usage: 50000, temperature: 40 }),
          createGpuTelemetry({ utilization: 60, memory_used: 300, memory_total: 1000, power_usage: 70000, temperature: 72 }),
        ],
      })
    );

    expect(summary).toEqual({
      gpuCount: 2,
      avgUtilization: 40,
      memoryUsed: 400,
      memoryTotal: 2000,
      powerUsage: 120000,
      maxTemperature: 72,
    });
  });

  it('should report zeros for a host without GPUs', () => {
    expect(summarizeTelemetry(createHostTelemetry({ gpus: [] }))).toEqual({
      gpuCount: 0,
      avgUtilization: 0,
      memoryUsed: 0,
      memoryTotal: 0,
      powerUsage: 0,
      maxTemperature: 0,
    });
  });
});
