import { describe, it, expect } from 'vitest';
import { parseSmiOutput } from './smi-parser';
import { TelemetryParseError } from './errors';
import { buildSmiXml } from '../../tests/fixtures/smi-xml';

const MiB = 1024 * 1024;

describe('parseSmiOutput()', () => {
  it('should normalize a single GPU', () => {
    const xml = buildSmiXml([
      {
        id: '00000000:3B:00.0',
        productName: 'Test GPU 16GB',
        gpuUtil: '37 %',
        memoryTotal: '16384 MiB',
        memoryUsed: '1024 MiB',
        gpuTemp: '45 C',
        powerDraw: '71.23 W',
        powerLimit: '250.00 W',
        processes: [{ pid: '4242', name: '/usr/bin/python3', usedMemory: '1000 MiB' }],
      },
    ]);

    expect(parseSmiOutput(xml)).toEqual([
      {
        id: '00000000:3B:00.0',
        name: 'Test GPU 16GB',
        utilization: 37,
        memory_used: 1024 * MiB,
        memory_total: 16384 * MiB,
        temperature: 45,
        power_usage: 71230,
        power_limit: 250000,
        processes: [{ pid: 4242, name: '/usr/bin/python3', used: 1000 * MiB }],
      },
    ]);
  });

  it('should keep GPUs in reported order', () => {
    const xml = buildSmiXml([
      { id: 'gpu-b', productName: 'Second' },
      { id: 'gpu-a', productName: 'First' },
      { id: 'gpu-c', productName: 'Third' },
    ]);

    expect(parseSmiOutput(xml).map((gpu) => gpu.id)).toEqual(['gpu-b', 'gpu-a', 'gpu-c']);
  });

  it('should keep processes in reported order', () => {
    const xml = buildSmiXml([
      {
        processes: [
          { pid: '30', name: 'small', usedMemory: '10 MiB' },
          { pid: '10', name: 'large', usedMemory: '900 MiB' },
        ],
      },
    ]);

    expect(parseSmiOutput(xml)[0].processes.map((process) => process.pid)).toEqual([30, 10]);
  });

  it('should return an empty list when no processes are running', () => {
    const xml = buildSmiXml([{ processes: [] }]);

    expect(parseSmiOutput(xml)[0].processes).toEqual([]);
  });

  it('should return no GPUs for an empty root', () => {
    expect(parseSmiOutput('<?xml version="1.0" ?>\n<nvidia_smi_log></nvidia_smi_log>')).toEqual([]);
    expect(parseSmiOutput(buildSmiXml([]))).toEqual([]);
  });

  it('should read the legacy power block', () => {
    const xml = buildSmiXml([{ legacyPower: true, powerDraw: '55.50 W', powerLimit: '200.00 W' }]);

    const [gpu] = parseSmiOutput(xml);
    expect(gpu.power_usage).toBe(55500);
    expect(gpu.power_limit).toBe(200000);
  });

  it('should report 0 for N/A readings', () => {
    const xml = buildSmiXml([{ powerDraw: 'N/A', gpuUtil: 'N/A', gpuTemp: 'N/A' }]);

    const [gpu] = parseSmiOutput(xml);
    expect(gpu.power_usage).toBe(0);
    expect(gpu.utilization).toBe(0);
    expect(gpu.temperature).toBe(0);
    expect(gpu.power_limit).toBe(300000);
  });

  it('should clamp memory used to memory total', () => {
    const xml = buildSmiXml([{ memoryTotal: '16384 MiB', memoryUsed: '20000 MiB' }]);

    expect(parseSmiOutput(xml)[0].memory_used).toBe(16384 * MiB);
  });

  it('should keep memory used when total is unknown', () => {
    const xml = buildSmiXml([{ memoryTotal: 'N/A', memoryUsed: '512 MiB' }]);

    const [gpu] = parseSmiOutput(xml);
    expect(gpu.memory_total).toBe(0);
    expect(gpu.memory_used).toBe(512 * MiB);
  });

  it('should throw TelemetryParseError for malformed XML', () => {
    const xml = '<nvidia_smi_log><gpu id="x"></nvidia_smi_log>';

    expect(() => parseSmiOutput(xml)).toThrow(TelemetryParseError);
    expect(() => parseSmiOutput(xml)).toThrow(/^invalid XML at \d+:\d+: /);
  });

  it('should throw TelemetryParseError when the root element is wrong', () => {
    expect(() => parseSmiOutput('<gpus><gpu/></gpus>')).toThrow('missing <nvidia_smi_log> root element');
  });
});
