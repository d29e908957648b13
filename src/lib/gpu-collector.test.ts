import { describe, it, expect, vi } from 'vitest';
import { GpuCollector } from './gpu-collector';
import { TelemetryParseError, ToolInvocationError } from './errors';
import { buildSmiXml } from '../../tests/fixtures/smi-xml';

const SAMPLE_XML = buildSmiXml([
  {
    id: 'gpu-0',
    processes: [
      { pid: '11', name: 'train', usedMemory: '500 MiB' },
      { pid: '12', name: 'eval', usedMemory: '3000 MiB' },
      { pid: '13', name: 'notebook', usedMemory: '1000 MiB' },
    ],
  },
  { id: 'gpu-1' },
]);

function toolError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe('GpuCollector', () => {
  it('should report every GPU with the host name and a timestamp', async () => {
    const collector = new GpuCollector({
      runTool: vi.fn().mockResolvedValue(SAMPLE_XML),
      hostname: () => 'gpu-host-1',
    });

    const telemetry = await collector.collectTelemetry();

    expect(telemetry.node_name).toBe('gpu-host-1');
    expect(telemetry.gpus.map((gpu) => gpu.id)).toEqual(['gpu-0', 'gpu-1']);
    expect(new Date(telemetry.timestamp).toISOString()).toBe(telemetry.timestamp);
  });

  it('should leave processes untouched without ranking', async () => {
    const ownerLookup = vi.fn().mockResolvedValue('alice');
    const collector = new GpuCollector({
      runTool: vi.fn().mockResolvedValue(SAMPLE_XML),
      ownerLookup,
    });

    const telemetry = await collector.collectTelemetry();

    expect(telemetry.gpus[0].processes.map((process) => process.pid)).toEqual([11, 12, 13]);
    expect(telemetry.gpus[0].processes[0].user).toBeUndefined();
    expect(ownerLookup).not.toHaveBeenCalled();
  });

  it('should rank processes and attach owners when enabled', async () => {
    const collector = new GpuCollector({
      runTool: vi.fn().mockResolvedValue(SAMPLE_XML),
      rankProcesses: true,
      topProcesses: 2,
      ownerLookup: vi.fn(async (pid: number) => `user${pid}`),
    });

    const telemetry = await collector.collectTelemetry();

    expect(telemetry.gpus[0].processes.map((process) => [process.pid, process.user])).toEqual([
      [12, 'user12'],
      [13, 'user13'],
    ]);
  });

  it('should share one tool run between concurrent callers', async () => {
    let finish: (output: string) => void = () => {};
    const runTool = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          finish = resolve;
        })
    );
    const collector = new GpuCollector({ runTool });

    const first = collector.collectTelemetry();
    const second = collector.collectTelemetry();
    finish(SAMPLE_XML);

    const [a, b] = await Promise.all([first, second]);
    expect(runTool).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
  });

  it('should run the tool again after a collection finishes', async () => {
    const runTool = vi.fn().mockResolvedValue(SAMPLE_XML);
    const collector = new GpuCollector({ runTool });

    await collector.collectTelemetry();
    await collector.collectTelemetry();

    expect(runTool).toHaveBeenCalledTimes(2);
  });

  describe('tool failures', () => {
    it('should report a missing binary', async () => {
      const collector = new GpuCollector({
        runTool: vi.fn().mockRejectedValue(toolError('spawn nvidia-smi ENOENT', { code: 'ENOENT' })),
      });

      const result = collector.collectTelemetry();
      await expect(result).rejects.toBeInstanceOf(ToolInvocationError);
      await expect(result).rejects.toThrow('failed to run nvidia-smi: command not found');
    });

    it('should report the exit code and stderr', async () => {
      const collector = new GpuCollector({
        smiPath: '/opt/bin/nvidia-smi',
        runTool: vi
          .fn()
          .mockRejectedValue(toolError('Command failed', { code: 9, stderr: 'driver not loaded\n' })),
      });

      await expect(collector.collectTelemetry()).rejects.toThrow(
        'failed to run /opt/bin/nvidia-smi: exited with code 9: driver not loaded'
      );
    });

    it('should report a timeout', async () => {
      const collector = new GpuCollector({
        toolTimeoutMs: 1500,
        runTool: vi.fn().mockRejectedValue(toolError('Command failed', { killed: true, signal: 'SIGTERM' })),
      });

      await expect(collector.collectTelemetry()).rejects.toThrow(
        'failed to run nvidia-smi: timed out after 1500ms'
      );
    });

    it('should surface unparseable output as TelemetryParseError', async () => {
      const collector = new GpuCollector({
        runTool: vi.fn().mockResolvedValue('NVIDIA-SMI has failed'),
      });

      await expect(collector.collectTelemetry()).rejects.toBeInstanceOf(TelemetryParseError);
    });

    it('should allow a retry after a failure', async () => {
      const runTool = vi
        .fn()
        .mockRejectedValueOnce(toolError('spawn nvidia-smi ENOENT', { code: 'ENOENT' }))
        .mockResolvedValueOnce(SAMPLE_XML);
      const collector = new GpuCollector({ runTool });

      await expect(collector.collectTelemetry()).rejects.toThrow(ToolInvocationError);
      await expect(collector.collectTelemetry()).resolves.toMatchObject({ gpus: [{ id: 'gpu-0' }, { id: 'gpu-1' }] });
    });
  });
});
