import { GpuTelemetry, ProcessTelemetry } from '../types/telemetry';
import { UNKNOWN_OWNER } from '../utils/process-utils';

/**
 * Resolves the user owning a PID. Implementations should return
 * UNKNOWN_OWNER rather than throw.
 */
export type OwnerLookup = (pid: number) => Promise<string>;

export const DEFAULT_TOP_PROCESSES = 2;

/**
 * Sort by memory used (descending) and keep the first `limit` entries.
 * Processes using the same amount of memory keep their reported order.
 */
export function rankProcesses(
  processes: ProcessTelemetry[],
  limit: number = DEFAULT_TOP_PROCESSES
): ProcessTelemetry[] {
  return processes
    .map((process, index) => ({ process, index }))
    .sort((a, b) => b.process.used - a.process.used || a.index - b.index)
    .slice(0, Math.max(0, limit))
    .map(({ process }) => process);
}

async function lookupOwner(lookup: OwnerLookup, pid: number): Promise<string> {
  try {
    return await lookup(pid);
  } catch {
    return UNKNOWN_OWNER;
  }
}

/**
 * Attach the owning user to each process
 */
export async function attachOwners(
  processes: ProcessTelemetry[],
  lookup: OwnerLookup
): Promise<ProcessTelemetry[]> {
  return Promise.all(
    processes.map(async (process) => ({
      ...process,
      user: await lookupOwner(lookup, process.pid),
    }))
  );
}

/**
 * Rank every GPU's process list and resolve owners for the processes kept.
 * Owners are only looked up after truncation; the result is the same as
 * resolving all of them first.
 */
export async function rankGpuProcesses(
  gpus: GpuTelemetry[],
  lookup: OwnerLookup,
  limit: number = DEFAULT_TOP_PROCESSES
): Promise<GpuTelemetry[]> {
  return Promise.all(
    gpus.map(async (gpu) => ({
      ...gpu,
      processes: await attachOwners(rankProcesses(gpu.processes, limit), lookup),
    }))
  );
}
