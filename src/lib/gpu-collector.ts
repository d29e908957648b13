import * as os from 'os';
import { HostTelemetry } from '../types/telemetry';
import { DEFAULT_COLLECTOR_CONFIG } from '../types/collector-config';
import { execFileCommand, getProcessOwner } from '../utils/process-utils';
import { ToolInvocationError } from './errors';
import { parseSmiOutput } from './smi-parser';
import { DEFAULT_TOP_PROCESSES, OwnerLookup, rankGpuProcesses } from './process-ranker';

/**
 * Produces raw `nvidia-smi -q -x` output
 */
export type SmiRunner = () => Promise<string>;

export interface GpuCollectorOptions {
  smiPath?: string;
  toolTimeoutMs?: number;
  rankProcesses?: boolean;
  topProcesses?: number;
  ownerLookup?: OwnerLookup;
  runTool?: SmiRunner;
  hostname?: () => string;
}

function getHostname(): string {
  try {
    return os.hostname() || 'unknown-host';
  } catch {
    return 'unknown-host';
  }
}

function describeToolFailure(error: unknown, smiPath: string, timeoutMs?: number): string {
  const prefix = `failed to run ${smiPath}`;
  if (!(error instanceof Error)) {
    return `${prefix}: ${String(error)}`;
  }

  const code = 'code' in error ? error.code : undefined;
  if (code === 'ENOENT') {
    return `${prefix}: command not found`;
  }
  if (timeoutMs && 'killed' in error && error.killed === true) {
    return `${prefix}: timed out after ${timeoutMs}ms`;
  }
  if (typeof code === 'number') {
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    return stderr ? `${prefix}: exited with code ${code}: ${stderr}` : `${prefix}: exited with code ${code}`;
  }
  return `${prefix}: ${error.message}`;
}

/**
 * GPU telemetry collector backed by nvidia-smi
 * Runs the tool, normalizes its XML, and optionally ranks each GPU's processes
 */
export class GpuCollector {
  private readonly smiPath: string;
  private readonly toolTimeoutMs?: number;
  private readonly rankProcesses: boolean;
  private readonly topProcesses: number;
  private readonly ownerLookup: OwnerLookup;
  private readonly runTool: SmiRunner;
  private readonly hostname: () => string;
  private collectingLock: Promise<HostTelemetry> | null = null;

  constructor(options: GpuCollectorOptions = {}) {
    this.smiPath = options.smiPath ?? DEFAULT_COLLECTOR_CONFIG.smiPath;
    this.toolTimeoutMs = options.toolTimeoutMs;
    this.rankProcesses = options.rankProcesses ?? false;
    this.topProcesses = options.topProcesses ?? DEFAULT_TOP_PROCESSES;
    this.ownerLookup = options.ownerLookup ?? getProcessOwner;
    this.runTool = options.runTool ?? (() => execFileCommand(this.smiPath, ['-q', '-x'], this.toolTimeoutMs));
    this.hostname = options.hostname ?? getHostname;
  }

  /**
   * Collect telemetry for every GPU on this host
   * Concurrent callers share a single nvidia-smi run
   */
  async collectTelemetry(): Promise<HostTelemetry> {
    if (this.collectingLock) {
      return this.collectingLock;
    }

    this.collectingLock = this.doCollectTelemetry();

    try {
      return await this.collectingLock;
    } finally {
      this.collectingLock = null;
    }
  }

  private async invokeTool(): Promise<string> {
    try {
      return await this.runTool();
    } catch (error) {
      throw new ToolInvocationError(describeToolFailure(error, this.smiPath, this.toolTimeoutMs));
    }
  }

  private async doCollectTelemetry(): Promise<HostTelemetry> {
    const output = await this.invokeTool();
    const parsed = parseSmiOutput(output);

    const gpus = this.rankProcesses
      ? await rankGpuProcesses(parsed, this.ownerLookup, this.topProcesses)
      : parsed;

    return {
      node_name: this.hostname(),
      timestamp: new Date().toISOString(),
      gpus,
    };
  }
}
