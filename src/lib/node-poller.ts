import { HostTelemetry } from '../types/telemetry';
import { NodeConfig, NodeState, NodeStatus } from '../types/node-status';
import { DEFAULT_AGGREGATOR_SETTINGS } from '../types/aggregator-config';
import { NodeRegistry } from './node-registry';
import { HostTelemetrySchema, describeIssues } from './telemetry-schema';

export type FetchFn = typeof fetch;

export interface NodePollerOptions {
  intervalMs?: number;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  verbose?: boolean;
}

export type PollOutcome =
  | { ok: true; data: HostTelemetry }
  | { ok: false; error: string };

export interface TickResult {
  startedAt: string;      // ISO timestamp
  durationMs: number;
  online: number;
  offline: number;
}

/**
 * Polls every configured collector on a fixed cadence and records each
 * node's liveness in the registry.
 *
 * A tick fetches all nodes concurrently and completes only once every
 * fetch has resolved; the wait for the next tick starts after that, so
 * ticks never overlap. Failed nodes are retried at the next tick.
 */
export class NodePoller {
  private readonly nodes: ReadonlyArray<Readonly<NodeConfig>>;
  private readonly registry: NodeRegistry;
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly verbose: boolean;

  private running = false;
  private loopPromise: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wakeUp: (() => void) | null = null;
  private lastTickResult: TickResult | null = null;

  constructor(nodes: NodeConfig[], registry: NodeRegistry, options: NodePollerOptions = {}) {
    this.nodes = Object.freeze(nodes.map((node) => Object.freeze({ ...node })));
    this.registry = registry;
    this.intervalMs = options.intervalMs ?? DEFAULT_AGGREGATOR_SETTINGS.pollIntervalMs;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_AGGREGATOR_SETTINGS.fetchTimeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Start polling: one tick immediately, then one per interval
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    this.loopPromise = this.runLoop();
  }

  /**
   * Stop polling; resolves once the in-flight tick (if any) has finished
   */
  async stop(): Promise<void> {
    this.running = false;

    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wakeUp?.();
    this.wakeUp = null;

    await this.loopPromise;
    this.loopPromise = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  get lastTick(): TickResult | null {
    return this.lastTickResult;
  }

  /**
   * Poll every node once and wait for all of them
   */
  async tick(): Promise<TickResult> {
    const startedAt = Date.now();
    const nodes = [...this.nodes];

    const statuses = await Promise.all(nodes.map((node) => this.pollNode(node)));

    const result: TickResult = {
      startedAt: new Date(startedAt).toISOString(),
      durationMs: Date.now() - startedAt,
      online: statuses.filter((status) => status.status === 'online').length,
      offline: statuses.filter((status) => status.status === 'offline').length,
    };
    this.lastTickResult = result;

    if (this.verbose) {
      console.error(
        `[Poller] Tick complete: ${result.online} online, ${result.offline} offline (${result.durationMs}ms)`
      );
    }

    return result;
  }

  /**
   * Fetch one node and replace its registry record with the outcome
   */
  async pollNode(node: NodeConfig): Promise<NodeStatus> {
    const outcome = await this.fetchTelemetry(node);
    const previous = this.registry.get(node.name)?.status;

    const base = {
      name: node.name,
      host: node.host,
      port: node.port,
      alias: node.alias,
      last_update: new Date().toISOString(),
    };
    const status: NodeStatus = outcome.ok
      ? { ...base, status: 'online', data: outcome.data }
      : { ...base, status: 'offline', error: outcome.error };

    this.registry.upsertStatus(node.name, status);
    this.logTransition(node, previous, status);

    return status;
  }

  /**
   * GET /gpu-info from a collector, bounded by the fetch timeout
   */
  async fetchTelemetry(node: NodeConfig): Promise<PollOutcome> {
    const url = `http://${node.host}:${node.port}/gpu-info`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, { signal: controller.signal });
      } catch (error) {
        return { ok: false, error: `Failed to connect: ${this.describeFetchError(error, controller.signal)}` };
      }

      if (response.status !== 200) {
        // Release the connection without reading the body
        await response.body?.cancel();
        return { ok: false, error: `HTTP error: ${response.status}` };
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        return { ok: false, error: `Failed to parse response: ${this.describeFetchError(error, controller.signal)}` };
      }

      const parsed = HostTelemetrySchema.safeParse(body);
      if (!parsed.success) {
        return { ok: false, error: `Failed to parse response: ${describeIssues(parsed.error)}` };
      }

      return { ok: true, data: parsed.data };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private describeFetchError(error: unknown, signal: AbortSignal): string {
    if (signal.aborted) {
      return `request timed out after ${this.timeoutMs}ms`;
    }
    if (!(error instanceof Error)) {
      return String(error);
    }
    // undici reports "fetch failed" and puts the socket error in `cause`
    if (error.cause instanceof Error) {
      return error.cause.message;
    }
    return error.message;
  }

  private logTransition(node: NodeConfig, previous: NodeState | undefined, next: NodeStatus): void {
    if (previous === next.status) return;

    if (next.status === 'offline') {
      console.error(`[Poller] ${node.name} is offline: ${next.error}`);
    } else if (next.status === 'online') {
      console.error(`[Poller] ${node.name} is online`);
    }
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.tick();
      } catch (error) {
        console.error('[Poller] Tick failed:', error);
      }

      if (!this.running) break;
      await this.sleep(this.intervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wakeUp = null;
        resolve();
      }, ms);
    });
  }
}
