import { z } from 'zod';
import { NodeStatus } from '../types/node-status';
import { NodeStatusSchema, describeIssues } from './telemetry-schema';
import { FetchFn } from './node-poller';

export const DEFAULT_AGGREGATOR_URL = 'http://localhost:8080';

const NodeListSchema = z.array(NodeStatusSchema);

/**
 * Reads node status from a running aggregator
 */
export class AggregatorClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchFn: FetchFn;

  constructor(baseUrl: string = DEFAULT_AGGREGATOR_URL, timeout: number = 5000, fetchFn: FetchFn = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeout = timeout;
    this.fetchFn = fetchFn;
  }

  /**
   * GET /api/nodes
   */
  async listNodes(): Promise<NodeStatus[]> {
    const body = await this.fetchJson('/api/nodes');
    const parsed = NodeListSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${this.baseUrl}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  /**
   * GET /api/nodes/{name}, null if the aggregator does not know the node
   */
  async getNode(name: string): Promise<NodeStatus | null> {
    const body = await this.fetchJson(`/api/nodes/${encodeURIComponent(name)}`, true);
    if (body === null) {
      return null;
    }

    const parsed = NodeStatusSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${this.baseUrl}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  /**
   * Fetch and decode JSON with timeout
   * Returns null on 404 when allowNotFound is set; throws on any other failure
   */
  private async fetchJson(endpoint: string, allowNotFound: boolean = false): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchFn(`${this.baseUrl}${endpoint}`, {
        signal: controller.signal,
      });

      if (allowNotFound && response.status === 404) {
        return null;
      }
      if (!response.ok) {
        throw new Error(`Aggregator returned HTTP ${response.status} for ${endpoint}`);
      }

      return await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Aggregator at ${this.baseUrl} did not respond within ${this.timeout}ms`);
      }
      if (error instanceof Error && error.cause instanceof Error) {
        throw new Error(`Cannot reach aggregator at ${this.baseUrl}: ${error.cause.message}`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
