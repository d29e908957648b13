import { NodeConfig, NodeStatus, createUnknownStatus } from '../types/node-status';

/**
 * Keyed store of per-node status.
 *
 * Every operation is synchronous, so it completes on the event loop
 * before any other callback runs: readers never see a half-written record
 * and no lock is held across I/O. Records are replaced whole on write and
 * deep-copied on read, so a caller serializing a snapshot never observes a
 * later write.
 */
export class NodeRegistry {
  private readonly nodes = new Map<string, NodeStatus>();

  constructor(nodes: NodeConfig[] = []) {
    for (const node of nodes) {
      this.nodes.set(node.name, createUnknownStatus(node));
    }
  }

  /**
   * Replace a node's record (inserted if the name is new)
   */
  upsertStatus(name: string, status: NodeStatus): void {
    this.nodes.set(name, structuredClone(status));
  }

  /**
   * Snapshot of every record, in configuration order
   */
  getAll(): NodeStatus[] {
    return Array.from(this.nodes.values(), (status) => structuredClone(status));
  }

  /**
   * Snapshot of one record, undefined if the name is not configured
   */
  get(name: string): NodeStatus | undefined {
    const status = this.nodes.get(name);
    return status ? structuredClone(status) : undefined;
  }

  get size(): number {
    return this.nodes.size;
  }
}
