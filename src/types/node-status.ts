import { HostTelemetry } from './telemetry';

export interface NodeConfig {
  name: string;           // Unique key, used in /api/nodes/{name}
  host: string;
  port: number;
  alias: string;          // Display name ('' when not configured)
}

export type NodeState = 'unknown' | 'online' | 'offline';

interface NodeStatusBase extends NodeConfig {
  last_update: string | null;   // ISO timestamp of the last completed poll
}

export interface UnknownNodeStatus extends NodeStatusBase {
  status: 'unknown';
}

export interface OnlineNodeStatus extends NodeStatusBase {
  status: 'online';
  data: HostTelemetry;
}

export interface OfflineNodeStatus extends NodeStatusBase {
  status: 'offline';
  error: string;
}

export type NodeStatus = UnknownNodeStatus | OnlineNodeStatus | OfflineNodeStatus;

/**
 * Initial record for a configured node that has not been polled yet
 */
export function createUnknownStatus(node: NodeConfig): UnknownNodeStatus {
  return {
    name: node.name,
    host: node.host,
    port: node.port,
    alias: node.alias,
    last_update: null,
    status: 'unknown',
  };
}

/**
 * Label shown in tables and the dashboard
 */
export function displayName(node: NodeConfig): string {
  return node.alias ? `${node.alias} (${node.name})` : node.name;
}
