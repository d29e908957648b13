import chalk from 'chalk';
import Table from 'cli-table3';
import { AggregatorClient, DEFAULT_AGGREGATOR_URL } from '../lib/aggregator-client';
import { parsePositiveInteger } from '../lib/config-loader';
import { NodeState, NodeStatus, OfflineNodeStatus, displayName } from '../types/node-status';
import { formatAge, formatBytes, formatPower } from '../utils/format-utils';
import { summarizeTelemetry } from '../utils/telemetry-utils';

export interface StatusCommandOptions {
  url?: string;
  timeout?: string;
}

export const STATUS_LABELS: Record<NodeState, string> = {
  online: '✅ ONLINE',
  offline: '❌ OFFLINE',
  unknown: '⏳ UNKNOWN',
};

const STATUS_COLORS: Record<NodeState, (text: string) => string> = {
  online: chalk.green,
  offline: chalk.red,
  unknown: chalk.yellow,
};

/**
 * Table cells for one node (uncolored)
 */
export function describeNode(node: NodeStatus, now: number = Date.now()): string[] {
  const cells = [displayName(node), `${node.host}:${node.port}`, STATUS_LABELS[node.status]];

  if (node.status !== 'online') {
    return [...cells, '-', '-', '-', '-', '-', formatAge(node.last_update, now)];
  }

  const summary = summarizeTelemetry(node.data);
  return [
    ...cells,
    summary.gpuCount.toString(),
    `${summary.avgUtilization.toFixed(0)}%`,
    `${formatBytes(summary.memoryUsed)} / ${formatBytes(summary.memoryTotal)}`,
    formatPower(summary.powerUsage),
    `${summary.maxTemperature}°C`,
    formatAge(node.last_update, now),
  ];
}

export async function statusCommand(name: string | undefined, options: StatusCommandOptions): Promise<void> {
  const timeout = options.timeout !== undefined ? parsePositiveInteger(options.timeout, '--timeout') : 5000;
  const client = new AggregatorClient(options.url ?? DEFAULT_AGGREGATOR_URL, timeout);

  if (name !== undefined) {
    const node = await client.getNode(name);
    if (!node) {
      throw new Error(`Node not found: ${name}`);
    }
    printNodes([node]);
    return;
  }

  const nodes = await client.listNodes();

  if (nodes.length === 0) {
    console.log(chalk.yellow('No nodes configured.'));
    console.log(chalk.dim('\nAdd nodes to the aggregator config file and restart it.'));
    return;
  }

  printNodes(nodes);

  const counts: Record<NodeState, number> = { online: 0, offline: 0, unknown: 0 };
  for (const node of nodes) {
    counts[node.status]++;
  }

  const summary = [chalk.green(`${counts.online} online`), chalk.red(`${counts.offline} offline`)];
  if (counts.unknown > 0) {
    summary.push(chalk.yellow(`${counts.unknown} unknown`));
  }

  console.log(chalk.dim(`\nTotal: ${nodes.length} nodes (${summary.join(', ')})`));
}

/**
 * Node table followed by the errors of offline nodes
 */
function printNodes(nodes: NodeStatus[]): void {
  const table = new Table({
    head: ['NODE', 'ADDRESS', 'STATUS', 'GPUS', 'UTIL', 'MEMORY', 'POWER', 'TEMP', 'UPDATED'],
  });

  const now = Date.now();
  for (const node of nodes) {
    const cells = describeNode(node, now);
    cells[2] = STATUS_COLORS[node.status](cells[2]);
    table.push(cells);
  }

  console.log(table.toString());

  const offline = nodes.filter((node): node is OfflineNodeStatus => node.status === 'offline');
  if (offline.length > 0) {
    console.log(chalk.red('\nOffline nodes:'));
    for (const node of offline) {
      console.log(chalk.red(`  ${node.name}: ${node.error}`));
    }
  }
}
