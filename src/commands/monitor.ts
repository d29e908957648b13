import blessed from 'blessed';
import { AggregatorClient, DEFAULT_AGGREGATOR_URL } from '../lib/aggregator-client';
import { parsePositiveInteger } from '../lib/config-loader';
import { createNodesMonitorUI } from '../tui/NodesMonitorApp';

export interface MonitorCommandOptions {
  url?: string;
  interval?: string;
}

export async function monitorCommand(options: MonitorCommandOptions): Promise<void> {
  const interval = options.interval !== undefined ? parsePositiveInteger(options.interval, '--interval') : 2000;
  const client = new AggregatorClient(options.url ?? DEFAULT_AGGREGATOR_URL);

  // Create blessed screen
  const screen = blessed.screen({
    smartCSR: true,
    title: 'GPU Node Monitor',
  });

  await createNodesMonitorUI(screen, client, interval);

  // The process stays alive until the user presses Q/Ctrl+C
}
