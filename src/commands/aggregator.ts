import chalk from 'chalk';
import { loadAggregatorConfig } from '../lib/config-loader';
import { NodeRegistry } from '../lib/node-registry';
import { NodePoller } from '../lib/node-poller';
import { AggregatorServer } from '../lib/aggregator-server';
import { displayName } from '../types/node-status';
import { handleShutdownSignals } from '../utils/process-utils';

export interface AggregatorCommandOptions {
  config: string;
  port?: string;
  verbose?: boolean;
}

export async function aggregatorCommand(options: AggregatorCommandOptions): Promise<void> {
  const config = await loadAggregatorConfig(options.config, options.port);
  const settings = config.aggregator;
  const verbose = options.verbose ?? settings.verbose;

  if (config.nodes.length === 0) {
    console.log(chalk.yellow(`⚠️  No nodes configured in ${options.config}`));
  }

  const registry = new NodeRegistry(config.nodes);
  const poller = new NodePoller(config.nodes, registry, {
    intervalMs: settings.pollIntervalMs,
    timeoutMs: settings.fetchTimeoutMs,
    verbose,
  });
  const server = new AggregatorServer(
    registry,
    {
      port: settings.port,
      host: settings.host,
      verbose,
      logFilePath: settings.logFile,
    },
    poller
  );

  await server.start();
  poller.start();

  console.log(chalk.green('✓ Aggregator started\n'));
  console.log(chalk.bold('  Dashboard:'), chalk.cyan(`http://${settings.host}:${server.port}/`));
  console.log(chalk.bold('  Polling:  '), `every ${settings.pollIntervalMs}ms (timeout ${settings.fetchTimeoutMs}ms)`);
  for (const node of config.nodes) {
    console.log(chalk.dim(`    ${displayName(node)} → ${node.host}:${node.port}`));
  }
  console.log();

  handleShutdownSignals('Aggregator', async () => {
    await poller.stop();
    await server.stop();
  });
}
