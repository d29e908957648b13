import chalk from 'chalk';
import { CollectorConfig, DEFAULT_COLLECTOR_CONFIG } from '../types/collector-config';
import { GpuCollector } from '../lib/gpu-collector';
import { CollectorServer } from '../lib/collector-server';
import { parsePort, parsePositiveInteger } from '../lib/config-loader';
import { handleShutdownSignals } from '../utils/process-utils';

export interface CollectorCommandOptions {
  port?: string;
  host?: string;
  smiPath?: string;
  rankProcesses?: boolean;
  top?: string;
  toolTimeout?: string;
  verbose?: boolean;
  logFile?: string;
}

/**
 * Build the collector configuration from command-line flags
 */
export function resolveCollectorConfig(options: CollectorCommandOptions): CollectorConfig {
  return {
    port: options.port !== undefined ? parsePort(options.port) : DEFAULT_COLLECTOR_CONFIG.port,
    host: options.host ?? DEFAULT_COLLECTOR_CONFIG.host,
    smiPath: options.smiPath ?? DEFAULT_COLLECTOR_CONFIG.smiPath,
    rankProcesses: options.rankProcesses ?? DEFAULT_COLLECTOR_CONFIG.rankProcesses,
    topProcesses:
      options.top !== undefined
        ? parsePositiveInteger(options.top, '--top')
        : DEFAULT_COLLECTOR_CONFIG.topProcesses,
    toolTimeoutMs:
      options.toolTimeout !== undefined
        ? parsePositiveInteger(options.toolTimeout, '--tool-timeout')
        : DEFAULT_COLLECTOR_CONFIG.toolTimeoutMs,
    verbose: options.verbose ?? DEFAULT_COLLECTOR_CONFIG.verbose,
  };
}

export async function collectorCommand(options: CollectorCommandOptions): Promise<void> {
  const config = resolveCollectorConfig(options);

  const collector = new GpuCollector({
    smiPath: config.smiPath,
    toolTimeoutMs: config.toolTimeoutMs,
    rankProcesses: config.rankProcesses,
    topProcesses: config.topProcesses,
  });

  const server = new CollectorServer(collector, {
    port: config.port,
    host: config.host,
    verbose: config.verbose,
    logFilePath: options.logFile,
  });

  await server.start();

  console.log(chalk.green('✓ GPU collector started\n'));
  console.log(chalk.bold('  Endpoint:'), chalk.cyan(`http://${config.host}:${server.port}/gpu-info`));
  console.log(chalk.bold('  Tool:    '), config.smiPath);
  if (config.rankProcesses) {
    console.log(chalk.bold('  Ranking: '), `top ${config.topProcesses} processes per GPU, with owners`);
  }
  console.log();

  handleShutdownSignals('Collector', () => server.stop());
}
