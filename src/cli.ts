#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { collectorCommand } from './commands/collector';
import { aggregatorCommand } from './commands/aggregator';
import { statusCommand } from './commands/status';
import { monitorCommand } from './commands/monitor';

const program = new Command();

program
  .name('gpumon')
  .description('Collect GPU telemetry from many hosts and view it in one place')
  .version('1.0.0');

// Per-host collector
program
  .command('collector')
  .description('Serve this host\'s nvidia-smi telemetry over HTTP')
  .option('-p, --port <number>', 'Port to listen on (default: 8081)')
  .option('-H, --host <address>', 'Address to bind (default: 0.0.0.0)')
  .option('--smi-path <path>', 'nvidia-smi binary (default: nvidia-smi)')
  .option('--rank-processes', 'Resolve process owners and keep only the heaviest processes per GPU')
  .option('--top <number>', 'Processes kept per GPU with --rank-processes (default: 2)')
  .option('--tool-timeout <ms>', 'Kill nvidia-smi after this many milliseconds (default: no limit)')
  .option('--log-file <path>', 'Append a JSON line per request to this file')
  .option('-v, --verbose', 'Log every request')
  .action(async (options) => {
    try {
      await collectorCommand(options);
    } catch (error) {
      console.error(chalk.red('✗ Failed to start collector'));
      console.error(chalk.gray((error as Error).message));
      process.exit(1);
    }
  });

// Central aggregator
program
  .command('aggregator')
  .description('Poll all configured collectors and serve the merged view')
  .option('-c, --config <path>', 'Path to config file', 'config.json')
  .option('-p, --port <number>', 'Port to listen on (overrides config)')
  .option('-v, --verbose', 'Log every request and poll cycle')
  .action(async (options) => {
    try {
      await aggregatorCommand(options);
    } catch (error) {
      console.error(chalk.red('✗ Failed to start aggregator'));
      console.error(chalk.gray((error as Error).message));
      process.exit(1);
    }
  });

// One-shot status table
program
  .command('status [name]')
  .description('Show node status from a running aggregator (all nodes, or one by name)')
  .option('-u, --url <url>', 'Aggregator URL (default: http://localhost:8080)')
  .option('-t, --timeout <ms>', 'Request timeout (default: 5000)')
  .action(async (name: string | undefined, options) => {
    try {
      await statusCommand(name, options);
    } catch (error) {
      console.error(chalk.red('✗ Error:'), (error as Error).message);
      process.exit(1);
    }
  });

// Live dashboard
program
  .command('monitor')
  .description('Live terminal dashboard of all nodes')
  .option('-u, --url <url>', 'Aggregator URL (default: http://localhost:8080)')
  .option('-i, --interval <ms>', 'Refresh interval (default: 2000)')
  .action(async (options) => {
    try {
      await monitorCommand(options);
    } catch (error) {
      console.error(chalk.red('✗ Error:'), (error as Error).message);
      process.exit(1);
    }
  });

// Parse arguments
program.parse();
