#!/usr/bin/env node
/**
 * Simstage CLI
 */

import { Command, InvalidArgumentError } from 'commander';
import { logger, isLogLevel, type LogLevel } from '../core/logger.js';
import { loadRunConfig } from '../core/config/config-loader.js';
import { Simulation } from '../app/simulation.js';
import { createDefaultRegistry } from '../modules/index.js';
import { exitWithError } from './errors.js';

function parseEvents(value: string): number {
  const events = Number(value);
  if (!Number.isInteger(events) || events < 0) {
    throw new InvalidArgumentError('must be a non-negative integer');
  }
  return events;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('must be one of debug, info, warn, error, fatal');
  }
  return value;
}

const program = new Command();

program
  .name('simstage')
  .description('Modular detector simulation')
  .version('0.1.0');

program
  .command('run')
  .description('Run a simulation from a configuration file')
  .argument('<config>', 'run configuration (YAML)')
  .option('-n, --events <n>', 'number of events, overrides the configuration', parseEvents)
  .option('-o, --output <dir>', 'output directory, overrides the configuration')
  .option('-l, --log-level <level>', 'console log level', parseLogLevel)
  .option('--log-dir <dir>', 'also write JSONL logs to this directory')
  .action(async (configPath: string, options: { events?: number; output?: string; logLevel?: LogLevel; logDir?: string }) => {
    try {
      if (options.logDir) {
        logger.configure({ logDir: options.logDir, enableFile: true });
      }
      const config = loadRunConfig(configPath);
      const simulation = new Simulation(config, {
        events: options.events,
        outputDir: options.output,
        logLevel: options.logLevel,
      });
      const result = await simulation.run();
      console.log(`Processed ${result.events} events with ${result.modules.length} modules`);
      console.log(`Output directory: ${result.outputDir}`);
    } catch (error) {
      exitWithError(error);
    }
  });

program
  .command('modules')
  .description('List available module types')
  .action(() => {
    for (const info of createDefaultRegistry().describe()) {
      console.log(`${info.type.padEnd(16)} ${info.kind.padEnd(9)} ${info.description}`);
    }
  });

program.parseAsync(process.argv).catch(exitWithError);
