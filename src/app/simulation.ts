/**
 * Simulation entry: run configuration -> geometry -> module chain -> events
 */

import path from 'path';
import { logger, isLogLevel, type LogLevel } from '../core/logger.js';
import { InvalidValueError } from '../core/errors.js';
import { SIMULATION_SECTION, type RunConfig } from '../core/config/config-loader.js';
import { GeometryManager } from '../geometry/geometry-manager.js';
import { ModuleManager, type RunSummary } from '../module/module-manager.js';
import type { ModuleRegistry } from '../module/module-registry.js';
import { createDefaultRegistry } from '../modules/index.js';

export interface SimulationOverrides {
  events?: number;
  outputDir?: string;
  logLevel?: LogLevel;
}

export interface SimulationResult extends RunSummary {
  outputDir: string;
}

export class Simulation {
  readonly geometry: GeometryManager;
  readonly manager: ModuleManager;
  readonly outputDir: string;
  private readonly events: number;
  private log = logger.module('Simulation');

  constructor(config: RunConfig, overrides: SimulationOverrides = {}, registry: ModuleRegistry = createDefaultRegistry()) {
    const settings = config.simulation;
    settings.setDefault('events', 1);
    settings.setDefault('output_directory', 'output');

    if (overrides.logLevel) {
      logger.configure({ level: overrides.logLevel });
    } else if (settings.has('log_level')) {
      const level = settings.getText('log_level');
      if (!isLogLevel(level)) {
        throw new InvalidValueError(SIMULATION_SECTION, 'log_level', `unknown level ${level}`);
      }
      logger.configure({ level });
    }

    this.events = overrides.events ?? settings.getInteger('events');
    this.outputDir = overrides.outputDir
      ? path.resolve(overrides.outputDir)
      : settings.getPath('output_directory');

    this.geometry = GeometryManager.fromEntries(config.detectors);
    this.manager = new ModuleManager({
      registry,
      geometry: this.geometry,
      outputDir: this.outputDir,
    });
    this.manager.load(config.modules);
    this.log.info('Simulation set up', {
      detectors: this.geometry.getDetectors().map(d => d.name),
      modules: this.manager.getModules().map(m => m.name),
    });
  }

  async run(): Promise<SimulationResult> {
    const summary = await this.manager.run(this.events);
    return { ...summary, outputDir: this.outputDir };
  }
}
