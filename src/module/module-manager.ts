/**
 * Simstage Core - Module Manager
 *
 * Builds the module chain from the run configuration, validates the wiring
 * and drives the run: initialize -> events -> finalize.
 */

import { logger } from '../core/logger.js';
import { SetupError } from '../core/errors.js';
import type { ModuleEntry } from '../core/config/config-loader.js';
import type { Detector } from '../geometry/detector.js';
import type { GeometryManager } from '../geometry/geometry-manager.js';
import { Messenger } from '../messenger/messenger.js';
import type { Module } from './module.js';
import type { ModuleRegistry } from './module-registry.js';
import { validateWiring } from './wiring-validator.js';

export interface ModuleManagerOptions {
  registry: ModuleRegistry;
  geometry: GeometryManager;
  outputDir: string;
  messenger?: Messenger;
}

export interface RunSummary {
  events: number;
  modules: string[];
  /** events skipped per module because a required input was not delivered */
  skipped: Record<string, number>;
}

export class ModuleManager {
  private modules: Module[] = [];
  private readonly registry: ModuleRegistry;
  private readonly geometry: GeometryManager;
  private readonly outputDir: string;
  readonly messenger: Messenger;
  private log = logger.module('ModuleManager');

  constructor(options: ModuleManagerOptions) {
    this.registry = options.registry;
    this.geometry = options.geometry;
    this.outputDir = options.outputDir;
    this.messenger = options.messenger ?? new Messenger();
  }

  load(entries: ModuleEntry[]): Module[] {
    const created: Module[] = [];
    for (const entry of entries) {
      const reg = this.registry.get(entry.type);

      if (reg.kind === 'unique') {
        created.push(this.instantiate(entry, entry.name ?? entry.type));
        continue;
      }

      const detectors = this.selectDetectors(entry);
      if (detectors.length === 0) {
        this.log.warn('Detector module has no detectors to run on', { type: entry.type });
      }
      for (const detector of detectors) {
        const base = entry.name ?? entry.type;
        created.push(this.instantiate(entry, `${base}:${detector.name}`, detector));
      }
    }
    return created;
  }

  validate(): void {
    validateWiring(this.messenger);
  }

  async run(events: number): Promise<RunSummary> {
    if (!Number.isInteger(events) || events < 0) {
      throw new SetupError(`Number of events must be a non-negative integer, got ${events}`, { events });
    }

    this.validate();
    this.messenger.startRun();

    for (const module of this.modules) {
      await this.invoke(module, 'initialize', () => module.initialize());
      module.setStatus('initialized');
    }

    const skipped: Record<string, number> = {};
    for (let event = 1; event <= events; event++) {
      this.log.debug('Running event', { event });
      for (const module of this.modules) {
        const missing = this.messenger.getMissingInputs(module);
        if (missing.length > 0) {
          skipped[module.name] = (skipped[module.name] ?? 0) + 1;
          this.log.debug('Module skipped, required input not delivered', {
            module: module.name,
            event,
            missing: missing.map(d => d.messageType.name),
          });
          continue;
        }
        await this.invoke(module, `run(${event})`, () => module.run(event));
      }
      this.messenger.resetEvent();
    }

    for (const module of this.modules) {
      await this.invoke(module, 'finalize', () => module.finalize());
      module.setStatus('finalized');
    }

    const stats = this.messenger.getStats();
    this.log.info('Run finished', { events, modules: this.modules.length, dropped: stats.dropped });

    return { events, modules: this.modules.map(m => m.name), skipped };
  }

  getModules(): Module[] {
    return [...this.modules];
  }

  getModule(name: string): Module | undefined {
    return this.modules.find(m => m.name === name);
  }

  /** Tears down the chain: unregisters every module and releases the messenger */
  dispose(): void {
    for (const module of this.modules) {
      this.messenger.unregister(module);
    }
    this.modules = [];
    this.messenger.dispose();
  }

  private instantiate(entry: ModuleEntry, name: string, detector?: Detector): Module {
    if (this.modules.some(m => m.name === name)) {
      throw new SetupError(`Module name ${name} is used twice`, { module: name });
    }
    const module = this.registry.create(entry.type, {
      name,
      config: entry.config,
      messenger: this.messenger,
      geometry: this.geometry,
      outputDir: this.outputDir,
      detector,
    });
    this.modules.push(module);
    this.log.debug('Module constructed', { module: name, type: entry.type });
    return module;
  }

  private selectDetectors(entry: ModuleEntry): Detector[] {
    if (entry.config.has('detectors')) {
      return entry.config.getArray('detectors').map(name => this.geometry.getDetector(name));
    }
    if (entry.config.has('detector_type')) {
      const types = entry.config.getArray('detector_type');
      return this.geometry.getDetectors().filter(d => types.includes(d.type));
    }
    return this.geometry.getDetectors();
  }

  private async invoke(module: Module, stage: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      module.setStatus('error');
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.fatal(`Module ${module.name} failed in ${stage}`, error, { module: module.name, stage });
      throw err;
    }
  }
}
