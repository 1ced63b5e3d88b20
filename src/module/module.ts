import { logger, type ModuleLogger } from '../core/logger.js';
import type { Configuration } from '../core/config/configuration.js';
import type { Detector } from '../geometry/detector.js';
import type { GeometryManager } from '../geometry/geometry-manager.js';
import type { Messenger } from '../messenger/messenger.js';

export type ModuleKind = 'unique' | 'detector';

export interface ModuleContext {
  /** Unique instance name, e.g. `HitWriter` or `HitGenerator:telescope0` */
  name: string;
  config: Configuration;
  messenger: Messenger;
  geometry: GeometryManager;
  /** Directory output files are written to */
  outputDir: string;
  /** Set for detector modules only */
  detector?: Detector;
}

export type ModuleStatus = 'constructed' | 'initialized' | 'finalized' | 'error';

/**
 * A simulation stage. Subclasses bind their inputs and declare their outputs
 * on the messenger in the constructor; the module manager calls the hooks.
 */
export abstract class Module {
  readonly name: string;
  readonly config: Configuration;
  readonly detector?: Detector;

  protected readonly messenger: Messenger;
  protected readonly geometry: GeometryManager;
  protected readonly outputDir: string;
  protected readonly log: ModuleLogger;

  private status: ModuleStatus = 'constructed';

  constructor(context: ModuleContext) {
    this.name = context.name;
    this.config = context.config;
    this.detector = context.detector;
    this.messenger = context.messenger;
    this.geometry = context.geometry;
    this.outputDir = context.outputDir;
    this.log = logger.module(context.name);
  }

  async initialize(): Promise<void> {}

  abstract run(event: number): Promise<void>;

  async finalize(): Promise<void> {}

  getStatus(): ModuleStatus {
    return this.status;
  }

  /** Called by the module manager only */
  setStatus(status: ModuleStatus): void {
    this.status = status;
  }
}
