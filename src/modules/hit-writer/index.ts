import { appendFileSync, writeFileSync } from 'fs';
import path from 'path';
import { InvalidValueError } from '../../core/errors.js';
import { ensureDir } from '../../core/sim-paths.js';
import { MultiSlot, SingleSlot } from '../../messenger/slots.js';
import { Module, type ModuleContext } from '../../module/module.js';
import type { ModuleRegistration } from '../../module/module-registry.js';
import { MCTrackMessage, PixelHitMessage } from '../../objects/messages.js';
import type { MCTrack } from '../../objects/mc-track.js';
import type { PixelHit } from '../../objects/pixel-hit.js';

export interface EventRecord {
  event: number;
  tracks: readonly MCTrack[];
  detectors: Array<{ detector: string | null; hits: readonly PixelHit[] }>;
}

export function addFileExtension(fileName: string, extension: string): string {
  return path.extname(fileName) === '' ? `${fileName}.${extension}` : fileName;
}

/**
 * Writes every event as one JSON line: the primary tracks and the hits of
 * each detector, in the order the hit messages arrived.
 */
export class HitWriter extends Module {
  readonly hits = new MultiSlot<PixelHitMessage>();
  readonly tracks = new SingleSlot<MCTrackMessage>();

  private readonly fileName: string;
  private readonly detectorFilter: Set<string> | null;
  private filePath = '';
  private written = 0;

  constructor(context: ModuleContext) {
    super(context);

    this.config.setDefault('file_name', 'output.jsonl');
    this.config.setDefault('input', '');
    this.fileName = addFileExtension(this.config.getText('file_name'), 'jsonl');

    if (this.config.has('detectors')) {
      const names = this.config.getArray('detectors');
      for (const name of names) {
        if (!this.geometry.hasDetector(name)) {
          throw new InvalidValueError(this.config.getName(), 'detectors', `detector ${name} is not part of the geometry`);
        }
      }
      this.detectorFilter = new Set(names);
    } else {
      this.detectorFilter = null;
    }

    this.messenger.bindMulti(this, PixelHitMessage, this.hits, {
      channel: this.config.getText('input'),
      required: true,
    });
    this.messenger.bindSingle(this, MCTrackMessage, this.tracks, { required: true });
  }

  async initialize(): Promise<void> {
    ensureDir(this.outputDir);
    this.filePath = path.join(this.outputDir, this.fileName);
    writeFileSync(this.filePath, '', 'utf-8');
    this.log.debug('Opened output file', { file: this.filePath });
  }

  async run(event: number): Promise<void> {
    const record: EventRecord = {
      event,
      tracks: this.tracks.value?.tracks ?? [],
      detectors: [],
    };

    for (const message of this.hits) {
      const detector = message.detector?.name ?? null;
      if (this.detectorFilter && (detector === null || !this.detectorFilter.has(detector))) {
        continue;
      }
      record.detectors.push({ detector, hits: message.hits });
    }

    appendFileSync(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
    this.written++;
  }

  async finalize(): Promise<void> {
    this.log.info(`Wrote ${this.written} events to file`, { file: this.filePath });
  }

  getOutputFile(): string {
    return this.filePath;
  }

  getWrittenEvents(): number {
    return this.written;
  }
}

export const hitWriterRegistration: ModuleRegistration = {
  type: 'HitWriter',
  kind: 'unique',
  description: 'Writes tracks and pixel hits of every event to a JSONL file',
  factory: (context) => new HitWriter(context),
};
