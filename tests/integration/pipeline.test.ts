import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { parseRunConfig } from '../../src/core/config/config-loader.js';
import { Simulation } from '../../src/app/simulation.js';
import { HitCounter } from '../../src/modules/hit-counter/index.js';
import { MissingInputError } from '../../src/core/errors.js';
import { logger } from '../../src/core/logger.js';
import { cleanupTempDir, createTempDir } from '../modules/_helpers/module-test-utils.js';

const TELESCOPE = `
simulation:
  events: 1
  log_level: error
detectors:
  - name: plane0
    type: timepix
    position: [0, 0, 0]
  - name: plane1
    type: timepix
    position: [0, 0, 100]
modules:
  - type: ParticleSource
    particles_per_event: 2
  - type: HitGenerator
    hits_per_track: 2
    charge_min: 100
    charge_max: 100
  - type: HitCounter
  - type: HitWriter
    file_name: telescope
`;

describe('simulation pipeline', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(outputDir);
    logger.configure({ level: 'info' });
  });

  it('runs the module chain and writes every event', async () => {
    const simulation = new Simulation(parseRunConfig(TELESCOPE), { outputDir, events: 3 });

    const result = await simulation.run();

    expect(result).toEqual({
      events: 3,
      modules: ['ParticleSource', 'HitGenerator:plane0', 'HitGenerator:plane1', 'HitCounter', 'HitWriter'],
      skipped: {},
      outputDir,
    });

    const counter = simulation.manager.getModule('HitCounter');
    expect(counter).toBeInstanceOf(HitCounter);
    if (counter instanceof HitCounter) {
      expect(counter.getCounts()).toEqual({
        plane0: { messages: 3, hits: 12, charge: 1200 },
        plane1: { messages: 3, hits: 12, charge: 1200 },
      });
    }

    const lines = readFileSync(join(outputDir, 'telescope.jsonl'), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(3);
    const records: unknown[] = lines.map(line => JSON.parse(line));
    records.forEach((record, index) => {
      expect(record).toMatchObject({ event: index + 1 });
      expect(record).toHaveProperty('tracks.length', 2);
      expect(record).toHaveProperty('detectors.0.detector', 'plane0');
      expect(record).toHaveProperty('detectors.1.detector', 'plane1');
      expect(record).toHaveProperty('detectors.0.hits.length', 4);
    });
  });

  it('applies the configured log level', () => {
    new Simulation(parseRunConfig(TELESCOPE), { outputDir });

    expect(logger.getLevel()).toBe('error');
  });

  it('routes hits by channel', async () => {
    const config = parseRunConfig(`
detectors:
  - name: dut
    type: mimosa
modules:
  - type: ParticleSource
  - type: HitGenerator
    output: dut_hits
  - type: HitCounter
    input: reference_hits
`);
    const simulation = new Simulation(config, { outputDir, events: 2 });

    await simulation.run();

    const counter = simulation.manager.getModule('HitCounter');
    expect(counter instanceof HitCounter && counter.getCounts()).toEqual({});
    expect(simulation.manager.messenger.getStats()).toMatchObject({
      dropped: 2,
      droppedByType: { PixelHitMessage: 2 },
    });
  });

  it('refuses to start when a required input has no producer', async () => {
    const config = parseRunConfig(`
modules:
  - type: HitWriter
`);
    const simulation = new Simulation(config, { outputDir });

    const run = simulation.run();

    await expect(run).rejects.toBeInstanceOf(MissingInputError);
    await expect(run).rejects.toThrow(
      'Missing required input: ' +
        'module HitWriter requires PixelHitMessage on channel <any> but no module produces it; ' +
        'module HitWriter requires MCTrackMessage on channel <any> but no module produces it'
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => new Simulation(parseRunConfig('simulation:\n  log_level: loud\n'), { outputDir }))
      .toThrow("Value of 'log_level' in section 'simulation' is not valid: unknown level loud");
  });
});
