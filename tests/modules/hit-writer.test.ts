import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { HitWriter, addFileExtension } from '../../src/modules/hit-writer/index.js';
import { MCTrackMessage, PixelHitMessage } from '../../src/objects/messages.js';
import { Messenger } from '../../src/messenger/messenger.js';
import { Detector } from '../../src/geometry/detector.js';
import { GeometryManager } from '../../src/geometry/geometry-manager.js';
import { InvalidValueError } from '../../src/core/errors.js';
import { cleanupTempDir, createContext, createTempDir } from './_helpers/module-test-utils.js';

describe('HitWriter', () => {
  let messenger: Messenger;
  let geometry: GeometryManager;
  let outputDir: string;

  beforeEach(() => {
    messenger = new Messenger();
    geometry = new GeometryManager();
    geometry.addDetector(new Detector('d0', 'timepix'));
    geometry.addDetector(new Detector('d1', 'timepix'));
    outputDir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(outputDir);
  });

  it('binds pixel hits and tracks as required inputs', () => {
    const writer = new HitWriter(createContext('HitWriter', { messenger, geometry, outputDir }));

    expect(messenger.getRegistrationsFor(writer).map(d => [d.kind, d.messageType.name, d.required])).toEqual([
      ['multi', 'PixelHitMessage', true],
      ['single', 'MCTrackMessage', true],
    ]);
  });

  it('writes one JSON line per event', async () => {
    const writer = new HitWriter(createContext('HitWriter', {
      messenger,
      geometry,
      outputDir,
      config: { file_name: 'hits' },
    }));
    messenger.startRun();
    await writer.initialize();

    messenger.dispatch(new MCTrackMessage([{ id: 1, particleId: 211, energy: 120 }]));
    messenger.dispatch(new PixelHitMessage([{ pixel: { x: 1, y: 2 }, charge: 300, trackId: 1 }], geometry.getDetector('d0')));
    messenger.dispatch(new PixelHitMessage([], geometry.getDetector('d1')));
    await writer.run(1);
    messenger.resetEvent();

    messenger.dispatch(new MCTrackMessage([]));
    await writer.run(2);

    expect(writer.getOutputFile()).toBe(join(outputDir, 'hits.jsonl'));
    expect(writer.getWrittenEvents()).toBe(2);
    expect(readFileSync(writer.getOutputFile(), 'utf-8').split('\n')).toEqual([
      '{"event":1,"tracks":[{"id":1,"particleId":211,"energy":120}],"detectors":[' +
        '{"detector":"d0","hits":[{"pixel":{"x":1,"y":2},"charge":300,"trackId":1}]},' +
        '{"detector":"d1","hits":[]}]}',
      '{"event":2,"tracks":[],"detectors":[]}',
      '',
    ]);
  });

  it('keeps only the configured detectors', async () => {
    const writer = new HitWriter(createContext('HitWriter', {
      messenger,
      geometry,
      outputDir,
      config: { detectors: ['d1'] },
    }));
    messenger.startRun();
    await writer.initialize();

    messenger.dispatch(new MCTrackMessage([]));
    messenger.dispatch(new PixelHitMessage([], geometry.getDetector('d0')));
    messenger.dispatch(new PixelHitMessage([], geometry.getDetector('d1')));
    messenger.dispatch(new PixelHitMessage([]));
    await writer.run(1);

    expect(readFileSync(join(outputDir, 'output.jsonl'), 'utf-8'))
      .toBe('{"event":1,"tracks":[],"detectors":[{"detector":"d1","hits":[]}]}\n');
  });

  it('rejects detectors that are not in the geometry', () => {
    expect(() => new HitWriter(createContext('HitWriter', {
      messenger,
      geometry,
      outputDir,
      config: { detectors: ['d7'] },
    }))).toThrow(new InvalidValueError('HitWriter', 'detectors', 'detector d7 is not part of the geometry').message);
  });

  it('adds a file extension only when there is none', () => {
    expect(addFileExtension('hits', 'jsonl')).toBe('hits.jsonl');
    expect(addFileExtension('hits.txt', 'jsonl')).toBe('hits.txt');
  });
});
