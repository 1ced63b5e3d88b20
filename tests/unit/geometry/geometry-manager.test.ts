import { describe, it, expect } from 'vitest';
import { GeometryManager } from '../../../src/geometry/geometry-manager.js';
import { Detector } from '../../../src/geometry/detector.js';
import { SetupError } from '../../../src/core/errors.js';

describe('GeometryManager', () => {
  it('builds from configuration entries and looks detectors up', () => {
    const geometry = GeometryManager.fromEntries([
      { name: 'plane0', type: 'timepix', position: [0, 0, 0] },
      { name: 'dut', type: 'mimosa', position: [0, 0, 50] },
      { name: 'plane1', type: 'timepix', position: [0, 0, 100] },
    ]);

    expect(geometry.getDetectors().map(d => d.name)).toEqual(['plane0', 'dut', 'plane1']);
    expect(geometry.getDetector('dut').position).toEqual([0, 0, 50]);
    expect(geometry.getDetectorsByType('timepix').map(d => d.name)).toEqual(['plane0', 'plane1']);
    expect(geometry.hasDetector('missing')).toBe(false);
  });

  it('rejects duplicate names and unknown lookups', () => {
    const geometry = new GeometryManager();
    geometry.addDetector(new Detector('plane0', 'timepix'));

    expect(() => geometry.addDetector(new Detector('plane0', 'mimosa')))
      .toThrow('Detector with name plane0 is already registered');
    expect(() => geometry.getDetector('plane9')).toThrow(SetupError);
  });

  it('serialises detectors', () => {
    expect(JSON.stringify(new Detector('d0', 'timepix', [1, 2, 3])))
      .toBe('{"name":"d0","type":"timepix","position":[1,2,3]}');
  });
});
