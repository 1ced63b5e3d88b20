import { describe, it, expect } from 'vitest';
import path from 'path';
import { Configuration } from '../../../src/core/config/configuration.js';
import { InvalidValueError, MissingKeyError } from '../../../src/core/errors.js';

describe('Configuration', () => {
  const config = new Configuration('HitWriter', {
    file_name: 'hits',
    count: 3,
    ratio: '0.25',
    half: 2.5,
    enabled: 'true',
    detectors: ['d0', 'd1'],
    setup: [['d0', 'zsdata', 1], ['d1', 'zsdata', 2]],
  }, '/data/runs');

  it('reads text with and without defaults', () => {
    expect(config.getName()).toBe('HitWriter');
    expect(config.getText('file_name')).toBe('hits');
    expect(config.getText('count')).toBe('3');
    expect(config.getText('missing', 'fallback')).toBe('fallback');
  });

  it('throws a missing key error naming section and key', () => {
    expect(() => config.getText('missing')).toThrow(MissingKeyError);
    expect(() => config.getNumber('missing')).toThrow("Key 'missing' in section 'HitWriter' does not exist");
  });

  it('parses numbers, integers and booleans', () => {
    expect(config.getNumber('ratio')).toBe(0.25);
    expect(config.getInteger('count')).toBe(3);
    expect(config.getBoolean('enabled')).toBe(true);
    expect(config.getBoolean('other', false)).toBe(false);
  });

  it('rejects values of the wrong shape', () => {
    expect(() => config.getNumber('file_name')).toThrow(InvalidValueError);
    expect(() => config.getInteger('half')).toThrow("Value of 'half' in section 'HitWriter' is not valid: 2.5 is not an integer");
    expect(() => config.getBoolean('count')).toThrow('3 is not a boolean');
    expect(() => config.getText('detectors')).toThrow('expected a single value, got a list');
    expect(() => config.getMatrix('detectors')).toThrow('expected a list of lists');
  });

  it('reads lists and matrices', () => {
    expect(config.getArray('detectors')).toEqual(['d0', 'd1']);
    expect(config.getArray('file_name')).toEqual(['hits']);
    expect(config.getNumberArray('count')).toEqual([3]);
    expect(config.getMatrix('setup')).toEqual([['d0', 'zsdata', '1'], ['d1', 'zsdata', '2']]);
  });

  it('resolves paths against the base directory', () => {
    expect(config.getPath('file_name')).toBe(path.resolve('/data/runs', 'hits'));
    expect(config.getPath('abs', '/tmp/out')).toBe('/tmp/out');
  });

  it('only fills defaults for absent keys', () => {
    const local = new Configuration('local', { a: 1 });
    local.setDefault('a', 2);
    local.setDefault('b', 'x');

    expect(local.toRecord()).toEqual({ a: 1, b: 'x' });
    expect(local.keys()).toEqual(['a', 'b']);
    expect(local.print()).toBe('a : 1\nb : "x"');
  });
});
