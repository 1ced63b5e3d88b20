import { describe, it, expect, beforeEach } from 'vitest';
import { ParticleSource } from '../../src/modules/particle-source/index.js';
import { MCTrackMessage } from '../../src/objects/messages.js';
import { Messenger } from '../../src/messenger/messenger.js';
import { InvalidValueError } from '../../src/core/errors.js';
import { createContext, createModule } from './_helpers/module-test-utils.js';

describe('ParticleSource', () => {
  let messenger: Messenger;
  let received: MCTrackMessage[];

  beforeEach(() => {
    messenger = new Messenger();
    received = [];
    const sink = createModule('Sink', messenger);
    messenger.registerListener(sink, MCTrackMessage, (message) => received.push(message));
  });

  it('declares its output and dispatches one message per event', async () => {
    const source = new ParticleSource(createContext('ParticleSource', {
      messenger,
      config: { particles_per_event: 3 },
    }));
    messenger.startRun();

    await source.run(1);
    await source.run(2);

    expect(messenger.getOutputs().map(o => o.messageType)).toEqual([MCTrackMessage]);
    expect(received).toHaveLength(2);
    expect(received[0].tracks.map(t => t.id)).toEqual([1, 2, 3]);
    expect(received[0].tracks.every(t => t.particleId === 211)).toBe(true);
    expect(received[0].detector).toBeUndefined();
  });

  it('spreads energies within 5% of the nominal energy', async () => {
    const source = new ParticleSource(createContext('ParticleSource', {
      messenger,
      config: { particles_per_event: 20, energy: 100, particle_type: 'e-' },
    }));
    messenger.startRun();

    await source.run(1);

    for (const track of received[0].tracks) {
      expect(track.particleId).toBe(11);
      expect(track.energy).toBeGreaterThanOrEqual(95);
      expect(track.energy).toBeLessThanOrEqual(105);
    }
  });

  it('repeats the same tracks for the same seed and event', async () => {
    const other = new Messenger();
    const otherReceived: MCTrackMessage[] = [];
    other.registerListener(createModule('Sink', other), MCTrackMessage, (message) => otherReceived.push(message));

    const first = new ParticleSource(createContext('ParticleSource', { messenger, config: { seed: 7 } }));
    const second = new ParticleSource(createContext('ParticleSource', { messenger: other, config: { seed: 7 } }));
    messenger.startRun();
    other.startRun();

    await first.run(4);
    await second.run(4);

    expect(otherReceived[0].tracks).toEqual(received[0].tracks);
  });

  it('dispatches on the configured output channel', async () => {
    const onChannel: MCTrackMessage[] = [];
    const named = createModule('Named', messenger);
    messenger.registerListener(named, MCTrackMessage, (message) => onChannel.push(message), { channel: 'primary' });
    const source = new ParticleSource(createContext('ParticleSource', { messenger, config: { output: 'primary' } }));
    messenger.startRun();

    await source.run(1);

    expect(messenger.hasProducer(MCTrackMessage, 'primary')).toBe(true);
    expect(onChannel).toHaveLength(1);
    expect(received).toHaveLength(1);
  });

  it('rejects invalid settings', () => {
    expect(() => new ParticleSource(createContext('ParticleSource', { messenger, config: { particle_type: 'kaon' } })))
      .toThrow(InvalidValueError);
    expect(() => new ParticleSource(createContext('ParticleSource', { messenger, config: { particles_per_event: 0 } })))
      .toThrow("Value of 'particles_per_event' in section 'ParticleSource' is not valid: must be at least 1");
    expect(() => new ParticleSource(createContext('ParticleSource', { messenger, config: { energy: -1 } })))
      .toThrow("Value of 'energy' in section 'ParticleSource' is not valid: must be positive");
  });
});
