import { InvalidValueError } from '../../core/errors.js';
import { Module, type ModuleContext } from '../../module/module.js';
import type { ModuleRegistration } from '../../module/module-registry.js';
import { MCTrackMessage } from '../../objects/messages.js';
import type { MCTrack } from '../../objects/mc-track.js';
import { createRandom } from '../random.js';

const PARTICLE_CODES: Record<string, number> = {
  'e-': 11,
  'e+': -11,
  'mu-': 13,
  'mu+': -13,
  'pi+': 211,
  'pi-': -211,
  gamma: 22,
  proton: 2212,
};

/**
 * Produces the primary particles of every event as one MCTrackMessage.
 */
export class ParticleSource extends Module {
  private readonly particlesPerEvent: number;
  private readonly particleId: number;
  private readonly energy: number;
  private readonly seed: number;
  private readonly channel: string;
  private dispatched = 0;

  constructor(context: ModuleContext) {
    super(context);

    this.config.setDefault('particles_per_event', 1);
    this.config.setDefault('particle_type', 'pi+');
    this.config.setDefault('energy', 120);
    this.config.setDefault('seed', 1);
    this.config.setDefault('output', '');

    this.particlesPerEvent = this.config.getInteger('particles_per_event');
    if (this.particlesPerEvent < 1) {
      throw new InvalidValueError(this.config.getName(), 'particles_per_event', 'must be at least 1');
    }

    const particleType = this.config.getText('particle_type');
    const particleId = PARTICLE_CODES[particleType];
    if (particleId === undefined) {
      throw new InvalidValueError(
        this.config.getName(),
        'particle_type',
        `unknown particle (options are ${Object.keys(PARTICLE_CODES).join(', ')})`
      );
    }
    this.particleId = particleId;

    this.energy = this.config.getNumber('energy');
    if (this.energy <= 0) {
      throw new InvalidValueError(this.config.getName(), 'energy', 'must be positive');
    }

    this.seed = this.config.getInteger('seed');
    this.channel = this.config.getText('output');

    this.messenger.declareOutput(this, MCTrackMessage, { channel: this.channel });
  }

  async run(event: number): Promise<void> {
    const random = createRandom(this.seed, event, this.name);
    const tracks: MCTrack[] = [];
    for (let i = 0; i < this.particlesPerEvent; i++) {
      // +-5% energy spread
      const energy = this.energy * (0.95 + 0.1 * random());
      tracks.push({ id: i + 1, particleId: this.particleId, energy: Math.round(energy * 1000) / 1000 });
    }

    this.messenger.dispatch(new MCTrackMessage(tracks), this.channel);
    this.dispatched++;
  }

  async finalize(): Promise<void> {
    this.log.info('Generated primary particles', {
      events: this.dispatched,
      particles: this.dispatched * this.particlesPerEvent,
    });
  }
}

export const particleSourceRegistration: ModuleRegistration = {
  type: 'ParticleSource',
  kind: 'unique',
  description: 'Generates primary particles (MCTrackMessage) for every event',
  factory: (context) => new ParticleSource(context),
};
