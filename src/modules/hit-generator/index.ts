import { InvalidValueError, ModuleError } from '../../core/errors.js';
import type { Detector } from '../../geometry/detector.js';
import { SingleSlot } from '../../messenger/slots.js';
import { Module, type ModuleContext } from '../../module/module.js';
import type { ModuleRegistration } from '../../module/module-registry.js';
import { MCTrackMessage, PixelHitMessage } from '../../objects/messages.js';
import type { PixelHit } from '../../objects/pixel-hit.js';
import { createRandom } from '../random.js';

/**
 * Deposits hits of the primary particles in one detector.
 *
 * Input:  MCTrackMessage (required, single bind)
 * Output: PixelHitMessage tagged with the detector
 */
export class HitGenerator extends Module {
  readonly tracks = new SingleSlot<MCTrackMessage>();

  private readonly target: Detector;
  private readonly hitsPerTrack: number;
  private readonly chargeMin: number;
  private readonly chargeMax: number;
  private readonly pixels: [number, number];
  private readonly seed: number;
  private readonly outputChannel: string;

  constructor(context: ModuleContext) {
    super(context);
    if (!context.detector) {
      throw new ModuleError(this.name, 'HitGenerator needs a detector');
    }
    this.target = context.detector;

    this.config.setDefault('hits_per_track', 1);
    this.config.setDefault('charge_min', 100);
    this.config.setDefault('charge_max', 10000);
    this.config.setDefault('pixels', [256, 256]);
    this.config.setDefault('seed', 1);
    this.config.setDefault('input', '');
    this.config.setDefault('output', '');

    this.hitsPerTrack = this.config.getInteger('hits_per_track');
    if (this.hitsPerTrack < 0) {
      throw new InvalidValueError(this.config.getName(), 'hits_per_track', 'cannot be negative');
    }

    this.chargeMin = this.config.getInteger('charge_min');
    this.chargeMax = this.config.getInteger('charge_max');
    if (this.chargeMin < 0 || this.chargeMin > this.chargeMax) {
      throw new InvalidValueError(this.config.getName(), 'charge_min', 'must be between 0 and charge_max');
    }

    const pixels = this.config.getNumberArray('pixels');
    if (pixels.length !== 2 || pixels.some(n => !Number.isInteger(n) || n < 1)) {
      throw new InvalidValueError(this.config.getName(), 'pixels', 'expected two positive integers [columns, rows]');
    }
    this.pixels = [pixels[0], pixels[1]];

    this.seed = this.config.getInteger('seed');
    this.outputChannel = this.config.getText('output');

    this.messenger.bindSingle(this, MCTrackMessage, this.tracks, {
      channel: this.config.getText('input'),
      required: true,
    });
    this.messenger.declareOutput(this, PixelHitMessage, { channel: this.outputChannel });
  }

  async run(event: number): Promise<void> {
    const message = this.tracks.value;
    if (!message) {
      throw new ModuleError(this.name, `no tracks received in event ${event}`);
    }

    const random = createRandom(this.seed, event, this.target.name);
    const [columns, rows] = this.pixels;
    const hits: PixelHit[] = [];
    for (const track of message.tracks) {
      for (let i = 0; i < this.hitsPerTrack; i++) {
        hits.push({
          pixel: { x: Math.floor(random() * columns), y: Math.floor(random() * rows) },
          charge: this.chargeMin + Math.floor(random() * (this.chargeMax - this.chargeMin + 1)),
          trackId: track.id,
        });
      }
    }

    this.log.debug('Deposited hits', { event, hits: hits.length });
    this.messenger.dispatch(new PixelHitMessage(hits, this.target), this.outputChannel);
  }
}

export const hitGeneratorRegistration: ModuleRegistration = {
  type: 'HitGenerator',
  kind: 'detector',
  description: 'Creates pixel hits in a detector for every primary particle',
  factory: (context) => new HitGenerator(context),
};
