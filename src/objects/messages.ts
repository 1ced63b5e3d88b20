import type { Detector } from '../geometry/detector.js';
import { Message } from '../messenger/message.js';
import type { MCTrack } from './mc-track.js';
import type { PixelHit } from './pixel-hit.js';

export class MCTrackMessage extends Message {
  readonly tracks: readonly MCTrack[];

  constructor(tracks: readonly MCTrack[], detector?: Detector) {
    super(detector);
    this.tracks = Object.freeze([...tracks]);
  }
}

export class PixelHitMessage extends Message {
  readonly hits: readonly PixelHit[];

  constructor(hits: readonly PixelHit[], detector?: Detector) {
    super(detector);
    this.hits = Object.freeze([...hits]);
  }

  getTotalCharge(): number {
    return this.hits.reduce((sum, hit) => sum + hit.charge, 0);
  }
}
