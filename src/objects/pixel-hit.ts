export interface PixelIndex {
  readonly x: number;
  readonly y: number;
}

export interface PixelHit {
  readonly pixel: PixelIndex;
  /** collected charge in electrons */
  readonly charge: number;
  /** id of the MCTrack that produced the hit */
  readonly trackId: number;
}
