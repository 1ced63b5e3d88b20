export interface MCTrack {
  readonly id: number;
  /** PDG particle code */
  readonly particleId: number;
  /** kinetic energy in GeV */
  readonly energy: number;
}
