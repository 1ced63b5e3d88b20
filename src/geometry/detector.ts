export type Position = readonly [number, number, number];

export class Detector {
  constructor(
    public readonly name: string,
    public readonly type: string,
    public readonly position: Position = [0, 0, 0]
  ) {}

  toJSON(): { name: string; type: string; position: Position } {
    return { name: this.name, type: this.type, position: this.position };
  }
}
