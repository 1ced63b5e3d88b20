import type { Detector } from '../geometry/detector.js';

/**
 * Base of every payload exchanged between modules.
 *
 * Messages are shared between the producer and all receivers, so subclasses
 * keep their fields readonly and never mutate them after construction.
 */
export abstract class Message {
  // nominal: a class with the same shape is still not a message type
  private declare readonly brand: void;

  constructor(public readonly detector?: Detector) {}

  /** Runtime class name, used in logs and wiring errors */
  get typeName(): string {
    return this.constructor.name;
  }
}

/**
 * Class of a message type. Receivers register against the class, dispatch
 * resolves it from the runtime class of the sent object.
 */
export type MessageClass<T extends Message = Message> = abstract new (...args: never[]) => T;

export const WILDCARD_CHANNEL = '';

const CHANNEL_PATTERN = /^[A-Za-z0-9_.:-]*$/;

export function isValidChannel(channel: string): boolean {
  return CHANNEL_PATTERN.test(channel);
}
