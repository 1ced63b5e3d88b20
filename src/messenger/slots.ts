import type { Message } from './message.js';

export interface BindingSlot {
  clear(): void;
}

/** Holds the most recent message bound to it */
export class SingleSlot<T extends Message> implements BindingSlot {
  private current: T | undefined;

  get value(): T | undefined {
    return this.current;
  }

  has(): boolean {
    return this.current !== undefined;
  }

  set(message: T): void {
    this.current = message;
  }

  clear(): void {
    this.current = undefined;
  }
}

/** Accumulates every message bound to it, in dispatch order */
export class MultiSlot<T extends Message> implements BindingSlot, Iterable<T> {
  private items: T[] = [];

  get messages(): readonly T[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  append(message: T): void {
    this.items.push(message);
  }

  clear(): void {
    this.items = [];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
