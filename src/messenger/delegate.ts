/**
 * Simstage Messenger - Delegates
 *
 * What happens to a message at one receiver: call a listener, overwrite a
 * single slot, or append to a multi slot.
 */

import { DeliveryTypeError } from '../core/errors.js';
import type { Module } from '../module/module.js';
import type { Message, MessageClass } from './message.js';
import type { MultiSlot, SingleSlot } from './slots.js';

export type DelegateKind = 'listener' | 'single' | 'multi';

interface DelegateBase<T extends Message> {
  readonly receiver: Module;
  readonly messageType: MessageClass<T>;
  readonly channel: string;
  readonly required: boolean;
}

export interface ListenerDelegate<T extends Message = Message> extends DelegateBase<T> {
  readonly kind: 'listener';
  handler(message: T): void;
}

export interface SingleBindDelegate<T extends Message = Message> extends DelegateBase<T> {
  readonly kind: 'single';
  readonly slot: SingleSlot<T>;
}

export interface MultiBindDelegate<T extends Message = Message> extends DelegateBase<T> {
  readonly kind: 'multi';
  readonly slot: MultiSlot<T>;
}

export type Delegate<T extends Message = Message> =
  | ListenerDelegate<T>
  | SingleBindDelegate<T>
  | MultiBindDelegate<T>;

export function applyDelegate(delegate: Delegate, message: Message): void {
  const actual = message.typeName;
  if (!(message instanceof delegate.messageType)) {
    throw new DeliveryTypeError(delegate.messageType.name, actual, delegate.receiver.name);
  }

  switch (delegate.kind) {
    case 'listener':
      delegate.handler.call(delegate.receiver, message);
      return;
    case 'single':
      delegate.slot.set(message);
      return;
    case 'multi':
      delegate.slot.append(message);
      return;
    default: {
      const unreachable: never = delegate;
      return unreachable;
    }
  }
}

export function describeDelegate(delegate: Delegate): string {
  const channel = delegate.channel === '' ? '*' : delegate.channel;
  return `${delegate.kind}(${delegate.receiver.name} <- ${delegate.messageType.name}@${channel})`;
}
