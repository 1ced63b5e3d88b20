/**
 * Simstage Messenger
 *
 * Type-indexed registry of delegates and synchronous dispatch between modules.
 *
 * Registry layout: message class -> channel -> delegates in registration order.
 * The empty channel is the wildcard: wildcard receivers get every dispatch of
 * their type, named receivers only dispatches on their channel.
 *
 * Epochs:
 * - setup: modules register delegates and declare outputs, dispatch is rejected
 * - run:   registry is frozen, dispatch delivers synchronously
 */

import { logger } from '../core/logger.js';
import { MessengerStateError, SetupError } from '../core/errors.js';
import type { Module } from '../module/module.js';
import { applyDelegate, describeDelegate, type Delegate } from './delegate.js';
import { isValidChannel, WILDCARD_CHANNEL, type Message, type MessageClass } from './message.js';
import type { MultiSlot, SingleSlot } from './slots.js';

export interface MessageOptions {
  /** Channel name, wildcard when omitted */
  channel?: string;
  /** Mandatory input: the run fails at setup when nothing produces it */
  required?: boolean;
}

export interface OutputDeclaration {
  readonly producer: Module;
  readonly messageType: MessageClass;
  readonly channel: string;
}

export type MessengerEpoch = 'setup' | 'run';

export interface MessengerStats {
  dispatched: number;
  delivered: number;
  dropped: number;
  droppedByType: Record<string, number>;
}

type ChannelMap = Map<string, Delegate[]>;

export class Messenger {
  // keyed by the message class itself; Function so a runtime `constructor` can be looked up
  private delegates: Map<Function, ChannelMap> = new Map();
  private outputs: OutputDeclaration[] = [];
  private received: Set<Delegate> = new Set();
  private epoch: MessengerEpoch = 'setup';
  private stats: MessengerStats = { dispatched: 0, delivered: 0, dropped: 0, droppedByType: {} };
  private log = logger.module('Messenger');

  getEpoch(): MessengerEpoch {
    return this.epoch;
  }

  registerListener<R extends Module, T extends Message>(
    receiver: R,
    messageType: MessageClass<T>,
    handler: (message: T) => void,
    options: MessageOptions = {}
  ): void {
    this.addDelegate({
      kind: 'listener',
      receiver,
      messageType,
      handler,
      ...this.resolveOptions(receiver, messageType, options),
    });
  }

  bindSingle<R extends Module, T extends Message>(
    receiver: R,
    messageType: MessageClass<T>,
    slot: SingleSlot<T>,
    options: MessageOptions = {}
  ): void {
    this.addDelegate({
      kind: 'single',
      receiver,
      messageType,
      slot,
      ...this.resolveOptions(receiver, messageType, options),
    });
  }

  bindMulti<R extends Module, T extends Message>(
    receiver: R,
    messageType: MessageClass<T>,
    slot: MultiSlot<T>,
    options: MessageOptions = {}
  ): void {
    this.addDelegate({
      kind: 'multi',
      receiver,
      messageType,
      slot,
      ...this.resolveOptions(receiver, messageType, options),
    });
  }

  /**
   * Records that a module dispatches this message type on a channel.
   * Only used to validate the wiring before the run; dispatch does not check it.
   */
  declareOutput<P extends Module, T extends Message>(
    producer: P,
    messageType: MessageClass<T>,
    options: Pick<MessageOptions, 'channel'> = {}
  ): void {
    const { channel } = this.resolveOptions(producer, messageType, options);
    this.outputs.push({ producer, messageType, channel });
    this.log.debug('Output declared', { producer: producer.name, messageType: messageType.name, channel });
  }

  /**
   * Delivers a message to every delegate registered for its runtime class on the
   * channel, then to the wildcard delegates. Receiver errors propagate and stop
   * the remaining deliveries.
   *
   * @returns number of delegates the message was delivered to
   */
  dispatch<T extends Message>(message: T, channel: string = WILDCARD_CHANNEL): number {
    if (this.epoch !== 'run') {
      throw new MessengerStateError(`Cannot dispatch ${message.typeName} before the run has started`);
    }
    if (!isValidChannel(channel)) {
      throw new SetupError(`Invalid channel name '${channel}' for ${message.typeName}`, { channel });
    }

    this.stats.dispatched++;
    const targets = this.collectTargets(message.constructor, channel);

    if (targets.length === 0) {
      this.stats.dropped++;
      this.stats.droppedByType[message.typeName] = (this.stats.droppedByType[message.typeName] ?? 0) + 1;
      this.log.debug('Message dropped, no receivers', { messageType: message.typeName, channel });
      return 0;
    }

    for (const delegate of targets) {
      applyDelegate(delegate, message);
      this.received.add(delegate);
      this.stats.delivered++;
    }
    return targets.length;
  }

  /**
   * Removes every delegate and output declaration of a receiver.
   *
   * @returns number of delegates removed
   */
  unregister(receiver: Module): number {
    let removed = 0;
    for (const [type, channels] of this.delegates) {
      for (const [channel, list] of channels) {
        const kept = list.filter(d => d.receiver !== receiver);
        removed += list.length - kept.length;
        for (const delegate of list) {
          if (delegate.receiver === receiver) {
            this.received.delete(delegate);
          }
        }
        if (kept.length === 0) {
          channels.delete(channel);
        } else {
          channels.set(channel, kept);
        }
      }
      if (channels.size === 0) {
        this.delegates.delete(type);
      }
    }
    this.outputs = this.outputs.filter(o => o.producer !== receiver);
    if (removed > 0) {
      this.log.debug('Receiver unregistered', { receiver: receiver.name, removed });
    }
    return removed;
  }

  startRun(): void {
    if (this.epoch === 'run') {
      throw new MessengerStateError('Messenger is already in the run epoch');
    }
    this.epoch = 'run';
    this.log.info('Messenger frozen for run', {
      delegates: this.getRegistrations().length,
      outputs: this.outputs.length,
    });
  }

  /** All delegates in registry order (by type, then channel, then registration) */
  getRegistrations(): Delegate[] {
    const result: Delegate[] = [];
    for (const channels of this.delegates.values()) {
      for (const list of channels.values()) {
        result.push(...list);
      }
    }
    return result;
  }

  getRegistrationsFor(receiver: Module): Delegate[] {
    return this.getRegistrations().filter(d => d.receiver === receiver);
  }

  getOutputs(): readonly OutputDeclaration[] {
    return [...this.outputs];
  }

  /** Whether a dispatch of this type on this channel would reach any delegate */
  hasListeners(messageType: MessageClass, channel: string = WILDCARD_CHANNEL): boolean {
    return this.collectTargets(messageType, channel).length > 0;
  }

  /** Whether a declared output can feed a receiver registered on this channel */
  hasProducer(messageType: MessageClass, channel: string = WILDCARD_CHANNEL): boolean {
    return this.outputs.some(
      o => o.messageType === messageType && (channel === WILDCARD_CHANNEL || o.channel === channel)
    );
  }

  /** Required delegates of the receiver that got nothing since the last resetEvent() */
  getMissingInputs(receiver: Module): Delegate[] {
    return this.getRegistrationsFor(receiver).filter(d => d.required && !this.received.has(d));
  }

  hasReceivedRequired(receiver: Module): boolean {
    return this.getMissingInputs(receiver).length === 0;
  }

  /** Ends an event: forgets deliveries and empties every bound slot */
  resetEvent(): void {
    this.received.clear();
    for (const delegate of this.getRegistrations()) {
      if (delegate.kind !== 'listener') {
        delegate.slot.clear();
      }
    }
  }

  getStats(): MessengerStats {
    return { ...this.stats, droppedByType: { ...this.stats.droppedByType } };
  }

  dispose(): void {
    this.delegates.clear();
    this.outputs = [];
    this.received.clear();
    this.stats = { dispatched: 0, delivered: 0, dropped: 0, droppedByType: {} };
  }

  private addDelegate(delegate: Delegate): void {
    let channels = this.delegates.get(delegate.messageType);
    if (!channels) {
      channels = new Map();
      this.delegates.set(delegate.messageType, channels);
    }
    let list = channels.get(delegate.channel);
    if (!list) {
      list = [];
      channels.set(delegate.channel, list);
    }
    list.push(delegate);
    this.log.debug('Delegate registered', { delegate: describeDelegate(delegate), required: delegate.required });
  }

  private resolveOptions(
    module: Module,
    messageType: MessageClass,
    options: MessageOptions
  ): { channel: string; required: boolean } {
    if (this.epoch !== 'setup') {
      throw new MessengerStateError(
        `Module ${module.name} cannot register ${messageType.name} after the run has started`
      );
    }
    const channel = options.channel ?? WILDCARD_CHANNEL;
    if (!isValidChannel(channel)) {
      throw new SetupError(`Invalid channel name '${channel}' used by module ${module.name} for ${messageType.name}`, {
        module: module.name,
        messageType: messageType.name,
        channel,
      });
    }
    return { channel, required: options.required ?? false };
  }

  private collectTargets(messageType: Function, channel: string): Delegate[] {
    const channels = this.delegates.get(messageType);
    if (!channels) {
      return [];
    }
    const named = channels.get(channel) ?? [];
    if (channel === WILDCARD_CHANNEL) {
      return [...named];
    }
    return [...named, ...(channels.get(WILDCARD_CHANNEL) ?? [])];
  }
}
