/**
 * Pre-run wiring check: every required input needs a module that declares
 * it as output on a channel the input listens to.
 */

import { MissingInputError, type MissingInput } from '../core/errors.js';
import type { Messenger } from '../messenger/messenger.js';

export function findMissingInputs(messenger: Messenger): MissingInput[] {
  const missing: MissingInput[] = [];
  for (const delegate of messenger.getRegistrations()) {
    if (!delegate.required) {
      continue;
    }
    if (!messenger.hasProducer(delegate.messageType, delegate.channel)) {
      missing.push({
        module: delegate.receiver.name,
        messageType: delegate.messageType.name,
        channel: delegate.channel,
      });
    }
  }
  return missing;
}

export function validateWiring(messenger: Messenger): void {
  const missing = findMissingInputs(messenger);
  if (missing.length > 0) {
    throw new MissingInputError(missing);
  }
}
