/**
 * Simstage error taxonomy
 *
 * Setup errors (config, wiring, state) abort the run before any event is processed.
 * DeliveryTypeError is an internal invariant violation of the messenger registry.
 */

export const ERROR_CODES = {
  CONFIG_ERROR: 'CONFIG_ERROR',
  MISSING_KEY: 'MISSING_KEY',
  INVALID_VALUE: 'INVALID_VALUE',
  SETUP_ERROR: 'SETUP_ERROR',
  MISSING_INPUT: 'MISSING_INPUT',
  MESSENGER_STATE: 'MESSENGER_STATE',
  DELIVERY_TYPE: 'DELIVERY_TYPE',
  MODULE_ERROR: 'MODULE_ERROR',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export class SimError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SimError';
  }
}

export class ConfigError extends SimError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class MissingKeyError extends SimError {
  constructor(public readonly configName: string, public readonly key: string) {
    super(`Key '${key}' in section '${configName}' does not exist`, ERROR_CODES.MISSING_KEY, { configName, key });
    this.name = 'MissingKeyError';
  }
}

export class InvalidValueError extends SimError {
  constructor(public readonly configName: string, public readonly key: string, reason: string) {
    super(`Value of '${key}' in section '${configName}' is not valid: ${reason}`, ERROR_CODES.INVALID_VALUE, {
      configName,
      key,
      reason,
    });
    this.name = 'InvalidValueError';
  }
}

export class SetupError extends SimError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.SETUP_ERROR, details);
    this.name = 'SetupError';
  }
}

export interface MissingInput {
  module: string;
  messageType: string;
  channel: string;
}

export class MissingInputError extends SimError {
  constructor(public readonly missing: MissingInput[]) {
    super(
      `Missing required input: ${missing.map(formatMissingInput).join('; ')}`,
      ERROR_CODES.MISSING_INPUT,
      { missing }
    );
    this.name = 'MissingInputError';
  }
}

function formatMissingInput(input: MissingInput): string {
  const channel = input.channel === '' ? '<any>' : `'${input.channel}'`;
  return `module ${input.module} requires ${input.messageType} on channel ${channel} but no module produces it`;
}

export class MessengerStateError extends SimError {
  constructor(message: string) {
    super(message, ERROR_CODES.MESSENGER_STATE);
    this.name = 'MessengerStateError';
  }
}

export class DeliveryTypeError extends SimError {
  constructor(expected: string, actual: string, receiver: string) {
    super(
      `Delegate of ${receiver} expects ${expected} but was handed ${actual}`,
      ERROR_CODES.DELIVERY_TYPE,
      { expected, actual, receiver }
    );
    this.name = 'DeliveryTypeError';
  }
}

export class ModuleError extends SimError {
  constructor(public readonly moduleName: string, message: string) {
    super(`[${moduleName}] ${message}`, ERROR_CODES.MODULE_ERROR, { module: moduleName });
    this.name = 'ModuleError';
  }
}
