/**
 * CLI exit codes and error reporting
 */

import { ERROR_CODES, SimError, type ErrorCode } from '../core/errors.js';

export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  INVALID_ARGS = 2,
  CONFIG_ERROR = 3,
  SETUP_ERROR = 4,
  MODULE_FAILED = 5,
}

const EXIT_CODE_BY_ERROR: Record<ErrorCode, ExitCode> = {
  [ERROR_CODES.CONFIG_ERROR]: ExitCode.CONFIG_ERROR,
  [ERROR_CODES.MISSING_KEY]: ExitCode.CONFIG_ERROR,
  [ERROR_CODES.INVALID_VALUE]: ExitCode.CONFIG_ERROR,
  [ERROR_CODES.SETUP_ERROR]: ExitCode.SETUP_ERROR,
  [ERROR_CODES.MISSING_INPUT]: ExitCode.SETUP_ERROR,
  [ERROR_CODES.MESSENGER_STATE]: ExitCode.GENERAL_ERROR,
  [ERROR_CODES.DELIVERY_TYPE]: ExitCode.GENERAL_ERROR,
  [ERROR_CODES.MODULE_ERROR]: ExitCode.MODULE_FAILED,
};

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof SimError) {
    return EXIT_CODE_BY_ERROR[error.code];
  }
  return ExitCode.GENERAL_ERROR;
}

export function exitWithError(error: unknown): never {
  if (error instanceof SimError) {
    console.error(`Error: ${error.message}`);
    if (error.details) {
      console.error('Details:', JSON.stringify(error.details));
    }
  } else {
    console.error('Unexpected error:', error);
  }
  process.exit(exitCodeFor(error));
}
