// CLI error handling utilities

import { CommanderError } from 'commander';
import { ResolutionError, ValidatorToolError } from '../../core/errors.js';

/**
 * Commander failures that are about how the command was called
 */
const USAGE_ERROR_CODES = new Set([
  'xml-validate.usage',
  'commander.unknownOption',
  'commander.missingArgument',
  'commander.excessArguments',
  'commander.optionMissingArgument',
  'commander.invalidArgument'
]);

export const USAGE_EXIT_CODE = 2;

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ResolutionError) {
    return error.message;
  }

  if (error instanceof ValidatorToolError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error that escaped the command
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return USAGE_ERROR_CODES.has(error.code) ? USAGE_EXIT_CODE : error.exitCode;
  }
  if (error instanceof ResolutionError) {
    return 0;
  }
  return 1;
}

/**
 * Report an error that escaped the command and return the exit code.
 * Commander has already printed its own errors.
 */
export function handleError(error: unknown, writeErr: (text: string) => void): number {
  if (!(error instanceof CommanderError)) {
    writeErr(`\n❌ ${formatError(error)}\n`);
  }
  return exitCodeFor(error);
}
