/**
 * Shared error handling utilities for CLI commands.
 */

import { exitCodeFor, formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult } from '../types.js';

/**
 * Whether stderr output should be colored.
 */
export function useColors(): boolean {
  return process.stderr.isTTY === true && process.env.NO_COLOR === undefined;
}

/**
 * Runs a command handler and converts its outcome to an exit code.
 *
 * - On success: the result's exit code
 * - On error: the formatted error on stderr, then 2 for usage errors and 1 otherwise
 */
export async function runWithErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  try {
    const result = await fn();
    return result.exitCode;
  } catch (error) {
    console.error(formatErrorWithSuggestions(error, { colors: useColors() }));
    return exitCodeFor(error);
  }
}
