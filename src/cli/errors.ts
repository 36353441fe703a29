/**
 * Error formatting and suggestions for the implgen CLI.
 *
 * @packageDocumentation
 */

import { ConfigParseError, EnvCoercionError } from '../config/index.js';
import { CatalogParseError } from '../introspection/index.js';
import { isImplementorError } from '../model/errors.js';
import type { ImplementorErrorCode } from '../model/errors.js';
import { PathValidationError } from '../utils/safe-fs.js';
import { CliUsageError } from './args.js';

/**
 * Error categories the CLI distinguishes.
 */
export type ErrorType = ImplementorErrorCode | 'USAGE' | 'CONFIGURATION' | 'UNKNOWN';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Display options for error output.
 */
export interface DisplayOptions {
  /** Whether to use ANSI colors. */
  colors: boolean;
}

/** Exit code for failures. */
export const EXIT_FAILURE = 1;

/** Exit code for command lines that cannot be understood. */
export const EXIT_USAGE = 2;

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  USAGE: [{ text: 'Show the accepted forms and options', action: 'implgen --help' }],
  INVALID_ARGUMENT: [{ text: 'Pass a non-empty output path' }],
  INVALID_SUBJECT: [
    { text: 'Only non-final, non-private classes and interfaces can be implemented' },
    { text: 'Nested types are named with $, e.g. com.example.Outer$Inner' },
  ],
  TYPE_RESOLUTION_ERROR: [
    { text: 'Add the directory or jar holding the type to the class path', action: 'implgen -cp build/classes <type> <output-dir>' },
    { text: 'Or describe the type in a TOML catalog', action: 'implgen --catalog types.toml <type> <output-dir>' },
  ],
  NO_USABLE_CONSTRUCTOR: [{ text: 'The class must declare a constructor that is not private' }],
  RENDER_FAILURE: [{ text: 'Check that the output directory is writable' }],
  COMPILATION_FAILURE: [
    { text: 'Check that javac is installed or set [compiler] command in implgen.toml' },
    { text: 'Add the types the subject depends on to the class path', action: 'implgen -jar -cp <entries> <type> <jar-file>' },
  ],
  PACKAGING_FAILURE: [{ text: 'Check that the jar location is writable' }],
  CONFIGURATION: [{ text: 'Fix the field named in the message in implgen.toml or the IMPLGEN_* variable' }],
  UNKNOWN: [{ text: 'Run again with --debug for structured diagnostics on stderr' }],
};

/**
 * Classifies a thrown value.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof CliUsageError) {
    return 'USAGE';
  }
  if (isImplementorError(error)) {
    return error.code;
  }
  if (error instanceof ConfigParseError || error instanceof EnvCoercionError || error instanceof CatalogParseError) {
    return 'CONFIGURATION';
  }
  if (error instanceof PathValidationError) {
    return 'INVALID_ARGUMENT';
  }
  return 'UNKNOWN';
}

/**
 * Returns the process exit code for a thrown value.
 */
export function exitCodeFor(error: unknown): number {
  return classifyError(error) === 'USAGE' ? EXIT_USAGE : EXIT_FAILURE;
}

/**
 * Gets suggestions for a given error type.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText = suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats an error with its details and contextual suggestions.
 *
 * The first line is always `Error: <message>`.
 *
 * @example
 * ```typescript
 * formatErrorWithSuggestions(new CliUsageError('Unknown option: --x'), { colors: false });
 * // 'Error: Unknown option: --x\n\nSuggestions:\n  1. Show the accepted forms and options\n    implgen --help'
 * ```
 */
export function formatErrorWithSuggestions(
  error: unknown,
  options: DisplayOptions = { colors: false }
): string {
  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';

  const message = error instanceof Error ? error.message : String(error);
  let result = `${redCode}Error:${resetCode} ${message}`;

  if (isImplementorError(error) && error.details !== undefined && error.details !== '') {
    result += `\n${error.details}`;
  }

  const suggestions = getSuggestions(classifyError(error));
  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, index) => {
    result += '\n' + formatSuggestion(suggestion, index + 1, options);
  });

  return result;
}
