/**
 * Command-line argument parsing for the implgen CLI.
 *
 * Accepted forms:
 *
 * ```
 * implgen [options] <type> <output-dir>
 * implgen [options] -jar <type> <jar-file>
 * ```
 */

import * as path from 'node:path';
import type { CliOptions, OutputMode, ParsedArgs } from './types.js';

/**
 * Error thrown when the command line cannot be understood.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const VALUE_OPTIONS: Readonly<Record<string, keyof Pick<CliOptions, 'classPath' | 'catalogs' | 'suffix' | 'configPath'>>> = {
  '--classpath': 'classPath',
  '-cp': 'classPath',
  '--catalog': 'catalogs',
  '--suffix': 'suffix',
  '--config': 'configPath',
};

function splitEntries(value: string): string[] {
  return value
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

function applyValueOption(options: CliOptions, option: string, value: string): void {
  if (value.trim() === '') {
    throw new CliUsageError(`Option ${option} requires a non-empty value`);
  }
  switch (VALUE_OPTIONS[option]) {
    case 'classPath':
      options.classPath.push(...splitEntries(value));
      break;
    case 'catalogs':
      options.catalogs.push(value);
      break;
    case 'suffix':
      options.suffix = value;
      break;
    case 'configPath':
      options.configPath = value;
      break;
    case undefined:
      throw new CliUsageError(`Unknown option: ${option}`);
  }
}

/**
 * Parses the arguments that follow the program name.
 *
 * `--help` and `--version` win over everything else. `--` ends option
 * parsing. Value options accept `--name value` and `--name=value`.
 *
 * @throws {CliUsageError} For unknown options, missing values, a wrong
 *   number of positional arguments, or an empty positional argument.
 *
 * @example
 * ```typescript
 * parseCliArgs(['-jar', '-cp', 'lib/api.jar', 'com.example.Shape', 'out/shape.jar']);
 * // { kind: 'implement', mode: 'jar', typeName: 'com.example.Shape', output: 'out/shape.jar', ... }
 * ```
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  if (argv.length === 0) {
    return { kind: 'help' };
  }
  if (argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { kind: 'version' };
  }

  const options: CliOptions = { classPath: [], catalogs: [], debug: false };
  const positionals: string[] = [];
  let mode: OutputMode = 'source';
  let optionsEnded = false;

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index] ?? '';

    if (optionsEnded || !arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    if (arg === '--') {
      optionsEnded = true;
    } else if (arg === '-jar' || arg === '--jar') {
      mode = 'jar';
    } else if (arg === '--debug') {
      options.debug = true;
    } else {
      const equals = arg.indexOf('=');
      const name = equals === -1 ? arg : arg.slice(0, equals);
      if (VALUE_OPTIONS[name] === undefined) {
        throw new CliUsageError(`Unknown option: ${name}`);
      }
      let value: string | undefined;
      if (equals !== -1) {
        value = arg.slice(equals + 1);
      } else {
        index++;
        value = argv[index];
      }
      if (value === undefined) {
        throw new CliUsageError(`Option ${name} requires a value`);
      }
      applyValueOption(options, name, value);
    }
  }

  const usage = mode === 'jar' ? '-jar <type> <jar-file>' : '<type> <output-dir>';
  if (positionals.length !== 2) {
    throw new CliUsageError(`Expected ${usage}, got ${String(positionals.length)} argument(s)`);
  }

  const [typeName = '', output = ''] = positionals;
  if (typeName.trim() === '') {
    throw new CliUsageError('Type name must not be empty');
  }
  if (output.trim() === '') {
    throw new CliUsageError(mode === 'jar' ? 'Jar path must not be empty' : 'Output directory must not be empty');
  }

  return { kind: 'implement', mode, typeName: typeName.trim(), output, options };
}
