/**
 * Environment variable overrides for configuration.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { ConfigParseError, mergeConfig, validateClassSuffix, validateIndent, validateManifestVersion } from './parser.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

interface EnvMapping {
  readonly description: string;
  readonly type: string;
  /** Coerces `value` and stores it in `overrides`. */
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces an indentation value: a number of spaces or `tab`.
 *
 * @throws EnvCoercionError if the value is none of those.
 */
function coerceToIndent(value: string, envVar: string): string {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === 'tab') {
    return '\t';
  }
  if (/^\d+$/.test(trimmed)) {
    const width = parseInt(trimmed, 10);
    if (width >= 1 && width <= 16) {
      return ' '.repeat(width);
    }
  }
  return checked(envVar, value, 'indent', () => validateIndent(value, envVar));
}

/**
 * Runs a config validator and reports its failure as a coercion error.
 */
function checked<T>(envVar: string, value: string, expectedType: string, validate: () => T): T {
  try {
    return validate();
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new EnvCoercionError(envVar, value, expectedType, error.message);
    }
    throw error;
  }
}

/**
 * Mapping from environment variable names to config fields.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  IMPLGEN_CLASS_SUFFIX: {
    description: 'Override the generated class name suffix',
    type: 'string',
    apply: (overrides, value, envVar) => {
      const classSuffix = checked(envVar, value, 'class suffix', () => validateClassSuffix(value.trim(), envVar));
      overrides.generation = { ...overrides.generation, class_suffix: classSuffix };
    },
  },
  IMPLGEN_INDENT: {
    description: "Override indentation: a number of spaces (1-16) or 'tab'",
    type: 'indent',
    apply: (overrides, value, envVar) => {
      overrides.generation = { ...overrides.generation, indent: coerceToIndent(value, envVar) };
    },
  },
  IMPLGEN_JAVAC: {
    description: 'Override the compiler executable',
    type: 'string',
    apply: (overrides, value) => {
      overrides.compiler = { ...overrides.compiler, command: value.trim() };
    },
  },
  IMPLGEN_CLASSPATH: {
    description: `Override compiler class-path entries, separated by '${path.delimiter}'`,
    type: 'path-list',
    apply: (overrides, value) => {
      const classpath = value
        .split(path.delimiter)
        .map((entry) => entry.trim())
        .filter((entry) => entry !== '');
      overrides.compiler = { ...overrides.compiler, classpath };
    },
  },
  IMPLGEN_JAVA_HOME: {
    description: 'Override the JDK used to look up platform types',
    type: 'path',
    apply: (overrides, value) => {
      overrides.compiler = { ...overrides.compiler, java_home: value.trim() };
    },
  },
  IMPLGEN_MANIFEST_VERSION: {
    description: 'Override the jar Manifest-Version',
    type: 'version',
    apply: (overrides, value, envVar) => {
      const manifestVersion = checked(envVar, value, 'version', () =>
        validateManifestVersion(value.trim(), envVar)
      );
      overrides.archive = { ...overrides.archive, manifest_version: manifestVersion };
    },
  },
  IMPLGEN_DEBUG: {
    description: 'Enable or disable debug logging (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads IMPLGEN_* environment variables and returns configuration overrides.
 *
 * Empty values are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - `collectErrors` gathers coercion errors instead of throwing the first.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ IMPLGEN_INDENT: '4' });
 * overrides.generation?.indent; // '    '
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value.trim() === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
