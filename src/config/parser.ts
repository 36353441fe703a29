/**
 * TOML configuration parser for implgen.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_ARCHIVE, DEFAULT_COMPILER, DEFAULT_CONFIG, DEFAULT_GENERATION, DEFAULT_LOGGING } from './defaults.js';
import type { ArchiveConfig, CompilerConfig, Config, GenerationConfig, LoggingConfig, PartialConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/** Characters a class-name suffix may contain. */
export const CLASS_SUFFIX_PATTERN = /^[\p{L}\p{Nl}\p{Nd}_$]+$/u;

/** Indentation is made of spaces or tabs. */
export const INDENT_PATTERN = /^[ \t]+$/;

/** Dotted version number, e.g. '1.0'. */
export const MANIFEST_VERSION_PATTERN = /^\d+(\.\d+)*$/;

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Validates that a section is absent or a table.
 *
 * @throws ConfigParseError if the section is not a table.
 */
function validateSection(value: unknown, section: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @throws ConfigParseError if value is not an array of strings.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== 'string') {
      throw new ConfigParseError(
        `Invalid type for '${fieldPath}[${String(index)}]': expected string, got ${typeof item}`
      );
    }
    return item;
  });
}

function validatePattern(value: string, pattern: RegExp, fieldPath: string, expected: string): string {
  if (!pattern.test(value)) {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': expected ${expected}, got '${value}'`);
  }
  return value;
}

/**
 * Validates a class-name suffix.
 *
 * @throws ConfigParseError if the suffix is empty or contains characters not allowed in a class name.
 */
export function validateClassSuffix(value: unknown, fieldPath: string): string {
  return validatePattern(validateString(value, fieldPath), CLASS_SUFFIX_PATTERN, fieldPath, 'identifier characters');
}

/**
 * Validates an indentation string.
 *
 * @throws ConfigParseError if the value is empty or not made of spaces and tabs.
 */
export function validateIndent(value: unknown, fieldPath: string): string {
  return validatePattern(validateString(value, fieldPath), INDENT_PATTERN, fieldPath, 'spaces or tabs');
}

/**
 * Validates a manifest version.
 *
 * @throws ConfigParseError if the value is not a dotted version number.
 */
export function validateManifestVersion(value: unknown, fieldPath: string): string {
  return validatePattern(
    validateString(value, fieldPath),
    MANIFEST_VERSION_PATTERN,
    fieldPath,
    "a version number such as '1.0'"
  );
}

function parseGeneration(raw: Record<string, unknown> | undefined): GenerationConfig {
  const result: GenerationConfig = { ...DEFAULT_GENERATION };
  if (raw === undefined) {
    return result;
  }

  if ('class_suffix' in raw) {
    result.class_suffix = validateClassSuffix(raw.class_suffix, 'generation.class_suffix');
  }
  if ('indent' in raw) {
    result.indent = validateIndent(raw.indent, 'generation.indent');
  }

  return result;
}

function parseCompiler(raw: Record<string, unknown> | undefined): CompilerConfig {
  const result: CompilerConfig = {
    ...DEFAULT_COMPILER,
    options: [...DEFAULT_COMPILER.options],
    classpath: [...DEFAULT_COMPILER.classpath],
  };
  if (raw === undefined) {
    return result;
  }

  if ('command' in raw) {
    result.command = validateString(raw.command, 'compiler.command').trim();
    if (result.command === '') {
      throw new ConfigParseError(`Invalid value for 'compiler.command': must not be empty`);
    }
  }
  if ('options' in raw) {
    result.options = validateStringArray(raw.options, 'compiler.options');
  }
  if ('classpath' in raw) {
    result.classpath = validateStringArray(raw.classpath, 'compiler.classpath');
  }
  if ('java_home' in raw) {
    result.java_home = validateString(raw.java_home, 'compiler.java_home').trim();
  }

  return result;
}

function parseArchive(raw: Record<string, unknown> | undefined): ArchiveConfig {
  const result: ArchiveConfig = { ...DEFAULT_ARCHIVE };
  if (raw === undefined) {
    return result;
  }

  if ('manifest_version' in raw) {
    result.manifest_version = validateManifestVersion(raw.manifest_version, 'archive.manifest_version');
  }
  if ('created_by' in raw) {
    result.created_by = validateString(raw.created_by, 'archive.created_by');
    if (/[\r\n]/.test(result.created_by)) {
      throw new ConfigParseError(`Invalid value for 'archive.created_by': must be a single line`);
    }
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [generation]
 * class_suffix = "Stub"
 *
 * [compiler]
 * options = ["--release", "17"]
 * `);
 * config.generation.class_suffix; // 'Stub'
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    generation: parseGeneration(validateSection(parsed.generation, 'generation')),
    compiler: parseCompiler(validateSection(parsed.compiler, 'compiler')),
    archive: parseArchive(validateSection(parsed.archive, 'archive')),
    logging: parseLogging(validateSection(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return mergeConfig(DEFAULT_CONFIG, {});
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @returns A new configuration with partial values taking precedence.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    generation: {
      ...base.generation,
      ...partial.generation,
    },
    compiler: {
      ...base.compiler,
      ...partial.compiler,
      options: [...(partial.compiler?.options ?? base.compiler.options)],
      classpath: [...(partial.compiler?.classpath ?? base.compiler.classpath)],
    },
    archive: {
      ...base.archive,
      ...partial.archive,
    },
    logging: {
      ...base.logging,
      ...partial.logging,
    },
  };
}
