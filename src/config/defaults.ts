/**
 * Default configuration values for implgen.toml.
 *
 * @packageDocumentation
 */

import type { ArchiveConfig, CompilerConfig, Config, GenerationConfig, LoggingConfig } from './types.js';

/** Name of the configuration file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'implgen.toml';

/**
 * Default naming and layout of generated source.
 */
export const DEFAULT_GENERATION: GenerationConfig = {
  class_suffix: 'Impl',
  indent: '\t',
};

/**
 * Default compiler invocation.
 */
export const DEFAULT_COMPILER: CompilerConfig = {
  command: 'javac',
  options: [],
  classpath: [],
  java_home: '',
};

/**
 * Default manifest attributes.
 */
export const DEFAULT_ARCHIVE: ArchiveConfig = {
  manifest_version: '1.0',
  created_by: 'implgen',
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  generation: DEFAULT_GENERATION,
  compiler: DEFAULT_COMPILER,
  archive: DEFAULT_ARCHIVE,
  logging: DEFAULT_LOGGING,
};
