/**
 * Configuration module for implgen.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  CLASS_SUFFIX_PATTERN,
  ConfigParseError,
  INDENT_PATTERN,
  MANIFEST_VERSION_PATTERN,
  getDefaultConfig,
  mergeConfig,
  parseConfig,
  validateClassSuffix,
  validateIndent,
  validateManifestVersion,
} from './parser.js';
export type {
  ArchiveConfig,
  CompilerConfig,
  Config,
  GenerationConfig,
  LoggingConfig,
  PartialConfig,
} from './types.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_ARCHIVE,
  DEFAULT_COMPILER,
  DEFAULT_CONFIG,
  DEFAULT_GENERATION,
  DEFAULT_LOGGING,
} from './defaults.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfigFile, resolveConfig } from './loader.js';
export type { ResolveConfigOptions, ResolvedConfig } from './loader.js';
