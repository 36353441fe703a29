/**
 * Configuration types for implgen.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * How generated source is named and laid out.
 */
export interface GenerationConfig {
  /** Appended to the subject's simple name (default: 'Impl'). */
  class_suffix: string;
  /** One indentation level (default: a tab). */
  indent: string;
}

/**
 * Compiler invocation for `-jar` mode.
 */
export interface CompilerConfig {
  /** Compiler executable (default: 'javac'). */
  command: string;
  /** Extra arguments passed before the generated ones, e.g. ['--release', '17']. */
  options: string[];
  /** Class-path entries added after the subject's origin. */
  classpath: string[];
  /** JDK whose `jmods/java.base.jmod` describes platform types; empty falls back to JAVA_HOME. */
  java_home: string;
}

/**
 * Manifest attributes for written jars.
 */
export interface ArchiveConfig {
  /** Value of Manifest-Version (default: '1.0'). */
  manifest_version: string;
  /** Value of Created-By; empty omits the attribute. */
  created_by: string;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Write debug-level entries (default: false). */
  debug: boolean;
}

/**
 * Complete configuration with every field present.
 */
export interface Config {
  generation: GenerationConfig;
  compiler: CompilerConfig;
  archive: ArchiveConfig;
  logging: LoggingConfig;
}

/**
 * Configuration with every section and field optional.
 */
export interface PartialConfig {
  generation?: Partial<GenerationConfig>;
  compiler?: Partial<CompilerConfig>;
  archive?: Partial<ArchiveConfig>;
  logging?: Partial<LoggingConfig>;
}
