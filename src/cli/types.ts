/**
 * CLI types and interfaces for the implgen CLI.
 */

import type { Config } from '../config/index.js';
import type { Introspector } from '../introspection/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Whether the command writes a source file or a compiled jar.
 */
export type OutputMode = 'source' | 'jar';

/**
 * Options collected from the command line.
 */
export interface CliOptions {
  /** Class-path entries given with --classpath/-cp, in order. */
  classPath: string[];
  /** TOML type catalogs given with --catalog, in order. */
  catalogs: string[];
  /** Class-name suffix given with --suffix. */
  suffix?: string;
  /** Configuration file given with --config. */
  configPath?: string;
  /** Whether --debug was given. */
  debug: boolean;
}

/**
 * Parsed command line.
 */
export type ParsedArgs =
  | { readonly kind: 'help' }
  | { readonly kind: 'version' }
  | {
      readonly kind: 'implement';
      readonly mode: OutputMode;
      /** Binary name of the subject. */
      readonly typeName: string;
      /** Output directory (source mode) or jar file (jar mode). */
      readonly output: string;
      readonly options: CliOptions;
    };

/**
 * Everything a command needs to run.
 */
export interface CliContext {
  /** Effective configuration after CLI, env and file precedence. */
  config: Config;
  /** Class-path entries used for lookup and compilation. */
  classPath: string[];
  introspector: Introspector;
  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}
