/**
 * Locates and loads implgen.toml, then applies environment overrides.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import { CONFIG_FILE_NAME } from './defaults.js';
import { readEnvOverrides } from './env.js';
import type { EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, mergeConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';

/**
 * Options for resolveConfig.
 */
export interface ResolveConfigOptions {
  /** Explicit configuration file; must exist. */
  readonly configPath?: string;
  /** Directory searched for implgen.toml when no path is given. */
  readonly cwd?: string;
  readonly env?: EnvRecord;
}

/**
 * Effective configuration and where it came from.
 */
export interface ResolvedConfig {
  readonly config: Config;
  /** File the configuration was read from, if any. */
  readonly source: string | undefined;
  /** IMPLGEN_* variables that changed the configuration. */
  readonly appliedEnvVars: readonly string[];
}

/**
 * Reads and parses a configuration file.
 *
 * @throws ConfigParseError if the file is invalid; the message names the file.
 */
export async function loadConfigFile(filePath: string): Promise<Config> {
  const content = await safeReadFile(filePath);
  try {
    return parseConfig(content);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new ConfigParseError(`${filePath}: ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Builds the effective configuration: env > file > defaults.
 *
 * @throws ConfigParseError if an explicit file is missing or any file is invalid.
 * @throws EnvCoercionError if an IMPLGEN_* variable is invalid.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
  let source: string | undefined;
  if (options.configPath !== undefined) {
    source = path.resolve(options.configPath);
    if (!(await safeExists(source))) {
      throw new ConfigParseError(`Configuration file not found: ${source}`);
    }
  } else {
    const candidate = path.resolve(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
    source = (await safeExists(candidate)) ? candidate : undefined;
  }

  const fileConfig = source === undefined ? getDefaultConfig() : await loadConfigFile(source);
  const { overrides, appliedVars } = readEnvOverrides(options.env ?? process.env);

  return {
    config: mergeConfig(fileConfig, overrides),
    source,
    appliedEnvVars: appliedVars,
  };
}
