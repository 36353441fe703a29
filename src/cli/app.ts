/**
 * Builds the CLI context: configuration, logger and type sources.
 */

import * as path from 'node:path';
import { mergeConfig, resolveConfig, validateClassSuffix } from '../config/index.js';
import type { EnvRecord, PartialConfig } from '../config/index.js';
import {
  CatalogTypeSource,
  ClassPathTypeSource,
  CompositeTypeSource,
  TypeIntrospector,
  createPlatformTypeSource,
  jdkBaseModulePath,
} from '../introspection/index.js';
import type { TypeSource } from '../introspection/index.js';
import { Logger } from '../utils/logger.js';
import type { CliContext, CliOptions } from './types.js';

/**
 * Process-level inputs, replaceable in tests.
 */
export interface CliRuntime {
  readonly env?: EnvRecord;
  readonly cwd?: string;
  /** Destination for log lines. Default: stderr. */
  readonly writeLog?: (line: string) => void;
}

/**
 * Creates and initializes the CLI context.
 *
 * Class-path entries from --classpath come first, then `[compiler] classpath`
 * from the configuration. Types are looked up on that class path, then in
 * --catalog files, then in the JDK's `java.base` module when `[compiler]
 * java_home` or `JAVA_HOME` names a JDK, then in the bundled platform catalog.
 *
 * @throws ConfigParseError, EnvCoercionError or CatalogParseError for invalid input files.
 */
export async function createCliApp(options: CliOptions, runtime: CliRuntime = {}): Promise<CliContext> {
  const cwd = runtime.cwd ?? process.cwd();
  const env = runtime.env ?? process.env;
  const resolved = await resolveConfig({
    ...(options.configPath !== undefined ? { configPath: path.resolve(cwd, options.configPath) } : {}),
    cwd,
    env,
  });

  const cliOverrides: PartialConfig = {};
  if (options.suffix !== undefined) {
    cliOverrides.generation = { class_suffix: validateClassSuffix(options.suffix, '--suffix') };
  }
  if (options.debug) {
    cliOverrides.logging = { debug: true };
  }
  const config = mergeConfig(resolved.config, cliOverrides);

  const logger = new Logger({
    component: 'cli',
    debugMode: config.logging.debug,
    ...(runtime.writeLog !== undefined ? { write: runtime.writeLog } : {}),
  });
  logger.debug('config_resolved', {
    source: resolved.source ?? null,
    appliedEnvVars: resolved.appliedEnvVars,
  });

  const classPath = [...options.classPath, ...config.compiler.classpath].map((entry) => path.resolve(cwd, entry));
  const sources: TypeSource[] = [];
  if (classPath.length > 0) {
    sources.push(new ClassPathTypeSource(classPath));
  }
  for (const catalog of options.catalogs) {
    sources.push(await CatalogTypeSource.fromFile(path.resolve(cwd, catalog)));
  }
  const javaHome = config.compiler.java_home || (env.JAVA_HOME ?? '').trim();
  if (javaHome !== '') {
    const baseModule = jdkBaseModulePath(path.resolve(cwd, javaHome));
    logger.debug('jdk_module_added', { path: baseModule });
    sources.push(new ClassPathTypeSource([baseModule]));
  }
  sources.push(await createPlatformTypeSource());

  return {
    config,
    classPath,
    introspector: new TypeIntrospector(new CompositeTypeSource(sources), {
      logger: logger.child('TypeIntrospector'),
    }),
    logger,
  };
}
