/**
 * implgen
 *
 * Generates compilable default-value implementations of abstract Java classes
 * and interfaces, as source files or packaged jars.
 *
 * @example
 * ```typescript
 * import { Implementor, TypeIntrospector, createPlatformTypeSource } from 'implgen';
 *
 * const introspector = new TypeIntrospector(await createPlatformTypeSource());
 * const result = await new Implementor({ introspector }).implement('java.lang.Runnable', 'out');
 * console.log(result.path); // "out/java/lang/RunnableImpl.java"
 * ```
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './model/index.js';
export * from './introspection/index.js';
export * from './implementor/index.js';
export * from './packaging/index.js';
export * from './config/index.js';
export { Logger, createSilentLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
