/**
 * Scoped temporary directories.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { createSilentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { safeMkdtemp, safeRm } from '../utils/safe-fs.js';

/** Name prefix of scoped directories. */
export const TEMP_DIRECTORY_PREFIX = 'implgen-';

/**
 * Options for withTempDirectory.
 */
export interface TempDirectoryOptions {
  /** Name prefix. Default: 'implgen-'. */
  readonly prefix?: string;
  /** Receives a warning when removal fails. */
  readonly logger?: Logger;
}

/**
 * Creates a fresh directory under `parent`, runs `fn` with it and removes it
 * recursively afterwards, whatever `fn` did.
 *
 * A failed removal is logged and never replaces the outcome of `fn`.
 *
 * @example
 * ```typescript
 * const bytes = await withTempDirectory('/out', async (dir) => {
 *   await compile(dir);
 *   return readClass(dir);
 * });
 * ```
 */
export async function withTempDirectory<T>(
  parent: string,
  fn: (directory: string) => Promise<T>,
  options: TempDirectoryOptions = {}
): Promise<T> {
  const logger = options.logger ?? createSilentLogger('withTempDirectory');
  const directory = await safeMkdtemp(path.join(parent, options.prefix ?? TEMP_DIRECTORY_PREFIX));
  logger.debug('temp_directory_created', { directory });

  try {
    return await fn(directory);
  } finally {
    try {
      await safeRm(directory, { recursive: true, force: true });
      logger.debug('temp_directory_removed', { directory });
    } catch (error) {
      logger.warn('temp_cleanup_failed', {
        directory,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
