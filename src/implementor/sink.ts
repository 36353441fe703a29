/**
 * Output sinks for generated source text.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeMkdir, safeWriteFile } from '../utils/safe-fs.js';

/** File extension of generated sources. */
export const SOURCE_EXTENSION = '.java';

/**
 * Accepts rendered text for a target file.
 */
export interface OutputSink {
  /**
   * Stores `text` at `filePath`, creating whatever the location needs.
   */
  write(filePath: string, text: string): Promise<void>;
}

/**
 * Derives `<root>/<package path>/<className><extension>`.
 *
 * @example
 * ```typescript
 * sourceFilePath('/out', 'com.example', 'ShapeImpl');
 * // '/out/com/example/ShapeImpl.java'
 * ```
 */
export function sourceFilePath(
  root: string,
  packageName: string,
  className: string,
  extension: string = SOURCE_EXTENSION
): string {
  const packageSegments = packageName === '' ? [] : packageName.split('.');
  return path.join(root, ...packageSegments, `${className}${extension}`);
}

/**
 * Writes files to disk, creating parent directories as needed.
 */
export class FileSystemSink implements OutputSink {
  async write(filePath: string, text: string): Promise<void> {
    await safeMkdir(path.dirname(filePath), { recursive: true });
    await safeWriteFile(filePath, text, 'ascii');
  }
}

/**
 * Keeps written files in memory.
 */
export class MemorySink implements OutputSink {
  /** Written text keyed by file path. */
  readonly files = new Map<string, string>();

  write(filePath: string, text: string): Promise<void> {
    this.files.set(filePath, text);
    return Promise.resolve();
  }
}
