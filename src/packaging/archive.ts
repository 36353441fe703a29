/**
 * Jar archive writer.
 *
 * @packageDocumentation
 */

import { strToU8, zipSync } from 'fflate';
import type { Zippable } from 'fflate';

/** Path of the manifest inside a jar. */
export const MANIFEST_PATH = 'META-INF/MANIFEST.MF';

/** Manifest format version written by default. */
export const DEFAULT_MANIFEST_VERSION = '1.0';

/**
 * One file to place in the archive.
 */
export interface JarEntry {
  /** Slash-separated path inside the archive, e.g. `com/example/ShapeImpl.class`. */
  readonly name: string;
  readonly data: Uint8Array;
}

/**
 * Manifest attributes.
 */
export interface ManifestOptions {
  /** Value of `Manifest-Version`. Default: '1.0'. */
  readonly manifestVersion?: string;
  /** Value of `Created-By`; omitted when absent. */
  readonly createdBy?: string;
}

/**
 * Renders manifest text with CRLF line endings and the terminating blank line.
 *
 * @example
 * ```typescript
 * renderManifest({ createdBy: 'implgen' });
 * // 'Manifest-Version: 1.0\r\nCreated-By: implgen\r\n\r\n'
 * ```
 */
export function renderManifest(options: ManifestOptions = {}): string {
  let text = `Manifest-Version: ${options.manifestVersion ?? DEFAULT_MANIFEST_VERSION}\r\n`;
  if (options.createdBy !== undefined && options.createdBy !== '') {
    text += `Created-By: ${options.createdBy}\r\n`;
  }
  return `${text}\r\n`;
}

/**
 * Builds jar bytes: the manifest first, then `entries` in order.
 *
 * @throws {Error} If an entry name is empty, absolute, repeated, or is the manifest path.
 */
export function createJarArchive(entries: readonly JarEntry[], options: ManifestOptions = {}): Uint8Array {
  const files: Zippable = {
    [MANIFEST_PATH]: strToU8(renderManifest(options)),
  };

  for (const entry of entries) {
    if (entry.name === '' || entry.name.startsWith('/')) {
      throw new Error(`Invalid archive entry name '${entry.name}'`);
    }
    if (Object.prototype.hasOwnProperty.call(files, entry.name)) {
      throw new Error(`Duplicate archive entry '${entry.name}'`);
    }
    files[entry.name] = entry.data;
  }

  return zipSync(files);
}
