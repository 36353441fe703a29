/**
 * Type source backed by a class path of directories and archives.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { unzipSync } from 'fflate';
import { safeExists, safeReadBytes, safeStat } from '../utils/safe-fs.js';
import { ClassFormatError, readClassFile } from './class-file-reader.js';
import { internalNameFromBinary } from './type-names.js';
import type { RawTypeDeclaration, TypeSource } from './types.js';

const ARCHIVE_EXTENSIONS: ReadonlySet<string> = new Set(['.jar', '.zip', '.jmod']);

/** `JM` followed by major and minor version, ahead of the zip data of a jmod file. */
const JMOD_HEADER_LENGTH = 4;
const JMOD_MAGIC = [0x4a, 0x4d] as const;

/**
 * Splits a class-path string on the platform delimiter, dropping empty entries.
 *
 * @example
 * ```typescript
 * splitClassPath('lib/a.jar:build/classes', ':'); // ['lib/a.jar', 'build/classes']
 * ```
 */
export function splitClassPath(value: string, delimiter: string = path.delimiter): string[] {
  return value
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Returns the archive member path of a class, e.g. `a/b/C$D.class`.
 */
export function classEntryName(binaryName: string): string {
  return `${internalNameFromBinary(binaryName)}.class`;
}

/**
 * Returns the path of the jmod describing the `java.base` module of a JDK.
 *
 * @example
 * ```typescript
 * jdkBaseModulePath('/opt/jdk-21'); // '/opt/jdk-21/jmods/java.base.jmod'
 * ```
 */
export function jdkBaseModulePath(javaHome: string): string {
  return path.join(javaHome, 'jmods', 'java.base.jmod');
}

/**
 * Looks types up in class-path entries, first entry first.
 *
 * Entries are directories, jar or zip archives, or JDK jmod files whose
 * classes live under `classes/`. Entries that do not exist are ignored. Parsed declarations and archive
 * contents are cached for the lifetime of the source.
 *
 * @example
 * ```typescript
 * const source = new ClassPathTypeSource(['build/classes', 'lib/api.jar']);
 * const shape = await source.lookup('com.example.Shape');
 * ```
 */
export class ClassPathTypeSource implements TypeSource {
  readonly description: string;
  private readonly entries: readonly string[];
  private readonly declarations = new Map<string, Promise<RawTypeDeclaration | undefined>>();
  private readonly archives = new Map<string, Promise<Uint8Array>>();

  constructor(entries: readonly string[]) {
    this.entries = entries.map((entry) => path.resolve(entry));
    this.description = `class path [${this.entries.join(path.delimiter)}]`;
  }

  lookup(binaryName: string): Promise<RawTypeDeclaration | undefined> {
    let pending = this.declarations.get(binaryName);
    if (pending === undefined) {
      pending = this.find(binaryName);
      this.declarations.set(binaryName, pending);
    }
    return pending;
  }

  private async find(binaryName: string): Promise<RawTypeDeclaration | undefined> {
    const entryName = classEntryName(binaryName);
    for (const entry of this.entries) {
      const bytes = await this.readFromEntry(entry, entryName);
      if (bytes !== undefined) {
        return readClassFile(bytes, entry);
      }
    }
    return undefined;
  }

  private async readFromEntry(entry: string, entryName: string): Promise<Uint8Array | undefined> {
    if (!(await safeExists(entry))) {
      return undefined;
    }

    const stats = await safeStat(entry);
    if (stats.isDirectory()) {
      const file = path.join(entry, ...entryName.split('/'));
      return (await safeExists(file)) ? safeReadBytes(file) : undefined;
    }

    if (!stats.isFile() || !ARCHIVE_EXTENSIONS.has(path.extname(entry).toLowerCase())) {
      return undefined;
    }

    const isModule = path.extname(entry).toLowerCase() === '.jmod';
    const memberName = isModule ? `classes/${entryName}` : entryName;
    const archive = await this.readArchive(entry, isModule);
    const files = unzipSync(archive, { filter: (file) => file.name === memberName });
    return files[memberName];
  }

  private readArchive(entry: string, isModule: boolean): Promise<Uint8Array> {
    let pending = this.archives.get(entry);
    if (pending === undefined) {
      pending = safeReadBytes(entry).then((bytes) => (isModule ? stripModuleHeader(bytes, entry) : bytes));
      this.archives.set(entry, pending);
    }
    return pending;
  }
}

function stripModuleHeader(bytes: Uint8Array, entry: string): Uint8Array {
  if (bytes.length < JMOD_HEADER_LENGTH || bytes[0] !== JMOD_MAGIC[0] || bytes[1] !== JMOD_MAGIC[1]) {
    throw new ClassFormatError(`'${entry}' is not a jmod file`);
  }
  return bytes.subarray(JMOD_HEADER_LENGTH);
}
