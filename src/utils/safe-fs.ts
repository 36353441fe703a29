/**
 * File system utilities with path validation.
 *
 * Every wrapper resolves its path to an absolute one and rejects empty paths
 * and paths containing null bytes before touching the file system.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, contains null bytes, or
 *   does not resolve to an absolute path.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Reads a file as raw bytes after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadBytes(filePath: string): Promise<Uint8Array> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath);
}

/**
 * Writes text or bytes to a file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written (e.g., permission denied, directory does not exist).
 */
export async function safeWriteFile(
  filePath: string,
  data: string | Uint8Array,
  encoding?: BufferEncoding
): Promise<void> {
  const validatedPath = validatePath(filePath);
  if (typeof data === 'string') {
    return fs.writeFile(validatedPath, data, encoding ?? 'utf-8');
  }
  return fs.writeFile(validatedPath, data);
}

/**
 * Checks if a file or directory exists after validating the path.
 *
 * @returns True if the path exists, false otherwise.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be created (e.g., permission denied, file exists).
 */
export async function safeMkdir(
  filePath: string,
  options?: { recursive?: boolean }
): Promise<string | undefined> {
  const validatedPath = validatePath(filePath);
  return fs.mkdir(validatedPath, options);
}

/**
 * Creates a uniquely named directory `<prefix>XXXXXX` after validating the prefix.
 *
 * @param prefix - Directory path plus name prefix, e.g. `/out/tmp-`.
 * @returns The absolute path of the created directory.
 * @throws {PathValidationError} If the prefix is invalid.
 */
export async function safeMkdtemp(prefix: string): Promise<string> {
  const validatedPrefix = validatePath(prefix);
  return fs.mkdtemp(validatedPrefix);
}

/**
 * Gets file statistics after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the statistics cannot be retrieved (e.g., not found, permission denied).
 */
export async function safeStat(filePath: string): Promise<Stats> {
  const validatedPath = validatePath(filePath);
  return fs.stat(validatedPath);
}

/**
 * Removes a file or directory after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the path cannot be removed.
 */
export async function safeRm(
  filePath: string,
  options?: { force?: boolean; recursive?: boolean }
): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.rm(validatedPath, options);
}
