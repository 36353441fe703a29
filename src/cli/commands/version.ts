/**
 * Version command handler for the implgen CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function isVersionRecord(value: unknown): value is { version?: unknown } {
  return typeof value === 'object' && value !== null;
}

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  try {
    const packageJsonPath = join(__dirname, '../../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isVersionRecord(packageJson) && typeof packageJson.version === 'string'
      ? packageJson.version
      : '(unknown)';
  } catch {
    return '(unknown)';
  }
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(): CliCommandResult {
  const version = getVersionFromPackageJson();
  console.log(`implgen v${version}`);
  return { exitCode: 0 };
}
