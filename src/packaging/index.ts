/**
 * Compiling and packaging generated implementations.
 *
 * @packageDocumentation
 */

export {
  JavacCompiler,
  ToolchainNotInstalledError,
  parseJavacDiagnostics,
} from './compiler.js';
export type {
  CompileRequest,
  CompileResult,
  CompilerDiagnostic,
  JavaCompiler,
  JavacCompilerOptions,
} from './compiler.js';

export { DEFAULT_MANIFEST_VERSION, MANIFEST_PATH, createJarArchive, renderManifest } from './archive.js';
export type { JarEntry, ManifestOptions } from './archive.js';

export { TEMP_DIRECTORY_PREFIX, withTempDirectory } from './temp-dir.js';
export type { TempDirectoryOptions } from './temp-dir.js';

export { CLASS_EXTENSION, JarImplementor } from './jar-implementor.js';
export type { JarImplementorOptions, JarResult } from './jar-implementor.js';
