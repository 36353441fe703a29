/**
 * Generates, compiles and packages an implementation as a jar.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { ImplementorError, toError } from '../model/errors.js';
import type { Introspector } from '../introspection/introspector.js';
import type { TypeDescriptor } from '../model/types.js';
import { Implementor, validateSubjectName } from '../implementor/implementor.js';
import type { GenerationResult } from '../implementor/implementor.js';
import { FileSystemSink, sourceFilePath } from '../implementor/sink.js';
import type { RenderOptions } from '../implementor/synthesizer.js';
import { createSilentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { safeMkdir, safeReadBytes, safeRm, safeWriteFile } from '../utils/safe-fs.js';
import { createJarArchive } from './archive.js';
import type { ManifestOptions } from './archive.js';
import { JavacCompiler } from './compiler.js';
import type { CompileResult, JavaCompiler } from './compiler.js';
import { withTempDirectory } from './temp-dir.js';

/** Extension of compiled classes. */
export const CLASS_EXTENSION = '.class';

/**
 * Options for creating a JarImplementor.
 */
export interface JarImplementorOptions extends RenderOptions, ManifestOptions {
  readonly introspector: Introspector;
  /** Default: a {@link JavacCompiler} running `javac`. */
  readonly compiler?: JavaCompiler;
  /** Extra class-path entries appended after the subject's origin. */
  readonly classPath?: readonly string[];
  readonly logger?: Logger;
}

/**
 * Result of packaging an implementation.
 */
export interface JarResult extends GenerationResult {
  /** Absolute path of the written jar. */
  readonly path: string;
  /** Path of the class inside the jar. */
  readonly entryName: string;
}

function formatDiagnostics(result: CompileResult): string {
  if (result.diagnostics.length === 0) {
    return result.output;
  }
  return result.diagnostics
    .map((diagnostic) => `${diagnostic.file}:${String(diagnostic.line)}: ${diagnostic.kind}: ${diagnostic.message}`)
    .join('\n');
}

/**
 * Writes `<Simple>Impl.class` into a jar with a manifest.
 *
 * Work happens in a temporary directory beside the jar, which is removed on
 * every exit path. Directories created to hold the jar are removed again
 * when no jar is written.
 *
 * @example
 * ```typescript
 * const packager = new JarImplementor({ introspector });
 * const { path } = await packager.implementJar('com.example.Shape', 'out/shape-impl.jar');
 * ```
 */
export class JarImplementor {
  private readonly introspector: Introspector;
  private readonly compiler: JavaCompiler;
  private readonly classPath: readonly string[];
  private readonly renderOptions: RenderOptions;
  private readonly manifest: ManifestOptions;
  private readonly logger: Logger;

  constructor(options: JarImplementorOptions) {
    this.introspector = options.introspector;
    this.compiler = options.compiler ?? new JavacCompiler();
    this.classPath = options.classPath ?? [];
    this.renderOptions = {
      ...(options.classSuffix !== undefined ? { classSuffix: options.classSuffix } : {}),
      ...(options.indent !== undefined ? { indent: options.indent } : {}),
    };
    this.manifest = {
      ...(options.manifestVersion !== undefined ? { manifestVersion: options.manifestVersion } : {}),
      ...(options.createdBy !== undefined ? { createdBy: options.createdBy } : {}),
    };
    this.logger = options.logger ?? createSilentLogger('JarImplementor');
  }

  /**
   * @throws {ImplementorError} Any generation error, `COMPILATION_FAILURE`
   *   when the compiler rejects the source, `PACKAGING_FAILURE` when the
   *   class cannot be read or the jar cannot be written.
   */
  async implementJar(typeName: string, jarFile: string): Promise<JarResult> {
    if (jarFile.trim() === '') {
      throw new ImplementorError('Jar path must not be empty', 'INVALID_ARGUMENT');
    }
    validateSubjectName(typeName);

    const jarPath = path.resolve(jarFile);
    const subject = await this.introspector.introspect(typeName.trim());
    const parent = path.dirname(jarPath);
    const createdDirectory = await safeMkdir(parent, { recursive: true });

    try {
      return await this.packageInto(subject, jarPath, parent);
    } catch (error) {
      if (createdDirectory !== undefined) {
        await this.removeCreatedDirectory(createdDirectory);
      }
      throw error;
    }
  }

  private packageInto(subject: TypeDescriptor, jarPath: string, parent: string): Promise<JarResult> {
    return withTempDirectory(
      parent,
      async (workDirectory) => {
        const implementor = new Implementor({
          ...this.renderOptions,
          sink: new FileSystemSink(),
          logger: this.logger.child('Implementor'),
        });
        const generated = await implementor.implement(subject, workDirectory);
        const { packageName, className } = generated.source;

        const classPath = [
          workDirectory,
          ...(subject.origin !== undefined ? [subject.origin] : []),
          ...this.classPath,
        ];
        await this.compile(generated.path, classPath, workDirectory);

        const classFile = sourceFilePath(workDirectory, packageName, className, CLASS_EXTENSION);
        const entryName = [...(packageName === '' ? [] : packageName.split('.')), `${className}${CLASS_EXTENSION}`].join('/');
        const archive = await this.buildArchive(classFile, entryName);
        await this.writeJar(jarPath, archive);

        this.logger.info('jar_written', { path: jarPath, entry: entryName, bytes: archive.byteLength });
        return { source: generated.source, warnings: generated.warnings, path: jarPath, entryName };
      },
      { logger: this.logger }
    );
  }

  private async removeCreatedDirectory(directory: string): Promise<void> {
    try {
      await safeRm(directory, { recursive: true, force: true });
    } catch (cleanupError) {
      this.logger.warn('output_directory_cleanup_failed', {
        path: directory,
        error: toError(cleanupError).message,
      });
    }
  }

  private async compile(sourceFile: string, classPath: readonly string[], outputDirectory: string): Promise<void> {
    let result: CompileResult;
    try {
      result = await this.compiler.compile({ sourceFiles: [sourceFile], classPath, outputDirectory });
    } catch (error) {
      const cause = toError(error);
      throw new ImplementorError(`Cannot run the compiler: ${cause.message}`, 'COMPILATION_FAILURE', undefined, cause);
    }

    this.logger.debug('compiler_finished', {
      exitCode: result.exitCode,
      diagnostics: result.diagnostics.length,
    });
    if (!result.success) {
      throw new ImplementorError(
        `Compilation of '${sourceFile}' failed with exit code ${String(result.exitCode)}`,
        'COMPILATION_FAILURE',
        formatDiagnostics(result)
      );
    }
  }

  private async buildArchive(classFile: string, entryName: string): Promise<Uint8Array> {
    try {
      const data = await safeReadBytes(classFile);
      return createJarArchive([{ name: entryName, data }], this.manifest);
    } catch (error) {
      const cause = toError(error);
      throw new ImplementorError(`Cannot package '${classFile}': ${cause.message}`, 'PACKAGING_FAILURE', undefined, cause);
    }
  }

  private async writeJar(jarPath: string, archive: Uint8Array): Promise<void> {
    try {
      await safeWriteFile(jarPath, archive);
    } catch (error) {
      const cause = toError(error);
      try {
        await safeRm(jarPath, { force: true });
      } catch (cleanupError) {
        this.logger.warn('partial_jar_cleanup_failed', {
          path: jarPath,
          error: toError(cleanupError).message,
        });
      }
      throw new ImplementorError(`Cannot write '${jarPath}': ${cause.message}`, 'PACKAGING_FAILURE', undefined, cause);
    }
  }
}
