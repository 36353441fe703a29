/**
 * Java compiler wrapper.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import * as path from 'node:path';

/**
 * Error thrown when the compiler binary cannot be started.
 */
export class ToolchainNotInstalledError extends Error {
  /** The command that could not be found. */
  public readonly command: string;

  constructor(command: string) {
    super(`${command} not found in PATH. Install a JDK or set [compiler] command in implgen.toml`);
    this.name = 'ToolchainNotInstalledError';
    this.command = command;
  }
}

/**
 * A single diagnostic reported by the compiler.
 */
export interface CompilerDiagnostic {
  /** Absolute path of the file the diagnostic is about. */
  readonly file: string;
  /** 1-indexed line number. */
  readonly line: number;
  readonly kind: 'error' | 'warning';
  readonly message: string;
}

/**
 * What to compile and where.
 */
export interface CompileRequest {
  readonly sourceFiles: readonly string[];
  /** Entries joined with the platform path delimiter for `-cp`. */
  readonly classPath: readonly string[];
  /** Destination for class files (`-d`). */
  readonly outputDirectory: string;
}

/**
 * Outcome of one compiler run.
 */
export interface CompileResult {
  /** Whether the compiler exited with code 0. */
  readonly success: boolean;
  readonly exitCode: number;
  readonly diagnostics: readonly CompilerDiagnostic[];
  /** Combined stdout and stderr. */
  readonly output: string;
}

/**
 * Compiles Java sources.
 */
export interface JavaCompiler {
  compile(request: CompileRequest): Promise<CompileResult>;
}

/**
 * Options for creating a JavacCompiler.
 */
export interface JavacCompilerOptions {
  /** Compiler executable. Default: 'javac'. */
  readonly command?: string;
  /** Extra arguments placed before the generated ones. */
  readonly options?: readonly string[];
  /** Working directory for the compiler process. */
  readonly cwd?: string;
}

/** Matches `File.java:12: error: cannot find symbol`. */
const JAVAC_DIAGNOSTIC_PATTERN = /^(.+?\.java):(\d+): (error|warning): (.+)$/;

/**
 * Extracts `file:line: kind: message` diagnostics from compiler output.
 *
 * @param output - Combined compiler output.
 * @param basePath - Directory relative file names are resolved against.
 */
export function parseJavacDiagnostics(output: string, basePath: string): CompilerDiagnostic[] {
  const diagnostics: CompilerDiagnostic[] = [];

  for (const line of output.split('\n')) {
    const match = JAVAC_DIAGNOSTIC_PATTERN.exec(line.trim());
    if (match === null) {
      continue;
    }
    const [, file, lineText, kind, message] = match;
    if (file === undefined || lineText === undefined || message === undefined) {
      continue;
    }
    diagnostics.push({
      file: path.isAbsolute(file) ? file : path.resolve(basePath, file),
      line: parseInt(lineText, 10),
      kind: kind === 'warning' ? 'warning' : 'error',
      message,
    });
  }

  return diagnostics;
}

/**
 * Runs `javac` through execa.
 *
 * @example
 * ```typescript
 * const compiler = new JavacCompiler({ options: ['--release', '17'] });
 * const result = await compiler.compile({
 *   sourceFiles: ['/tmp/x/com/example/ShapeImpl.java'],
 *   classPath: ['/tmp/x', 'lib/shapes.jar'],
 *   outputDirectory: '/tmp/x',
 * });
 * ```
 */
export class JavacCompiler implements JavaCompiler {
  private readonly command: string;
  private readonly options: readonly string[];
  private readonly cwd: string;

  constructor(options: JavacCompilerOptions = {}) {
    this.command = options.command ?? 'javac';
    this.options = options.options ?? [];
    this.cwd = path.resolve(options.cwd ?? process.cwd());
  }

  /**
   * @throws {ToolchainNotInstalledError} If the compiler cannot be started.
   */
  async compile(request: CompileRequest): Promise<CompileResult> {
    const args = [...this.options];
    if (request.classPath.length > 0) {
      args.push('-cp', request.classPath.join(path.delimiter));
    }
    args.push('-d', request.outputDirectory, ...request.sourceFiles);

    let exitCode: number;
    let output: string;
    try {
      const result = await execa(this.command, args, {
        cwd: this.cwd,
        reject: false,
        all: true,
      });
      if (result.failed && result.exitCode === undefined) {
        throw new ToolchainNotInstalledError(this.command);
      }
      exitCode = result.exitCode ?? 1;
      const rawOutput = result.all;
      output = typeof rawOutput === 'string' ? rawOutput : String(rawOutput);
    } catch (error) {
      if (error instanceof Error && error.message.includes('ENOENT')) {
        throw new ToolchainNotInstalledError(this.command);
      }
      throw error;
    }

    return {
      success: exitCode === 0,
      exitCode,
      diagnostics: parseJavacDiagnostics(output, this.cwd),
      output,
    };
  }
}
