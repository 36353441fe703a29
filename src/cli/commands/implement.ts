/**
 * Implement command handler for the implgen CLI.
 */

import * as path from 'node:path';
import { Implementor } from '../../implementor/index.js';
import { JarImplementor, JavacCompiler } from '../../packaging/index.js';
import type { CliCommandResult, CliContext, OutputMode } from '../types.js';

/**
 * What to implement and where to put it.
 */
export interface ImplementCommandArgs {
  readonly mode: OutputMode;
  readonly typeName: string;
  readonly output: string;
}

/**
 * Writes the implementation source, or the packaged jar, and prints its path.
 *
 * @returns Exit code 0; failures are thrown.
 */
export async function handleImplementCommand(
  context: CliContext,
  args: ImplementCommandArgs,
  cwd: string = process.cwd()
): Promise<CliCommandResult> {
  const { config, logger } = context;
  const output = path.resolve(cwd, args.output);

  if (args.mode === 'jar') {
    const packager = new JarImplementor({
      introspector: context.introspector,
      compiler: new JavacCompiler({ command: config.compiler.command, options: config.compiler.options, cwd }),
      classPath: context.classPath,
      classSuffix: config.generation.class_suffix,
      indent: config.generation.indent,
      manifestVersion: config.archive.manifest_version,
      createdBy: config.archive.created_by,
      logger: logger.child('JarImplementor'),
    });
    const result = await packager.implementJar(args.typeName, output);
    console.log(result.path);
    return { exitCode: 0, message: result.path };
  }

  const implementor = new Implementor({
    introspector: context.introspector,
    classSuffix: config.generation.class_suffix,
    indent: config.generation.indent,
    logger: logger.child('Implementor'),
  });
  const result = await implementor.implement(args.typeName, output);
  console.log(result.path);
  return { exitCode: 0, message: result.path };
}
