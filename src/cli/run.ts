/**
 * Dispatches a parsed command line.
 */

import { createCliApp } from './app.js';
import type { CliRuntime } from './app.js';
import { parseCliArgs } from './args.js';
import { handleImplementCommand } from './commands/implement.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import { runWithErrorHandling } from './utils/errorHandling.js';

/**
 * Usage text printed by --help.
 */
export function helpText(): string {
  return `
implgen v${getVersionFromPackageJson()}

Generates a compilable stub implementation of a Java abstract class or interface.

USAGE:
  implgen [options] <type> <output-dir>        Write <output-dir>/<package>/<Name>Impl.java
  implgen [options] -jar <type> <jar-file>     Compile the stub and write it to <jar-file>

  <type> is a binary name, e.g. com.example.Shape or com.example.Outer$Inner.

OPTIONS:
  --classpath, -cp <entries>  Class-path entries to look types up in (repeatable)
  --catalog <file.toml>       TOML type catalog to look types up in (repeatable)
  --suffix <text>             Class name suffix (default: Impl)
  --config <file>             Configuration file (default: ./implgen.toml)
  --debug                     Write debug log entries to stderr
  --help, -h                  Show this help message
  --version, -v               Show version information

ENVIRONMENT:
  IMPLGEN_CLASS_SUFFIX, IMPLGEN_INDENT, IMPLGEN_JAVAC, IMPLGEN_CLASSPATH,
  IMPLGEN_JAVA_HOME, IMPLGEN_MANIFEST_VERSION, IMPLGEN_DEBUG
  JAVA_HOME  JDK whose jmods/java.base.jmod describes platform types

EXAMPLES:
  implgen -cp build/classes com.example.Shape src/test/java
  implgen -jar -cp lib/shapes.jar com.example.Shape out/shape-impl.jar
  implgen java.lang.Runnable out
`;
}

/**
 * Runs the CLI for the arguments after the program name.
 *
 * @returns The process exit code.
 */
export function runCli(argv: readonly string[], runtime: CliRuntime = {}): Promise<number> {
  return runWithErrorHandling(async () => {
    const parsed = parseCliArgs(argv);
    switch (parsed.kind) {
      case 'help':
        console.log(helpText());
        return { exitCode: 0 };
      case 'version':
        return handleVersionCommand();
      case 'implement': {
        const context = await createCliApp(parsed.options, runtime);
        return handleImplementCommand(
          context,
          { mode: parsed.mode, typeName: parsed.typeName, output: parsed.output },
          runtime.cwd
        );
      }
    }
  });
}
