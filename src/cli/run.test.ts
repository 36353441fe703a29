import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { zipSync } from 'fflate';
import { ACC } from '../introspection/index.js';
import { buildClassFile } from '../../test-fixtures/class-file-builder.js';
import { createCliApp } from './app.js';
import { helpText, runCli } from './run.js';

const CATALOG = `
[types."p.Task"]
kind = "class"
modifiers = ["public", "abstract"]

[[types."p.Task".constructors]]
modifiers = ["protected"]
parameters = [{ type = "java.lang.String", name = "name" }]

[[types."p.Task".methods]]
name = "run"
modifiers = ["public", "abstract"]

[types."p.Sealed"]
kind = "class"
modifiers = ["public", "final"]
`;

const TASK_IMPL =
  'package p;\n\n' +
  'public class TaskImpl extends p.Task {\n' +
  '\tpublic TaskImpl(java.lang.String name) {\n' +
  '\t\tsuper(name);\n' +
  '\t}\n' +
  '\n' +
  '\tpublic void run() {\n' +
  '\t}\n' +
  '}\n';

describe('runCli', () => {
  let tempDir: string;
  let log: MockInstance<typeof console.log>;
  let errorLog: MockInstance<typeof console.error>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-run-test-'));
    await fs.writeFile(path.join(tempDir, 'types.toml'), CATALOG);
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function errorOutput(): string {
    // eslint-disable-next-line no-control-regex
    return errorLog.mock.calls.map((call) => String(call[0]).replace(/\x1b\[[0-9;]*m/g, '')).join('\n');
  }

  it('writes the implementation source and prints its path', async () => {
    const exitCode = await runCli(['--catalog', 'types.toml', 'p.Task', 'out'], { env: {}, cwd: tempDir });

    const file = path.join(tempDir, 'out', 'p', 'TaskImpl.java');
    expect(exitCode).toBe(0);
    expect(await fs.readFile(file, 'utf-8')).toBe(TASK_IMPL);
    expect(log).toHaveBeenCalledWith(file);
  });

  it('applies --suffix and IMPLGEN_INDENT', async () => {
    const exitCode = await runCli(['--catalog=types.toml', '--suffix', 'Stub', 'p.Task', 'out'], {
      env: { IMPLGEN_INDENT: '2' },
      cwd: tempDir,
    });

    expect(exitCode).toBe(0);
    const source = await fs.readFile(path.join(tempDir, 'out', 'p', 'TaskStub.java'), 'utf-8');
    expect(source.split('\n').slice(2, 5)).toEqual([
      'public class TaskStub extends p.Task {',
      '  public TaskStub(java.lang.String name) {',
      '    super(name);',
    ]);
  });

  it('reads settings from implgen.toml in the working directory', async () => {
    await fs.writeFile(path.join(tempDir, 'implgen.toml'), '[generation]\nclass_suffix = "Fake"\n');

    await runCli(['--catalog', 'types.toml', 'p.Task', 'out'], { env: {}, cwd: tempDir });

    expect(log).toHaveBeenCalledWith(path.join(tempDir, 'out', 'p', 'TaskFake.java'));
  });

  it('implements platform types without a class path', async () => {
    const exitCode = await runCli(['java.lang.Runnable', 'out'], { env: {}, cwd: tempDir });

    expect(exitCode).toBe(0);
    expect(await fs.readFile(path.join(tempDir, 'out', 'java', 'lang', 'RunnableImpl.java'), 'utf-8')).toBe(
      'package java.lang;\n\npublic class RunnableImpl implements java.lang.Runnable {\n\tpublic void run() {\n\t}\n}\n'
    );
  });

  it('looks JDK classes up in the java.base module of JAVA_HOME', async () => {
    const zip = zipSync({
      'classes/java/io/Reader.class': buildClassFile({
        name: 'java/io/Reader',
        flags: ACC.PUBLIC | ACC.SUPER | ACC.ABSTRACT,
        methods: [
          { flags: ACC.PROTECTED, name: '<init>', descriptor: '()V' },
          { flags: ACC.PUBLIC | ACC.ABSTRACT, name: 'close', descriptor: '()V' },
        ],
      }),
    });
    const jmod = new Uint8Array(4 + zip.length);
    jmod.set([0x4a, 0x4d, 0x01, 0x00]);
    jmod.set(zip, 4);
    await fs.mkdir(path.join(tempDir, 'jdk', 'jmods'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'jdk', 'jmods', 'java.base.jmod'), jmod);

    const exitCode = await runCli(['java.io.Reader', 'out'], { env: { JAVA_HOME: 'jdk' }, cwd: tempDir });

    expect(exitCode).toBe(0);
    expect(await fs.readFile(path.join(tempDir, 'out', 'java', 'io', 'ReaderImpl.java'), 'utf-8')).toBe(
      'package java.io;\n\n' +
        'public class ReaderImpl extends java.io.Reader {\n' +
        '\tpublic ReaderImpl() {\n' +
        '\t\tsuper();\n' +
        '\t}\n' +
        '\n' +
        '\tpublic void close() {\n' +
        '\t}\n' +
        '}\n'
    );
  });

  it('writes structured debug entries with --debug', async () => {
    const lines: string[] = [];

    await runCli(['--debug', '--catalog', 'types.toml', 'p.Task', 'out'], {
      env: {},
      cwd: tempDir,
      writeLog: (line) => lines.push(line),
    });

    const events = lines.map((line) => {
      const entry: unknown = JSON.parse(line);
      return typeof entry === 'object' && entry !== null && 'event' in entry ? entry.event : undefined;
    });
    expect(events).toContain('config_resolved');
    expect(events).toContain('type_introspected');
    expect(events).toContain('source_written');
  });

  it('exits with 1 and a formatted error for an unresolvable type', async () => {
    const exitCode = await runCli(['--catalog', 'types.toml', 'p.Missing', 'out'], { env: {}, cwd: tempDir });

    expect(exitCode).toBe(1);
    expect(errorOutput()).toMatch(/^Error: Cannot resolve type 'p\.Missing' in /);
    expect(errorOutput()).toContain('Suggestions:');
  });

  it('exits with 1 for a final class and writes nothing', async () => {
    const exitCode = await runCli(['--catalog', 'types.toml', 'p.Sealed', 'out'], { env: {}, cwd: tempDir });

    expect(exitCode).toBe(1);
    expect(errorOutput().split('\n')[0]).toBe("Error: Cannot implement final class 'p.Sealed'");
    await expect(fs.access(path.join(tempDir, 'out'))).rejects.toThrow();
  });

  it('exits with 2 for usage errors', async () => {
    expect(await runCli(['p.Task'], { env: {}, cwd: tempDir })).toBe(2);
    expect(errorOutput().split('\n')[0]).toBe('Error: Expected <type> <output-dir>, got 1 argument(s)');
  });

  it('exits with 1 for invalid environment variables', async () => {
    expect(await runCli(['p.Task', 'out'], { env: { IMPLGEN_DEBUG: 'maybe' }, cwd: tempDir })).toBe(1);
  });

  it('prints help and version', async () => {
    expect(await runCli(['--help'])).toBe(0);
    expect(log).toHaveBeenCalledWith(helpText());

    expect(await runCli(['--version'])).toBe(0);
    expect(log).toHaveBeenLastCalledWith('implgen v0.1.0');
  });
});

describe('createCliApp', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-app-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('puts --classpath entries before configured ones, resolved against the working directory', async () => {
    await fs.writeFile(path.join(tempDir, 'implgen.toml'), '[compiler]\nclasspath = ["lib/api.jar"]\n');

    const context = await createCliApp({ classPath: ['classes'], catalogs: [], debug: false }, { env: {}, cwd: tempDir });

    expect(context.classPath).toEqual([path.join(tempDir, 'classes'), path.join(tempDir, 'lib', 'api.jar')]);
  });

  it('lets --debug and --suffix override the environment', async () => {
    const context = await createCliApp(
      { classPath: [], catalogs: [], suffix: 'Stub', debug: true },
      { env: { IMPLGEN_CLASS_SUFFIX: 'Fake', IMPLGEN_DEBUG: 'false' }, cwd: tempDir }
    );

    expect(context.config.generation.class_suffix).toBe('Stub');
    expect(context.config.logging.debug).toBe(true);
    expect(context.logger.isDebugEnabled).toBe(true);
  });

  it('prefers [compiler] java_home over JAVA_HOME and leaves the compile class path alone', async () => {
    await fs.writeFile(path.join(tempDir, 'implgen.toml'), '[compiler]\njava_home = "jdk-21"\n');

    const lines: string[] = [];
    const context = await createCliApp(
      { classPath: [], catalogs: [], debug: true },
      { env: { JAVA_HOME: '/usr/lib/jvm/other' }, cwd: tempDir, writeLog: (line) => lines.push(line) }
    );

    expect(context.classPath).toEqual([]);
    const added = lines
      .map((line): unknown => JSON.parse(line))
      .find(
        (entry) => typeof entry === 'object' && entry !== null && 'event' in entry && entry.event === 'jdk_module_added'
      );
    expect(added).toMatchObject({ data: { path: path.join(tempDir, 'jdk-21', 'jmods', 'java.base.jmod') } });
  });

  it('rejects an invalid --suffix', async () => {
    await expect(
      createCliApp({ classPath: [], catalogs: [], suffix: 'a-b', debug: false }, { env: {}, cwd: tempDir })
    ).rejects.toThrow("Invalid value for '--suffix': expected identifier characters, got 'a-b'");
  });
});
