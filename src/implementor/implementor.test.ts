import { describe, expect, it, vi } from 'vitest';
import { Implementor, generateSource, validateSubjectName } from './implementor.js';
import { MemorySink } from './sink.js';
import type { OutputSink } from './sink.js';
import { ImplementorError, isImplementorError } from '../model/errors.js';
import type { TypeDescriptor } from '../model/types.js';
import type { Introspector } from '../introspection/introspector.js';
import { Logger } from '../utils/logger.js';
import { descriptor, level, method } from '../../test-fixtures/descriptors.js';

const FOO = descriptor({
  binaryName: 'p.Foo',
  kind: 'interface',
  visible: [method('p.Foo', { name: 'getValue', returnType: 'int' })],
});

function fakeIntrospector(...types: TypeDescriptor[]) {
  const introspect = vi.fn((name: string): Promise<TypeDescriptor> => {
    const found = types.find((type) => type.binaryName === name);
    return found !== undefined
      ? Promise.resolve(found)
      : Promise.reject(new ImplementorError(`Cannot resolve type '${name}'`, 'TYPE_RESOLUTION_ERROR'));
  });
  return { introspect } satisfies Introspector;
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('validateSubjectName', () => {
  it.each([
    ['', 'Type name must not be empty'],
    ['   ', 'Type name must not be empty'],
    ['int', "Cannot implement primitive type 'int'"],
    ['void', "Cannot implement primitive type 'void'"],
    ['java.lang.String[]', "Cannot implement array type 'java.lang.String[]'"],
    ['[Ljava.lang.String;', "Cannot implement array type '[Ljava.lang.String;'"],
    ['java.lang.Object', "Cannot implement 'java.lang.Object'"],
    ['java.lang.Enum', "Cannot implement 'java.lang.Enum'"],
  ])('rejects %j', (name, message) => {
    expect(() => validateSubjectName(name)).toThrow(message);
  });

  it('accepts ordinary and nested names', () => {
    expect(() => validateSubjectName('com.example.Outer$Inner')).not.toThrow();
  });
});

describe('generateSource', () => {
  it('rejects final classes', () => {
    const subject = descriptor({ binaryName: 'p.Value', modifiers: ['public', 'final'] });
    expect(() => generateSource(subject)).toThrow("Cannot implement final class 'p.Value'");
  });

  it('rejects private nested types', () => {
    const subject = descriptor({ binaryName: 'p.Outer$Hidden', kind: 'interface', modifiers: ['private', 'abstract'] });
    expect(() => generateSource(subject)).toThrow("Cannot implement private type 'p.Outer.Hidden'");
  });

  it('fails with NO_USABLE_CONSTRUCTOR when every constructor is private', () => {
    const subject = descriptor({
      binaryName: 'p.Locked',
      chain: [level('p.Locked', [{ name: 'run' }], [{ modifiers: ['private'] }])],
    });

    let caught: unknown;
    try {
      generateSource(subject);
    } catch (error) {
      caught = error;
    }
    expect(isImplementorError(caught, 'NO_USABLE_CONSTRUCTOR')).toBe(true);
  });
});

describe('Implementor', () => {
  it('writes the source under the package directory', async () => {
    const sink = new MemorySink();
    const implementor = new Implementor({ introspector: fakeIntrospector(FOO), sink });

    const result = await implementor.implement('p.Foo', 'out');

    expect(result.path).toBe('out/p/FooImpl.java');
    expect(sink.files.get('out/p/FooImpl.java')).toBe(
      'package p;\n\npublic class FooImpl implements p.Foo {\n\tpublic int getValue() {\n\t\treturn 0;\n\t}\n}\n'
    );
  });

  it('accepts an already introspected subject', async () => {
    const sink = new MemorySink();
    const implementor = new Implementor({ sink, classSuffix: 'Fake' });

    const result = await implementor.implement(FOO, 'gen');

    expect(result.path).toBe('gen/p/FooFake.java');
    expect(result.source.className).toBe('FooFake');
  });

  it.each(['int', 'long[]', 'java.lang.Runnable[]'])(
    'rejects %s before any lookup',
    async (name) => {
      const introspector = fakeIntrospector(FOO);
      const implementor = new Implementor({ introspector, sink: new MemorySink() });

      const error = await captureError(implementor.implement(name, 'out'));

      expect(isImplementorError(error, 'INVALID_SUBJECT')).toBe(true);
      expect(introspector.introspect).not.toHaveBeenCalled();
    }
  );

  it('trims the type name before lookup', async () => {
    const introspector = fakeIntrospector(FOO);
    const implementor = new Implementor({ introspector, sink: new MemorySink() });

    await implementor.generate('  p.Foo ');

    expect(introspector.introspect).toHaveBeenCalledWith('p.Foo');
  });

  it('propagates lookup failures', async () => {
    const implementor = new Implementor({ introspector: fakeIntrospector(), sink: new MemorySink() });

    const error = await captureError(implementor.implement('p.Missing', 'out'));

    expect(isImplementorError(error, 'TYPE_RESOLUTION_ERROR')).toBe(true);
  });

  it('requires an introspector for names', async () => {
    const implementor = new Implementor({ sink: new MemorySink() });

    await expect(implementor.generate('p.Foo')).rejects.toThrow(
      "Cannot resolve 'p.Foo': no introspector configured"
    );
  });

  it('rejects an empty output root', async () => {
    const implementor = new Implementor({ sink: new MemorySink() });

    const error = await captureError(implementor.implement(FOO, ' '));

    expect(isImplementorError(error, 'INVALID_ARGUMENT')).toBe(true);
  });

  it('wraps sink failures as RENDER_FAILURE', async () => {
    const cause = new Error('disk full');
    const sink: OutputSink = { write: () => Promise.reject(cause) };
    const implementor = new Implementor({ sink });

    const error = await captureError(implementor.implement(FOO, 'out'));

    expect(isImplementorError(error, 'RENDER_FAILURE')).toBe(true);
    expect(error instanceof Error ? error.message : '').toBe("Cannot write 'out/p/FooImpl.java': disk full");
    expect(error instanceof ImplementorError ? error.cause : undefined).toBe(cause);
  });

  it('logs resolution warnings and the written file', async () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'Implementor', write: (line) => lines.push(line) });
    const subject = descriptor({
      binaryName: 'p.Both',
      kind: 'interface',
      visible: [
        method('p.Left', { name: 'close', exceptions: ['p.LeftException'] }),
        method('p.Right', { name: 'close' }),
      ],
    });
    const implementor = new Implementor({ sink: new MemorySink(), logger });

    const result = await implementor.implement(subject, 'out');

    const entries: unknown[] = lines.map((line) => JSON.parse(line));
    expect(result.warnings).toHaveLength(1);
    expect(entries).toEqual([
      expect.objectContaining({
        level: 'warn',
        event: 'resolution_warning',
        data: expect.objectContaining({ type: 'p.Both', code: 'CONFLICTING_THROWS', signature: 'close()void' }),
      }),
      expect.objectContaining({
        level: 'info',
        event: 'source_written',
        data: { path: 'out/p/BothImpl.java', methods: 1 },
      }),
    ]);
  });
});
