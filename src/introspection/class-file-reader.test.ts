import { describe, expect, it } from 'vitest';
import { ClassFormatError, decodeModifiedUtf8, readClassFile } from './class-file-reader.js';
import { ACC } from './access-flags.js';
import { buildClassFile, encodeModifiedUtf8 } from '../../test-fixtures/class-file-builder.js';

describe('readClassFile', () => {
  it('reads an interface with its methods, exceptions and parameter names', () => {
    const bytes = buildClassFile({
      name: 'p/Shape',
      flags: ACC.PUBLIC | ACC.INTERFACE | ACC.ABSTRACT,
      interfaces: ['java/lang/Comparable'],
      methods: [
        { flags: ACC.PUBLIC | ACC.ABSTRACT, name: 'area', descriptor: '()D' },
        {
          flags: ACC.PUBLIC | ACC.ABSTRACT,
          name: 'scale',
          descriptor: '(D[Ljava/lang/String;)Lp/Shape;',
          exceptions: ['java/io/IOException'],
          parameterNames: ['factor', 'labels'],
        },
      ],
    });

    const declaration = readClassFile(bytes, '/cp');

    expect(declaration).toEqual({
      binaryName: 'p.Shape',
      canonicalName: 'p.Shape',
      simpleName: 'Shape',
      kind: 'interface',
      modifiers: ['public', 'abstract'],
      interfaces: ['java.lang.Comparable'],
      constructors: [],
      methods: [
        {
          declaringType: 'p.Shape',
          name: 'area',
          modifiers: ['public', 'abstract'],
          parameters: [],
          returnType: 'double',
          exceptions: [],
        },
        {
          declaringType: 'p.Shape',
          name: 'scale',
          modifiers: ['public', 'abstract'],
          parameters: [
            { type: 'double', name: 'factor' },
            { type: 'java.lang.String[]', name: 'labels' },
          ],
          returnType: 'p.Shape',
          exceptions: ['java.io.IOException'],
        },
      ],
      origin: '/cp',
    });
  });

  it('reads constructors and bridges, and skips initializers and other synthetic members', () => {
    const bytes = buildClassFile({
      name: 'p/Base',
      flags: ACC.PUBLIC | ACC.SUPER | ACC.ABSTRACT,
      superName: 'p/Root',
      fieldCount: 2,
      withLongConstant: true,
      methods: [
        { flags: ACC.PROTECTED | ACC.VARARGS, name: '<init>', descriptor: '(I[Ljava/lang/Object;)V' },
        { flags: ACC.STATIC, name: '<clinit>', descriptor: '()V' },
        { flags: ACC.PUBLIC | ACC.BRIDGE | ACC.SYNTHETIC, name: 'compareTo', descriptor: '(Ljava/lang/Object;)I' },
        { flags: ACC.PRIVATE | ACC.SYNTHETIC, name: 'lambda$run$0', descriptor: '()V' },
        { flags: ACC.PUBLIC | ACC.ABSTRACT | ACC.VARARGS, name: 'run', descriptor: '([Ljava/lang/String;)V' },
        { flags: ACC.PUBLIC | ACC.FINAL | ACC.SYNCHRONIZED, name: 'stop', descriptor: '()Z' },
      ],
    });

    const declaration = readClassFile(bytes);

    expect(declaration.kind).toBe('class');
    expect(declaration.superclass).toBe('p.Root');
    expect(declaration.origin).toBeUndefined();
    expect(declaration.constructors).toEqual([
      {
        declaringType: 'p.Base',
        modifiers: ['protected'],
        parameters: [{ type: 'int' }, { type: 'java.lang.Object[]' }],
        exceptions: [],
      },
    ]);
    expect(declaration.methods.map((method) => [method.name, method.modifiers, method.returnType])).toEqual([
      ['compareTo', ['public'], 'int'],
      ['run', ['public', 'abstract'], 'void'],
      ['stop', ['public', 'final', 'synchronized'], 'boolean'],
    ]);
  });

  it('omits the superclass of an interface', () => {
    const declaration = readClassFile(
      buildClassFile({ name: 'p/Api', flags: ACC.PUBLIC | ACC.INTERFACE | ACC.ABSTRACT })
    );

    expect(declaration.superclass).toBeUndefined();
  });

  it('uses the nested-class entry for names and modifiers', () => {
    const bytes = buildClassFile({
      name: 'p/Outer$Inner',
      flags: ACC.PUBLIC | ACC.SUPER | ACC.ABSTRACT,
      innerClasses: [
        { inner: 'p/Outer$Inner', outer: 'p/Outer', name: 'Inner', flags: ACC.PROTECTED | ACC.STATIC | ACC.ABSTRACT },
      ],
      methods: [{ flags: ACC.PUBLIC | ACC.ABSTRACT, name: 'copy', descriptor: '(Lp/Outer$Inner;)Lp/Outer$Inner;' }],
    });

    const declaration = readClassFile(bytes);

    expect(declaration.binaryName).toBe('p.Outer$Inner');
    expect(declaration.canonicalName).toBe('p.Outer.Inner');
    expect(declaration.simpleName).toBe('Inner');
    expect(declaration.modifiers).toEqual(['protected', 'abstract', 'static']);
    expect(declaration.methods[0]?.parameters).toEqual([{ type: 'p.Outer.Inner' }]);
    expect(declaration.methods[0]?.returnType).toBe('p.Outer.Inner');
  });

  it('leaves the canonical name of anonymous classes undefined', () => {
    const bytes = buildClassFile({
      name: 'p/Outer$1',
      flags: ACC.SUPER,
      innerClasses: [{ inner: 'p/Outer$1', flags: 0 }],
    });

    const declaration = readClassFile(bytes);

    expect(declaration.canonicalName).toBeUndefined();
    expect(declaration.simpleName).toBe('');
  });

  it('ignores parameter names whose count does not match the descriptor', () => {
    const bytes = buildClassFile({
      name: 'p/Api',
      flags: ACC.PUBLIC | ACC.INTERFACE | ACC.ABSTRACT,
      methods: [
        { flags: ACC.PUBLIC | ACC.ABSTRACT, name: 'put', descriptor: '(II)V', parameterNames: ['key'] },
        { flags: ACC.PUBLIC | ACC.ABSTRACT, name: 'get', descriptor: '(I)I', parameterNames: [undefined] },
      ],
    });

    const [put, get] = readClassFile(bytes).methods;

    expect(put?.parameters).toEqual([{ type: 'int' }, { type: 'int' }]);
    expect(get?.parameters).toEqual([{ type: 'int' }]);
  });

  it('rejects a bad magic number', () => {
    const bytes = Uint8Array.from([0xde, 0xad, 0xbe, 0xef, 0, 0, 0, 52]);

    expect(() => readClassFile(bytes)).toThrow(new ClassFormatError('Bad magic number 0xdeadbeef', 0));
  });

  it('rejects truncated input', () => {
    const bytes = buildClassFile({ name: 'p/Api', flags: ACC.PUBLIC | ACC.INTERFACE | ACC.ABSTRACT });

    expect(() => readClassFile(bytes.subarray(0, bytes.length - 3))).toThrow(/Unexpected end of class file/);
  });

  it('reads from a view into a larger buffer', () => {
    const bytes = buildClassFile({ name: 'p/Api', flags: ACC.PUBLIC | ACC.INTERFACE | ACC.ABSTRACT });
    const padded = new Uint8Array(bytes.length + 8);
    padded.set(bytes, 4);

    expect(readClassFile(padded.subarray(4, 4 + bytes.length)).binaryName).toBe('p.Api');
  });

  it('rejects module descriptors', () => {
    const bytes = buildClassFile({ name: 'module-info', flags: ACC.MODULE, superName: null });

    expect(() => readClassFile(bytes)).toThrow("'module-info' is a module descriptor, not a type");
  });

  it('reports malformed method descriptors', () => {
    const bytes = buildClassFile({
      name: 'p/Bad',
      flags: ACC.PUBLIC | ACC.SUPER,
      methods: [{ flags: ACC.PUBLIC, name: 'broken', descriptor: '(Q)V' }],
    });

    expect(() => readClassFile(bytes)).toThrow(
      "Method 'broken' of 'p.Bad': Invalid descriptor '(Q)V': unexpected 'Q' at 1"
    );
  });
});

describe('decodeModifiedUtf8', () => {
  it('decodes one-, two- and three-byte forms', () => {
    expect(decodeModifiedUtf8(Uint8Array.from([0x41, 0xc3, 0xa9, 0xe2, 0x82, 0xac]))).toBe('Aé€');
  });

  it('decodes the two-byte encoding of NUL', () => {
    expect(decodeModifiedUtf8(Uint8Array.from([0xc0, 0x80]))).toBe('\u0000');
  });

  it('decodes separately encoded surrogates', () => {
    expect(decodeModifiedUtf8(Uint8Array.from([0xed, 0xa0, 0xbd, 0xed, 0xb8, 0x80]))).toBe('😀');
  });

  it('rejects raw NUL bytes and truncated sequences', () => {
    expect(() => decodeModifiedUtf8(Uint8Array.from([0x41, 0x00]))).toThrow('Null byte in modified UTF-8 string');
    expect(() => decodeModifiedUtf8(Uint8Array.from([0xc3]))).toThrow('Malformed modified UTF-8 continuation byte');
  });

  it('decodes what the encoder produced', () => {
    const text = 'Größe\u0000𝒳';
    expect(decodeModifiedUtf8(Uint8Array.from(encodeModifiedUtf8(text)))).toBe(text);
  });
});
