import { describe, expect, it } from 'vitest';
import {
  InvalidDescriptorError,
  binaryNameFromInternal,
  canonicalFromBinary,
  internalNameFromBinary,
  isArrayTypeName,
  isPrimitiveTypeName,
  packageOf,
  parseFieldDescriptor,
  parseMethodDescriptor,
  simpleNameOf,
} from './type-names.js';
import { ACC, CONSTRUCTOR_MODIFIER_MASK, METHOD_MODIFIER_MASK, modifiersFromFlags } from './access-flags.js';

describe('name conversions', () => {
  it('converts between internal and binary names', () => {
    expect(binaryNameFromInternal('java/util/Map$Entry')).toBe('java.util.Map$Entry');
    expect(internalNameFromBinary('java.util.Map$Entry')).toBe('java/util/Map$Entry');
  });

  it('splits package and simple names', () => {
    expect(packageOf('java.util.Map$Entry')).toBe('java.util');
    expect(packageOf('Marker')).toBe('');
    expect(simpleNameOf('java.util.Map.Entry')).toBe('Entry');
    expect(simpleNameOf('Marker')).toBe('Marker');
  });

  it('approximates canonical names from binary names', () => {
    expect(canonicalFromBinary('java.util.Map$Entry')).toBe('java.util.Map.Entry');
  });

  it('recognizes primitive and array type names', () => {
    expect(isPrimitiveTypeName('boolean')).toBe(true);
    expect(isPrimitiveTypeName('void')).toBe(true);
    expect(isPrimitiveTypeName('java.lang.Integer')).toBe(false);
    expect(isArrayTypeName('int[][]')).toBe(true);
    expect(isArrayTypeName('[J')).toBe(true);
    expect(isArrayTypeName('java.util.List')).toBe(false);
  });
});

describe('parseFieldDescriptor', () => {
  it.each([
    ['I', 'int'],
    ['Z', 'boolean'],
    ['[[J', 'long[][]'],
    ['Ljava/lang/String;', 'java.lang.String'],
    ['[Ljava/util/Map$Entry;', 'java.util.Map.Entry[]'],
  ])('parses %s as %s', (descriptor, expected) => {
    expect(parseFieldDescriptor(descriptor)).toBe(expected);
  });

  it('passes class names through the resolver', () => {
    expect(parseFieldDescriptor('Lp/Outer$1Local;', (name) => `<${name}>`)).toBe('<p.Outer$1Local>');
  });

  it.each([
    ['V', "Invalid descriptor 'V': not a single field type"],
    ['II', "Invalid descriptor 'II': not a single field type"],
    ['[V', "Invalid descriptor '[V': unexpected 'V' at 1"],
    ['Ljava/lang/String', "Invalid descriptor 'Ljava/lang/String': unterminated class name at 0"],
    ['', "Invalid descriptor '': unexpected end"],
  ])('rejects %j', (descriptor, message) => {
    expect(() => parseFieldDescriptor(descriptor)).toThrow(message);
  });
});

describe('parseMethodDescriptor', () => {
  it('parses parameters and the return type', () => {
    expect(parseMethodDescriptor('(I[Ljava/lang/String;D)Ljava/lang/Object;')).toEqual({
      parameterTypes: ['int', 'java.lang.String[]', 'double'],
      returnType: 'java.lang.Object',
    });
  });

  it('parses void methods without parameters', () => {
    expect(parseMethodDescriptor('()V')).toEqual({ parameterTypes: [], returnType: 'void' });
  });

  it.each(['I)V', '(I', '(V)V', '()VV'])('rejects %j', (descriptor) => {
    expect(() => parseMethodDescriptor(descriptor)).toThrow(InvalidDescriptorError);
  });
});

describe('modifiersFromFlags', () => {
  it('drops bits outside the mask', () => {
    expect(modifiersFromFlags(ACC.PUBLIC | ACC.ABSTRACT | ACC.VARARGS | ACC.BRIDGE, METHOD_MODIFIER_MASK)).toEqual([
      'public',
      'abstract',
    ]);
    expect(modifiersFromFlags(ACC.PRIVATE | ACC.VARARGS, CONSTRUCTOR_MODIFIER_MASK)).toEqual(['private']);
  });
});
