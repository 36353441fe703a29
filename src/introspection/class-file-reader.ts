/**
 * Reader for compiled `.class` files.
 *
 * Extracts the parts of a class file that describe a type's shape: names,
 * access flags, supertypes, constructors and methods with their thrown
 * exceptions and recorded parameter names. Fields and code are skipped.
 *
 * @packageDocumentation
 */

import type { ConstructorDeclaration, MethodDeclaration, ParameterDeclaration } from '../model/types.js';
import {
  ACC,
  CLASS_MODIFIER_MASK,
  CONSTRUCTOR_MODIFIER_MASK,
  METHOD_MODIFIER_MASK,
  hasFlag,
  modifiersFromFlags,
} from './access-flags.js';
import {
  InvalidDescriptorError,
  binaryNameFromInternal,
  canonicalFromBinary,
  parseMethodDescriptor,
  simpleNameOf,
} from './type-names.js';
import type { NameResolver } from './type-names.js';
import type { RawTypeDeclaration } from './types.js';

/** The four bytes every class file starts with. */
export const CLASS_FILE_MAGIC = 0xcafebabe;

/**
 * Error thrown when bytes are not a well-formed class file.
 */
export class ClassFormatError extends Error {
  /** Byte offset at which the problem was detected, when known. */
  public readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (at byte ${String(offset)})`);
    this.name = 'ClassFormatError';
    this.offset = offset;
  }
}

const CONSTANT_TAG = {
  UTF8: 1,
  INTEGER: 3,
  FLOAT: 4,
  LONG: 5,
  DOUBLE: 6,
  CLASS: 7,
  STRING: 8,
  FIELD_REF: 9,
  METHOD_REF: 10,
  INTERFACE_METHOD_REF: 11,
  NAME_AND_TYPE: 12,
  METHOD_HANDLE: 15,
  METHOD_TYPE: 16,
  DYNAMIC: 17,
  INVOKE_DYNAMIC: 18,
  MODULE: 19,
  PACKAGE: 20,
} as const;

/** Payload size of every fixed-width constant kind. */
const FIXED_CONSTANT_SIZE: ReadonlyMap<number, number> = new Map([
  [CONSTANT_TAG.INTEGER, 4],
  [CONSTANT_TAG.FLOAT, 4],
  [CONSTANT_TAG.LONG, 8],
  [CONSTANT_TAG.DOUBLE, 8],
  [CONSTANT_TAG.STRING, 2],
  [CONSTANT_TAG.FIELD_REF, 4],
  [CONSTANT_TAG.METHOD_REF, 4],
  [CONSTANT_TAG.INTERFACE_METHOD_REF, 4],
  [CONSTANT_TAG.NAME_AND_TYPE, 4],
  [CONSTANT_TAG.METHOD_HANDLE, 3],
  [CONSTANT_TAG.METHOD_TYPE, 2],
  [CONSTANT_TAG.DYNAMIC, 4],
  [CONSTANT_TAG.INVOKE_DYNAMIC, 4],
  [CONSTANT_TAG.MODULE, 2],
  [CONSTANT_TAG.PACKAGE, 2],
]);

type ConstantEntry =
  | { readonly tag: 'utf8'; readonly value: string }
  | { readonly tag: 'class'; readonly nameIndex: number }
  | { readonly tag: 'other' };

interface InnerClassEntry {
  readonly innerBinaryName: string;
  readonly outerBinaryName: string | undefined;
  readonly innerSimpleName: string | undefined;
  readonly flags: number;
}

interface MemberInfo {
  readonly flags: number;
  readonly name: string;
  readonly descriptor: string;
  readonly exceptions: readonly string[];
  readonly parameterNames: readonly (string | undefined)[] | undefined;
}

/**
 * Big-endian cursor over a byte array.
 */
class ByteReader {
  private readonly view: DataView;
  private position = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.position;
  }

  u1(): number {
    this.require(1);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  u2(): number {
    this.require(2);
    const value = this.view.getUint16(this.position);
    this.position += 2;
    return value;
  }

  u4(): number {
    this.require(4);
    const value = this.view.getUint32(this.position);
    this.position += 4;
    return value;
  }

  take(length: number): Uint8Array {
    this.require(length);
    const slice = this.bytes.subarray(this.position, this.position + length);
    this.position += length;
    return slice;
  }

  skip(length: number): void {
    this.require(length);
    this.position += length;
  }

  private require(length: number): void {
    if (this.remaining < length) {
      throw new ClassFormatError('Unexpected end of class file', this.position);
    }
  }
}

/**
 * Decodes the modified UTF-8 used by class-file string constants.
 *
 * Surrogate pairs arrive as two separately encoded code units, so decoding
 * produces UTF-16 code units directly.
 */
export function decodeModifiedUtf8(bytes: Uint8Array): string {
  const units: number[] = [];
  let index = 0;
  const next = (): number => {
    const byte = bytes[index++];
    if (byte === undefined || (byte & 0xc0) !== 0x80) {
      throw new ClassFormatError('Malformed modified UTF-8 continuation byte');
    }
    return byte & 0x3f;
  };

  while (index < bytes.length) {
    const first = bytes[index++] ?? 0;
    if (first === 0) {
      throw new ClassFormatError('Null byte in modified UTF-8 string');
    }
    if (first < 0x80) {
      units.push(first);
    } else if ((first & 0xe0) === 0xc0) {
      units.push(((first & 0x1f) << 6) | next());
    } else if ((first & 0xf0) === 0xe0) {
      const second = next();
      units.push(((first & 0x0f) << 12) | (second << 6) | next());
    } else {
      throw new ClassFormatError(`Malformed modified UTF-8 lead byte 0x${first.toString(16)}`);
    }
  }

  let result = '';
  for (let start = 0; start < units.length; start += 4096) {
    result += String.fromCharCode(...units.slice(start, start + 4096));
  }
  return result;
}

class ConstantPool {
  private readonly entries: (ConstantEntry | undefined)[];

  constructor(reader: ByteReader) {
    const count = reader.u2();
    this.entries = new Array<ConstantEntry | undefined>(count).fill(undefined);

    for (let index = 1; index < count; index++) {
      const offset = reader.offset;
      const tag = reader.u1();
      if (tag === CONSTANT_TAG.UTF8) {
        const length = reader.u2();
        this.entries[index] = { tag: 'utf8', value: decodeModifiedUtf8(reader.take(length)) };
      } else if (tag === CONSTANT_TAG.CLASS) {
        this.entries[index] = { tag: 'class', nameIndex: reader.u2() };
      } else {
        const size = FIXED_CONSTANT_SIZE.get(tag);
        if (size === undefined) {
          throw new ClassFormatError(`Unknown constant pool tag ${String(tag)}`, offset);
        }
        reader.skip(size);
        this.entries[index] = { tag: 'other' };
        if (tag === CONSTANT_TAG.LONG || tag === CONSTANT_TAG.DOUBLE) {
          index++;
        }
      }
    }
  }

  utf8(index: number): string {
    const entry = this.entries[index];
    if (entry?.tag !== 'utf8') {
      throw new ClassFormatError(`Constant pool entry #${String(index)} is not a UTF-8 constant`);
    }
    return entry.value;
  }

  optionalUtf8(index: number): string | undefined {
    return index === 0 ? undefined : this.utf8(index);
  }

  /** Returns the binary name of a class constant. */
  className(index: number): string {
    const entry = this.entries[index];
    if (entry?.tag !== 'class') {
      throw new ClassFormatError(`Constant pool entry #${String(index)} is not a class constant`);
    }
    return binaryNameFromInternal(this.utf8(entry.nameIndex));
  }

  optionalClassName(index: number): string | undefined {
    return index === 0 ? undefined : this.className(index);
  }
}

function readInnerClasses(reader: ByteReader, pool: ConstantPool): InnerClassEntry[] {
  const count = reader.u2();
  const entries: InnerClassEntry[] = [];
  for (let i = 0; i < count; i++) {
    entries.push({
      innerBinaryName: pool.className(reader.u2()),
      outerBinaryName: pool.optionalClassName(reader.u2()),
      innerSimpleName: pool.optionalUtf8(reader.u2()),
      flags: reader.u2(),
    });
  }
  return entries;
}

function readMember(reader: ByteReader, pool: ConstantPool): MemberInfo {
  const flags = reader.u2();
  const name = pool.utf8(reader.u2());
  const descriptor = pool.utf8(reader.u2());
  const exceptions: string[] = [];
  let parameterNames: (string | undefined)[] | undefined;

  const attributeCount = reader.u2();
  for (let i = 0; i < attributeCount; i++) {
    const attributeName = pool.utf8(reader.u2());
    const length = reader.u4();
    if (attributeName === 'Exceptions') {
      const count = reader.u2();
      for (let j = 0; j < count; j++) {
        exceptions.push(pool.className(reader.u2()));
      }
    } else if (attributeName === 'MethodParameters') {
      const count = reader.u1();
      parameterNames = [];
      for (let j = 0; j < count; j++) {
        parameterNames.push(pool.optionalUtf8(reader.u2()));
        reader.u2();
      }
    } else {
      reader.skip(length);
    }
  }

  return { flags, name, descriptor, exceptions, parameterNames };
}

function skipAttributes(reader: ByteReader): void {
  const count = reader.u2();
  for (let i = 0; i < count; i++) {
    reader.u2();
    reader.skip(reader.u4());
  }
}

/**
 * Builds the binary-to-canonical mapping the InnerClasses table implies.
 * Local and anonymous classes map to `undefined`.
 */
function canonicalNames(innerClasses: readonly InnerClassEntry[]): Map<string, string | undefined> {
  const byInner = new Map(innerClasses.map((entry) => [entry.innerBinaryName, entry]));
  const resolved = new Map<string, string | undefined>();

  const resolve = (binaryName: string, depth: number): string | undefined => {
    if (resolved.has(binaryName)) {
      return resolved.get(binaryName);
    }
    const entry = byInner.get(binaryName);
    let canonical: string | undefined;
    if (entry === undefined) {
      canonical = binaryName;
    } else if (
      entry.outerBinaryName === undefined ||
      entry.innerSimpleName === undefined ||
      depth > innerClasses.length
    ) {
      canonical = undefined;
    } else {
      const outer = resolve(entry.outerBinaryName, depth + 1);
      canonical = outer === undefined ? undefined : `${outer}.${entry.innerSimpleName}`;
    }
    resolved.set(binaryName, canonical);
    return canonical;
  };

  for (const entry of innerClasses) {
    resolve(entry.innerBinaryName, 0);
  }
  return resolved;
}

function toParameters(
  types: readonly string[],
  names: readonly (string | undefined)[] | undefined
): ParameterDeclaration[] {
  const usable = names !== undefined && names.length === types.length ? names : undefined;
  return types.map((type, index) => {
    const name = usable?.[index];
    return name === undefined ? { type } : { type, name };
  });
}

/**
 * Parses a class file into a raw type declaration.
 *
 * @param bytes - Complete class file content.
 * @param origin - Class-path entry the bytes were loaded from.
 * @throws {ClassFormatError} If the bytes are not a well-formed class file.
 *
 * @example
 * ```typescript
 * const declaration = readClassFile(await safeReadBytes('out/com/example/Shape.class'));
 * declaration.binaryName; // 'com.example.Shape'
 * ```
 */
export function readClassFile(bytes: Uint8Array, origin?: string): RawTypeDeclaration {
  const reader = new ByteReader(bytes);

  const magic = reader.u4();
  if (magic !== CLASS_FILE_MAGIC) {
    throw new ClassFormatError(`Bad magic number 0x${magic.toString(16)}`, 0);
  }
  reader.u2();
  reader.u2();

  const pool = new ConstantPool(reader);
  const accessFlags = reader.u2();
  const binaryName = pool.className(reader.u2());
  const superclass = pool.optionalClassName(reader.u2());

  if (hasFlag(accessFlags, ACC.MODULE)) {
    throw new ClassFormatError(`'${binaryName}' is a module descriptor, not a type`);
  }

  const interfaces: string[] = [];
  const interfaceCount = reader.u2();
  for (let i = 0; i < interfaceCount; i++) {
    interfaces.push(pool.className(reader.u2()));
  }

  const fieldCount = reader.u2();
  for (let i = 0; i < fieldCount; i++) {
    reader.skip(6);
    skipAttributes(reader);
  }

  const members: MemberInfo[] = [];
  const methodCount = reader.u2();
  for (let i = 0; i < methodCount; i++) {
    members.push(readMember(reader, pool));
  }

  let innerClasses: InnerClassEntry[] = [];
  const attributeCount = reader.u2();
  for (let i = 0; i < attributeCount; i++) {
    const attributeName = pool.utf8(reader.u2());
    const length = reader.u4();
    if (attributeName === 'InnerClasses') {
      innerClasses = readInnerClasses(reader, pool);
    } else {
      reader.skip(length);
    }
  }

  const canonical = canonicalNames(innerClasses);
  const resolveName: NameResolver = (name) => canonical.get(name) ?? canonicalFromBinary(name);
  const self = innerClasses.find((entry) => entry.innerBinaryName === binaryName);
  const canonicalName = canonical.has(binaryName) ? canonical.get(binaryName) : binaryName;
  const typeFlags = self === undefined ? accessFlags : self.flags;
  const isInterface = hasFlag(accessFlags, ACC.INTERFACE);

  const constructors: ConstructorDeclaration[] = [];
  const methods: MethodDeclaration[] = [];
  for (const member of members) {
    // Bridges are kept as the concrete erased overrides of supertype methods.
    const isBridge = hasFlag(member.flags, ACC.BRIDGE);
    if (member.name === '<clinit>' || (hasFlag(member.flags, ACC.SYNTHETIC) && !isBridge)) {
      continue;
    }

    let signature: { parameterTypes: string[]; returnType: string };
    try {
      signature = parseMethodDescriptor(member.descriptor, resolveName);
    } catch (error) {
      if (error instanceof InvalidDescriptorError) {
        throw new ClassFormatError(`Method '${member.name}' of '${binaryName}': ${error.message}`);
      }
      throw error;
    }

    const parameters = toParameters(signature.parameterTypes, member.parameterNames);
    const exceptions = member.exceptions.map(resolveName);
    if (member.name === '<init>') {
      constructors.push({
        declaringType: binaryName,
        modifiers: modifiersFromFlags(member.flags, CONSTRUCTOR_MODIFIER_MASK),
        parameters,
        exceptions,
      });
    } else {
      methods.push({
        declaringType: binaryName,
        name: member.name,
        modifiers: modifiersFromFlags(member.flags, METHOD_MODIFIER_MASK),
        parameters,
        returnType: signature.returnType,
        exceptions,
      });
    }
  }

  const simpleName =
    self === undefined ? simpleNameOf(binaryName) : (self.innerSimpleName ?? '');

  return {
    binaryName,
    ...(canonicalName !== undefined ? { canonicalName } : {}),
    simpleName,
    kind: isInterface ? 'interface' : 'class',
    modifiers: modifiersFromFlags(typeFlags, CLASS_MODIFIER_MASK),
    ...(superclass !== undefined && !isInterface ? { superclass } : {}),
    interfaces,
    constructors,
    methods,
    ...(origin !== undefined ? { origin } : {}),
  };
}
