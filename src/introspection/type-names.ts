/**
 * Conversions between JVM descriptors, binary names and source type names.
 *
 * @packageDocumentation
 */

const PRIMITIVE_DESCRIPTORS: Readonly<Record<string, string>> = {
  B: 'byte',
  C: 'char',
  D: 'double',
  F: 'float',
  I: 'int',
  J: 'long',
  S: 'short',
  Z: 'boolean',
  V: 'void',
};

/** Source names of the primitive types, `void` included. */
export const PRIMITIVE_TYPE_NAMES: ReadonlySet<string> = new Set(Object.values(PRIMITIVE_DESCRIPTORS));

/**
 * Maps a binary class name to the name written in source.
 */
export type NameResolver = (binaryName: string) => string;

/**
 * Error thrown when a descriptor cannot be parsed.
 */
export class InvalidDescriptorError extends Error {
  /** The descriptor that failed to parse. */
  public readonly descriptor: string;

  constructor(descriptor: string, reason: string) {
    super(`Invalid descriptor '${descriptor}': ${reason}`);
    this.name = 'InvalidDescriptorError';
    this.descriptor = descriptor;
  }
}

/**
 * Converts an internal name (`java/lang/String`) to a binary name (`java.lang.String`).
 */
export function binaryNameFromInternal(internalName: string): string {
  return internalName.replace(/\//g, '.');
}

/**
 * Converts a binary name (`java.lang.String`) to an internal name (`java/lang/String`).
 */
export function internalNameFromBinary(binaryName: string): string {
  return binaryName.replace(/\./g, '/');
}

/**
 * Returns the package part of a binary name, or `''` for the default package.
 */
export function packageOf(binaryName: string): string {
  const index = binaryName.lastIndexOf('.');
  return index === -1 ? '' : binaryName.slice(0, index);
}

/**
 * Best-effort canonical name when no nesting information is available.
 */
export function canonicalFromBinary(binaryName: string): string {
  return binaryName.replace(/\$/g, '.');
}

/**
 * Returns the last dotted segment of a canonical name.
 */
export function simpleNameOf(canonicalName: string): string {
  const index = canonicalName.lastIndexOf('.');
  return index === -1 ? canonicalName : canonicalName.slice(index + 1);
}

/**
 * Returns true for `int`, `boolean`, `void` and the other primitive names.
 */
export function isPrimitiveTypeName(name: string): boolean {
  return PRIMITIVE_TYPE_NAMES.has(name);
}

/**
 * Returns true for source array types (`int[]`) and array descriptors (`[I`).
 */
export function isArrayTypeName(name: string): boolean {
  return name.endsWith('[]') || name.startsWith('[');
}

/**
 * Reads one field type starting at `start`.
 *
 * @returns The source type and the index just past it.
 */
function readType(
  descriptor: string,
  start: number,
  resolve: NameResolver
): { type: string; end: number } {
  let index = start;
  let dimensions = 0;
  while (descriptor.charAt(index) === '[') {
    dimensions++;
    index++;
  }

  const tag = descriptor.charAt(index);
  let base: string;
  if (tag === 'L') {
    const semicolon = descriptor.indexOf(';', index);
    if (semicolon === -1 || semicolon === index + 1) {
      throw new InvalidDescriptorError(descriptor, `unterminated class name at ${String(index)}`);
    }
    base = resolve(binaryNameFromInternal(descriptor.slice(index + 1, semicolon)));
    index = semicolon + 1;
  } else {
    const primitive = PRIMITIVE_DESCRIPTORS[tag];
    if (primitive === undefined || (primitive === 'void' && dimensions > 0)) {
      throw new InvalidDescriptorError(
        descriptor,
        tag === '' ? 'unexpected end' : `unexpected '${tag}' at ${String(index)}`
      );
    }
    base = primitive;
    index++;
  }

  return { type: base + '[]'.repeat(dimensions), end: index };
}

/**
 * Converts a field descriptor to a source type name.
 *
 * @example
 * ```typescript
 * parseFieldDescriptor('[Ljava/lang/String;', canonicalFromBinary); // 'java.lang.String[]'
 * parseFieldDescriptor('J', canonicalFromBinary);                   // 'long'
 * ```
 */
export function parseFieldDescriptor(
  descriptor: string,
  resolve: NameResolver = canonicalFromBinary
): string {
  const { type, end } = readType(descriptor, 0, resolve);
  if (end !== descriptor.length || type === 'void') {
    throw new InvalidDescriptorError(descriptor, 'not a single field type');
  }
  return type;
}

/**
 * Converts a method descriptor to source parameter and return types.
 *
 * @example
 * ```typescript
 * parseMethodDescriptor('(ILjava/lang/String;)V');
 * // { parameterTypes: ['int', 'java.lang.String'], returnType: 'void' }
 * ```
 */
export function parseMethodDescriptor(
  descriptor: string,
  resolve: NameResolver = canonicalFromBinary
): { parameterTypes: string[]; returnType: string } {
  if (!descriptor.startsWith('(')) {
    throw new InvalidDescriptorError(descriptor, "expected '('");
  }

  const parameterTypes: string[] = [];
  let index = 1;
  while (descriptor.charAt(index) !== ')') {
    if (index >= descriptor.length) {
      throw new InvalidDescriptorError(descriptor, "missing ')'");
    }
    const { type, end } = readType(descriptor, index, resolve);
    if (type === 'void') {
      throw new InvalidDescriptorError(descriptor, 'void parameter');
    }
    parameterTypes.push(type);
    index = end;
  }

  const { type: returnType, end } = readType(descriptor, index + 1, resolve);
  if (end !== descriptor.length) {
    throw new InvalidDescriptorError(descriptor, 'trailing characters after return type');
  }

  return { parameterTypes, returnType };
}
