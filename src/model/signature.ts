/**
 * Method signature identity.
 *
 * Two declarations are the same signature when their name, ordered parameter
 * types and return type match. Modifiers, exceptions and parameter names are
 * payload, never identity.
 *
 * @packageDocumentation
 */

import type { MethodDeclaration } from './types.js';

/**
 * Value type keyed on (name, parameter types, return type).
 */
export class MethodSignature {
  public readonly name: string;
  public readonly parameterTypes: readonly string[];
  public readonly returnType: string;
  /** Canonical text form, e.g. `compare(java.lang.Object,java.lang.Object)int`. */
  public readonly key: string;

  constructor(name: string, parameterTypes: readonly string[], returnType: string) {
    this.name = name;
    this.parameterTypes = [...parameterTypes];
    this.returnType = returnType;
    this.key = `${name}(${parameterTypes.join(',')})${returnType}`;
  }

  /**
   * Creates the signature of a declared method.
   */
  static of(method: MethodDeclaration): MethodSignature {
    return new MethodSignature(
      method.name,
      method.parameters.map((parameter) => parameter.type),
      method.returnType
    );
  }

  equals(other: MethodSignature): boolean {
    return this.key === other.key;
  }

  /**
   * Orders by name, then parameter-type text, then return type.
   */
  compareTo(other: MethodSignature): number {
    return (
      compareText(this.name, other.name) ||
      compareText(this.parameterTypes.join(','), other.parameterTypes.join(',')) ||
      compareText(this.returnType, other.returnType)
    );
  }

  toString(): string {
    return `${this.returnType} ${this.name}(${this.parameterTypes.join(', ')})`;
  }
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Map keyed by signature identity. Iteration follows insertion order.
 */
export class SignatureMap<T> {
  private readonly entries = new Map<string, { signature: MethodSignature; value: T }>();

  get size(): number {
    return this.entries.size;
  }

  has(signature: MethodSignature): boolean {
    return this.entries.has(signature.key);
  }

  get(signature: MethodSignature): T | undefined {
    return this.entries.get(signature.key)?.value;
  }

  set(signature: MethodSignature, value: T): this {
    this.entries.set(signature.key, { signature, value });
    return this;
  }

  delete(signature: MethodSignature): boolean {
    return this.entries.delete(signature.key);
  }

  signatures(): MethodSignature[] {
    return [...this.entries.values()].map((entry) => entry.signature);
  }

  values(): T[] {
    return [...this.entries.values()].map((entry) => entry.value);
  }

  *[Symbol.iterator](): IterableIterator<[MethodSignature, T]> {
    for (const { signature, value } of this.entries.values()) {
      yield [signature, value];
    }
  }
}
