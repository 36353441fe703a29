/**
 * Types for the type introspection layer.
 *
 * @packageDocumentation
 */

import type {
  ConstructorDeclaration,
  MethodDeclaration,
  Modifier,
  TypeKind,
} from '../model/types.js';

/**
 * What one source knows about one type, before the hierarchy is assembled.
 */
export interface RawTypeDeclaration {
  /** e.g. `com.example.Outer$Inner`. */
  readonly binaryName: string;
  /** e.g. `com.example.Outer.Inner`; absent for local and anonymous classes. */
  readonly canonicalName?: string;
  readonly simpleName: string;
  readonly kind: TypeKind;
  readonly modifiers: readonly Modifier[];
  /** Binary name of the superclass; absent for interfaces and the root. */
  readonly superclass?: string;
  /** Binary names of the directly implemented or extended interfaces. */
  readonly interfaces: readonly string[];
  readonly constructors: readonly ConstructorDeclaration[];
  readonly methods: readonly MethodDeclaration[];
  /** Class-path entry or catalog origin this declaration came from. */
  readonly origin?: string;
}

/**
 * A place type declarations can be looked up in.
 */
export interface TypeSource {
  /** Human-readable description used in error messages. */
  readonly description: string;

  /**
   * Looks up a type by binary name.
   *
   * @returns The declaration, or `undefined` when this source does not know the type.
   * @throws When the source knows the type but cannot read it.
   */
  lookup(binaryName: string): Promise<RawTypeDeclaration | undefined>;
}
