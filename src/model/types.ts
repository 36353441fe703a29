/**
 * Snapshot types describing the structure of a Java type.
 *
 * A {@link TypeDescriptor} is produced once by the introspection layer and is
 * never mutated afterwards; the resolver and synthesizer operate purely over it.
 *
 * @packageDocumentation
 */

/**
 * The fixed root of every class hierarchy. It is never scanned for members.
 */
export const ROOT_TYPE = 'java.lang.Object';

/**
 * Modifier keywords as they appear in Java source.
 */
export type Modifier =
  | 'public'
  | 'protected'
  | 'private'
  | 'abstract'
  | 'static'
  | 'final'
  | 'transient'
  | 'volatile'
  | 'synchronized'
  | 'native'
  | 'strictfp';

/**
 * Canonical order used when modifiers are rendered.
 */
export const MODIFIER_ORDER: readonly Modifier[] = [
  'public',
  'protected',
  'private',
  'abstract',
  'static',
  'final',
  'transient',
  'volatile',
  'synchronized',
  'native',
  'strictfp',
];

/**
 * Whether a type is implemented (`interface`) or extended (`class`).
 */
export type TypeKind = 'class' | 'interface';

/**
 * A single formal parameter.
 */
export interface ParameterDeclaration {
  /** Source-level type, e.g. `java.lang.String[]`. */
  readonly type: string;
  /** Declared name, when the source recorded one. */
  readonly name?: string;
}

/**
 * A constructor declared directly on a type.
 */
export interface ConstructorDeclaration {
  /** Binary name of the declaring type. */
  readonly declaringType: string;
  readonly modifiers: readonly Modifier[];
  readonly parameters: readonly ParameterDeclaration[];
  /** Declared exception types, canonical names. */
  readonly exceptions: readonly string[];
}

/**
 * A method declared directly on a type.
 */
export interface MethodDeclaration {
  /** Binary name of the declaring type. */
  readonly declaringType: string;
  readonly name: string;
  readonly modifiers: readonly Modifier[];
  readonly parameters: readonly ParameterDeclaration[];
  readonly returnType: string;
  readonly exceptions: readonly string[];
}

/**
 * The members one type in the ancestor chain declares itself.
 */
export interface TypeLevel {
  readonly binaryName: string;
  readonly constructors: readonly ConstructorDeclaration[];
  readonly methods: readonly MethodDeclaration[];
}

/**
 * Read-only structural snapshot of a subject type and its hierarchy.
 */
export interface TypeDescriptor {
  /** Name the type is looked up by, e.g. `com.example.Outer$Inner`. */
  readonly binaryName: string;
  /** Canonical name used in source, e.g. `com.example.Outer.Inner`. */
  readonly qualifiedName: string;
  readonly simpleName: string;
  /** Empty string for the default package. */
  readonly packageName: string;
  readonly kind: TypeKind;
  readonly modifiers: readonly Modifier[];
  /**
   * Levels from the subject upwards, stopping before {@link ROOT_TYPE}.
   * For an interface this is the subject alone.
   */
  readonly ancestorChain: readonly TypeLevel[];
  /** Every interface reachable from the subject, binary names. */
  readonly implementedInterfaces: readonly string[];
  /** Public methods reachable through the whole hierarchy. */
  readonly externallyVisibleMethods: readonly MethodDeclaration[];
  /** Class-path entry or catalog origin the subject was loaded from. */
  readonly origin?: string;
}

/**
 * Returns true when `modifiers` contains `modifier`.
 */
export function hasModifier(modifiers: readonly Modifier[], modifier: Modifier): boolean {
  return modifiers.includes(modifier);
}

/**
 * Deduplicates modifiers and puts them in {@link MODIFIER_ORDER}.
 */
export function normalizeModifiers(modifiers: Iterable<Modifier>): Modifier[] {
  const present = new Set(modifiers);
  return MODIFIER_ORDER.filter((modifier) => present.has(modifier));
}

/**
 * Returns the level describing the subject itself.
 */
export function subjectLevel(subject: TypeDescriptor): TypeLevel {
  const level = subject.ancestorChain[0];
  if (level === undefined) {
    throw new Error(`Type descriptor for '${subject.binaryName}' has an empty ancestor chain`);
  }
  return level;
}
