/**
 * Method obligation resolver.
 *
 * Computes the exact set of method signatures a concrete implementation of a
 * subject type must define: abstract candidates from the visible member set and
 * from every level of the class chain, minus every signature a final
 * declaration in the chain already satisfies.
 *
 * @packageDocumentation
 */

import { MethodSignature, SignatureMap } from '../model/signature.js';
import { hasModifier, normalizeModifiers } from '../model/types.js';
import type { MethodDeclaration, Modifier, TypeDescriptor } from '../model/types.js';

/**
 * A signature the generated class has to define.
 */
export interface MethodObligation {
  readonly signature: MethodSignature;
  /** Declaration parameter names are taken from. */
  readonly representative: MethodDeclaration;
  /** Widest visibility among all occurrences plus the representative's other modifiers. */
  readonly modifiers: readonly Modifier[];
  /** Exceptions every occurrence declares. */
  readonly exceptions: readonly string[];
  /** Binary names of every type that declares this signature abstractly. */
  readonly declaringTypes: readonly string[];
}

/**
 * Warning codes raised during resolution.
 */
export type ResolutionWarningCode = 'CONFLICTING_THROWS';

/**
 * A non-fatal observation about the resolved obligations.
 */
export interface ResolutionWarning {
  readonly code: ResolutionWarningCode;
  /** Signature key the warning is about. */
  readonly signature: string;
  readonly message: string;
  readonly declaringTypes: readonly string[];
}

/**
 * Result of resolving obligations for a subject.
 */
export interface ObligationResolution {
  /** Signature-unique obligations sorted by name, parameter types, return type. */
  readonly obligations: readonly MethodObligation[];
  readonly warnings: readonly ResolutionWarning[];
}

const VISIBILITY_RANK: Readonly<Record<'public' | 'protected' | 'package' | 'private', number>> = {
  public: 3,
  protected: 2,
  package: 1,
  private: 0,
};

type Visibility = keyof typeof VISIBILITY_RANK;

function visibilityOf(modifiers: readonly Modifier[]): Visibility {
  if (hasModifier(modifiers, 'public')) {
    return 'public';
  }
  if (hasModifier(modifiers, 'protected')) {
    return 'protected';
  }
  if (hasModifier(modifiers, 'private')) {
    return 'private';
  }
  return 'package';
}

function isVisibilityModifier(modifier: Modifier): boolean {
  return modifier === 'public' || modifier === 'protected' || modifier === 'private';
}

/**
 * Collects abstract candidates keyed by signature, keeping every distinct
 * declaring occurrence.
 */
function collectCandidates(subject: TypeDescriptor): SignatureMap<MethodDeclaration[]> {
  const candidates = new SignatureMap<MethodDeclaration[]>();

  const add = (method: MethodDeclaration): void => {
    if (!hasModifier(method.modifiers, 'abstract')) {
      return;
    }
    const signature = MethodSignature.of(method);
    const occurrences = candidates.get(signature);
    if (occurrences === undefined) {
      candidates.set(signature, [method]);
    } else if (!occurrences.some((existing) => existing.declaringType === method.declaringType)) {
      occurrences.push(method);
    }
  };

  subject.externallyVisibleMethods.forEach(add);
  for (const level of subject.ancestorChain) {
    level.methods.forEach(add);
  }

  return candidates;
}

/**
 * Collects the signatures of final methods declared anywhere in the chain.
 */
function collectSuppressors(subject: TypeDescriptor): SignatureMap<MethodDeclaration> {
  const suppressors = new SignatureMap<MethodDeclaration>();
  for (const level of subject.ancestorChain) {
    for (const method of level.methods) {
      if (hasModifier(method.modifiers, 'final')) {
        suppressors.set(MethodSignature.of(method), method);
      }
    }
  }
  return suppressors;
}

function sameExceptions(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((exception) => right.has(exception));
}

/**
 * Merges equal-signature occurrences into one obligation.
 */
function mergeOccurrences(
  signature: MethodSignature,
  occurrences: readonly MethodDeclaration[],
  warnings: ResolutionWarning[]
): MethodObligation {
  const [representative, ...others] = occurrences;
  if (representative === undefined) {
    throw new Error(`No declaration recorded for ${signature.key}`);
  }

  let widest = visibilityOf(representative.modifiers);
  for (const other of others) {
    const visibility = visibilityOf(other.modifiers);
    if (VISIBILITY_RANK[visibility] > VISIBILITY_RANK[widest]) {
      widest = visibility;
    }
  }
  const modifiers = representative.modifiers.filter((modifier) => !isVisibilityModifier(modifier));
  if (widest !== 'package') {
    modifiers.push(widest);
  }

  const exceptions = representative.exceptions.filter((exception) =>
    others.every((other) => other.exceptions.includes(exception))
  );
  const declaringTypes = occurrences.map((occurrence) => occurrence.declaringType);

  if (others.some((other) => !sameExceptions(other.exceptions, representative.exceptions))) {
    warnings.push({
      code: 'CONFLICTING_THROWS',
      signature: signature.key,
      message:
        `Declarations of ${signature.toString()} in ${declaringTypes.join(', ')} disagree on thrown exceptions; ` +
        `keeping the common subset [${exceptions.join(', ')}]`,
      declaringTypes,
    });
  }

  return {
    signature,
    representative,
    modifiers: normalizeModifiers(modifiers),
    exceptions,
    declaringTypes,
  };
}

/**
 * Resolves the method obligations of a subject type.
 *
 * @param subject - Introspected snapshot of the subject.
 * @returns Signature-unique obligations in deterministic order, with warnings
 *   for signatures whose declarations disagree on thrown exceptions.
 *
 * @example
 * ```typescript
 * const { obligations } = resolveObligations(descriptor);
 * for (const obligation of obligations) {
 *   console.log(obligation.signature.toString());
 * }
 * ```
 */
export function resolveObligations(subject: TypeDescriptor): ObligationResolution {
  const candidates = collectCandidates(subject);
  const suppressors = collectSuppressors(subject);
  const warnings: ResolutionWarning[] = [];

  const retained = candidates
    .signatures()
    .filter((signature) => !suppressors.has(signature))
    .sort((a, b) => a.compareTo(b));

  const obligations = retained.map((signature) =>
    mergeOccurrences(signature, candidates.get(signature) ?? [], warnings)
  );

  return { obligations, warnings };
}
