/**
 * Picks the constructor a generated class delegates to.
 *
 * @packageDocumentation
 */

import { ImplementorError } from '../model/errors.js';
import { hasModifier, subjectLevel } from '../model/types.js';
import type { ConstructorDeclaration, TypeDescriptor } from '../model/types.js';

/**
 * The constructor selected for delegation.
 */
export type ConstructorChoice = ConstructorDeclaration;

/**
 * Selects the first non-private constructor declared directly on the subject.
 *
 * Inherited constructors are never considered: subclassing has to go through
 * one of the subject's own accessible constructors.
 *
 * @param subject - Introspected snapshot of the subject.
 * @returns The chosen constructor, or `undefined` for interfaces.
 * @throws {ImplementorError} With code `NO_USABLE_CONSTRUCTOR` when the
 *   subject is a class whose constructors are all private.
 */
export function selectConstructor(subject: TypeDescriptor): ConstructorChoice | undefined {
  if (subject.kind === 'interface') {
    return undefined;
  }

  const choice = subjectLevel(subject).constructors.find(
    (constructor) => !hasModifier(constructor.modifiers, 'private')
  );
  if (choice === undefined) {
    throw new ImplementorError(
      `Class '${subject.qualifiedName}' declares no non-private constructor`,
      'NO_USABLE_CONSTRUCTOR'
    );
  }
  return choice;
}
