/**
 * Class-file access flags and their mapping to source modifiers.
 *
 * @packageDocumentation
 */

import { normalizeModifiers } from '../model/types.js';
import type { Modifier } from '../model/types.js';

/** Access flag bits shared by classes, nested classes and methods. */
export const ACC = {
  PUBLIC: 0x0001,
  PRIVATE: 0x0002,
  PROTECTED: 0x0004,
  STATIC: 0x0008,
  FINAL: 0x0010,
  SYNCHRONIZED: 0x0020,
  SUPER: 0x0020,
  BRIDGE: 0x0040,
  VARARGS: 0x0080,
  NATIVE: 0x0100,
  INTERFACE: 0x0200,
  ABSTRACT: 0x0400,
  STRICT: 0x0800,
  SYNTHETIC: 0x1000,
  ANNOTATION: 0x2000,
  ENUM: 0x4000,
  MODULE: 0x8000,
} as const;

const FLAG_MODIFIERS: readonly (readonly [number, Modifier])[] = [
  [ACC.PUBLIC, 'public'],
  [ACC.PROTECTED, 'protected'],
  [ACC.PRIVATE, 'private'],
  [ACC.ABSTRACT, 'abstract'],
  [ACC.STATIC, 'static'],
  [ACC.FINAL, 'final'],
  [ACC.SYNCHRONIZED, 'synchronized'],
  [ACC.NATIVE, 'native'],
  [ACC.STRICT, 'strictfp'],
];

/** Bits that carry a class or nested-class modifier. */
export const CLASS_MODIFIER_MASK =
  ACC.PUBLIC | ACC.PROTECTED | ACC.PRIVATE | ACC.ABSTRACT | ACC.STATIC | ACC.FINAL | ACC.STRICT;

/** Bits that carry a method modifier. BRIDGE and VARARGS are excluded. */
export const METHOD_MODIFIER_MASK =
  ACC.PUBLIC |
  ACC.PROTECTED |
  ACC.PRIVATE |
  ACC.ABSTRACT |
  ACC.STATIC |
  ACC.FINAL |
  ACC.SYNCHRONIZED |
  ACC.NATIVE |
  ACC.STRICT;

/** Bits that carry a constructor modifier. */
export const CONSTRUCTOR_MODIFIER_MASK = ACC.PUBLIC | ACC.PROTECTED | ACC.PRIVATE;

/**
 * Converts access flags to modifiers after applying `mask`.
 *
 * @example
 * ```typescript
 * modifiersFromFlags(ACC.PUBLIC | ACC.ABSTRACT | ACC.VARARGS, METHOD_MODIFIER_MASK);
 * // ['public', 'abstract']
 * ```
 */
export function modifiersFromFlags(flags: number, mask: number): Modifier[] {
  const masked = flags & mask;
  return normalizeModifiers(
    FLAG_MODIFIERS.filter(([bit]) => (masked & bit) !== 0).map(([, modifier]) => modifier)
  );
}

/**
 * Returns true when every bit of `flag` is set in `flags`.
 */
export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) === flag;
}
