/**
 * Type snapshot model shared by introspection, resolution and rendering.
 *
 * @packageDocumentation
 */

export {
  ROOT_TYPE,
  MODIFIER_ORDER,
  hasModifier,
  normalizeModifiers,
  subjectLevel,
} from './types.js';
export type {
  ConstructorDeclaration,
  MethodDeclaration,
  Modifier,
  ParameterDeclaration,
  TypeDescriptor,
  TypeKind,
  TypeLevel,
} from './types.js';

export { MethodSignature, SignatureMap } from './signature.js';

export { ImplementorError, isImplementorError, toError } from './errors.js';
export type { ImplementorErrorCode } from './errors.js';
