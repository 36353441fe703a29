/**
 * Type introspection: class files, class paths, catalogs and snapshots.
 *
 * @packageDocumentation
 */

export type { RawTypeDeclaration, TypeSource } from './types.js';

export {
  ACC,
  CLASS_MODIFIER_MASK,
  CONSTRUCTOR_MODIFIER_MASK,
  METHOD_MODIFIER_MASK,
  hasFlag,
  modifiersFromFlags,
} from './access-flags.js';

export {
  InvalidDescriptorError,
  PRIMITIVE_TYPE_NAMES,
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
export type { NameResolver } from './type-names.js';

export { CLASS_FILE_MAGIC, ClassFormatError, decodeModifiedUtf8, readClassFile } from './class-file-reader.js';

export { ClassPathTypeSource, classEntryName, jdkBaseModulePath, splitClassPath } from './class-path.js';

export { CatalogParseError, CatalogTypeSource, loadTypeCatalog, parseTypeCatalog } from './catalog.js';
export type { TypeCatalog } from './catalog.js';

export { PLATFORM_CATALOG_PATH, createPlatformTypeSource, loadPlatformCatalog } from './platform.js';

export { CompositeTypeSource } from './composite.js';

export { TypeIntrospector } from './introspector.js';
export type { Introspector, TypeIntrospectorOptions } from './introspector.js';
