/**
 * TOML type catalog parser and catalog-backed type source.
 *
 * A catalog describes types by hand, for subjects whose compiled form is not
 * at hand:
 *
 * ```toml
 * [types."com.example.Shape"]
 * kind = "class"
 * modifiers = ["public", "abstract"]
 * interfaces = ["java.lang.Comparable"]
 *
 * [[types."com.example.Shape".constructors]]
 * modifiers = ["protected"]
 * parameters = [{ type = "java.lang.String", name = "name" }]
 *
 * [[types."com.example.Shape".methods]]
 * name = "area"
 * modifiers = ["public", "abstract"]
 * returns = "double"
 * ```
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { MODIFIER_ORDER, ROOT_TYPE, normalizeModifiers } from '../model/types.js';
import type {
  ConstructorDeclaration,
  MethodDeclaration,
  Modifier,
  ParameterDeclaration,
  TypeKind,
} from '../model/types.js';
import { safeReadFile } from '../utils/safe-fs.js';
import { canonicalFromBinary, simpleNameOf } from './type-names.js';
import type { RawTypeDeclaration, TypeSource } from './types.js';

/**
 * Error class for catalog parsing errors.
 */
export class CatalogParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new CatalogParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'CatalogParseError';
    this.cause = cause;
  }
}

/**
 * Parsed catalog: declarations keyed by binary name.
 */
export type TypeCatalog = ReadonlyMap<string, RawTypeDeclaration>;

const VALID_KINDS: readonly TypeKind[] = ['class', 'interface'];

/** Keys that are prohibited due to prototype pollution concerns. */
const PROHIBITED_KEYS = ['__proto__', 'constructor', 'prototype'];

/**
 * Validates that a key is safe for use as an object property.
 *
 * @throws CatalogParseError if key is prohibited.
 */
function validateKey(key: string, keyPath: string): void {
  if (PROHIBITED_KEYS.includes(key)) {
    throw new CatalogParseError(
      `Prohibited key '${key}' found at '${keyPath}': keys ${PROHIBITED_KEYS.map((k) => `'${k}'`).join(', ')} are not allowed for security reasons`
    );
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function describe(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates that a value is a table and that none of its keys are prohibited.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> {
  if (!isTable(value)) {
    throw new CatalogParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describe(value)}`
    );
  }
  for (const key of Object.keys(value)) {
    validateKey(key, `${fieldPath}.${key}`);
  }
  return value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new CatalogParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describe(value)}`
    );
  }
  return value;
}

function validateNonEmptyString(value: unknown, fieldPath: string): string {
  const str = validateString(value, fieldPath).trim();
  if (str === '') {
    throw new CatalogParseError(`Invalid value for '${fieldPath}': must not be empty`);
  }
  return str;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new CatalogParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describe(value)}`
    );
  }
  return value;
}

function validateArray(value: unknown, fieldPath: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new CatalogParseError(
      `Invalid type for '${fieldPath}': expected array, got ${describe(value)}`
    );
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  return validateArray(value, fieldPath).map((item, index) =>
    validateNonEmptyString(item, `${fieldPath}[${String(index)}]`)
  );
}

function isModifier(value: string): value is Modifier {
  return MODIFIER_ORDER.some((modifier) => modifier === value);
}

function validateModifiers(value: unknown, fieldPath: string): Modifier[] {
  if (value === undefined) {
    return [];
  }
  const modifiers = validateStringArray(value, fieldPath).map((item, index) => {
    if (!isModifier(item)) {
      throw new CatalogParseError(
        `Invalid value for '${fieldPath}[${String(index)}]': expected one of [${MODIFIER_ORDER.join(', ')}], got '${item}'`
      );
    }
    return item;
  });
  const visibilities = modifiers.filter((m) => m === 'public' || m === 'protected' || m === 'private');
  if (new Set(visibilities).size > 1) {
    throw new CatalogParseError(
      `Invalid value for '${fieldPath}': at most one of public, protected, private is allowed`
    );
  }
  return normalizeModifiers(modifiers);
}

function validateKind(value: unknown, fieldPath: string): TypeKind {
  const str = validateString(value, fieldPath);
  const kind = VALID_KINDS.find((candidate) => candidate === str);
  if (kind === undefined) {
    throw new CatalogParseError(
      `Invalid value for '${fieldPath}': expected one of [${VALID_KINDS.join(', ')}], got '${str}'`
    );
  }
  return kind;
}

function parseParameters(value: unknown, fieldPath: string): ParameterDeclaration[] {
  if (value === undefined) {
    return [];
  }
  return validateArray(value, fieldPath).map((item, index) => {
    const itemPath = `${fieldPath}[${String(index)}]`;
    if (typeof item === 'string') {
      return { type: validateNonEmptyString(item, itemPath) };
    }
    const table = validateTable(item, itemPath);
    const type = validateNonEmptyString(table.type, `${itemPath}.type`);
    if (table.name === undefined) {
      return { type };
    }
    return { type, name: validateNonEmptyString(table.name, `${itemPath}.name`) };
  });
}

function parseExceptions(value: unknown, fieldPath: string): string[] {
  return value === undefined ? [] : validateStringArray(value, fieldPath);
}

function parseConstructor(value: unknown, fieldPath: string, declaringType: string): ConstructorDeclaration {
  const table = validateTable(value, fieldPath);
  return {
    declaringType,
    modifiers: validateModifiers(table.modifiers, `${fieldPath}.modifiers`),
    parameters: parseParameters(table.parameters, `${fieldPath}.parameters`),
    exceptions: parseExceptions(table.exceptions, `${fieldPath}.exceptions`),
  };
}

/**
 * Interface members are implicitly public, and abstract unless they are
 * static, private or marked `default = true`.
 */
function interfaceMethodModifiers(modifiers: readonly Modifier[], isDefault: boolean): Modifier[] {
  const result = new Set(modifiers);
  if (!result.has('private')) {
    result.add('public');
  }
  if (!isDefault && !result.has('static') && !result.has('private')) {
    result.add('abstract');
  }
  return normalizeModifiers(result);
}

function parseMethod(
  value: unknown,
  fieldPath: string,
  declaringType: string,
  kind: TypeKind
): MethodDeclaration {
  const table = validateTable(value, fieldPath);
  const name = validateNonEmptyString(table.name, `${fieldPath}.name`);
  let modifiers = validateModifiers(table.modifiers, `${fieldPath}.modifiers`);
  const isDefault = table.default === undefined ? false : validateBoolean(table.default, `${fieldPath}.default`);

  if (kind === 'interface') {
    modifiers = interfaceMethodModifiers(modifiers, isDefault);
  } else if (isDefault) {
    throw new CatalogParseError(`Invalid value for '${fieldPath}.default': only interface methods can be default`);
  }

  return {
    declaringType,
    name,
    modifiers,
    parameters: parseParameters(table.parameters, `${fieldPath}.parameters`),
    returnType: table.returns === undefined ? 'void' : validateNonEmptyString(table.returns, `${fieldPath}.returns`),
    exceptions: parseExceptions(table.exceptions, `${fieldPath}.exceptions`),
  };
}

function implicitConstructor(binaryName: string, classModifiers: readonly Modifier[]): ConstructorDeclaration {
  return {
    declaringType: binaryName,
    modifiers: classModifiers.filter((m) => m === 'public' || m === 'protected' || m === 'private'),
    parameters: [],
    exceptions: [],
  };
}

function parseType(binaryName: string, value: unknown, fieldPath: string): RawTypeDeclaration {
  const table = validateTable(value, fieldPath);
  const kind = validateKind(table.kind, `${fieldPath}.kind`);
  const modifiers = validateModifiers(table.modifiers, `${fieldPath}.modifiers`);
  const canonicalName =
    table.canonical === undefined
      ? canonicalFromBinary(binaryName)
      : validateNonEmptyString(table.canonical, `${fieldPath}.canonical`);

  let superclass: string | undefined;
  if (kind === 'class') {
    superclass =
      table.superclass === undefined
        ? binaryName === ROOT_TYPE
          ? undefined
          : ROOT_TYPE
        : validateNonEmptyString(table.superclass, `${fieldPath}.superclass`);
  } else if (table.superclass !== undefined) {
    throw new CatalogParseError(`Invalid field '${fieldPath}.superclass': interfaces have no superclass`);
  }

  if (kind === 'interface' && table.constructors !== undefined) {
    throw new CatalogParseError(`Invalid field '${fieldPath}.constructors': interfaces have no constructors`);
  }

  const constructors =
    kind === 'interface'
      ? []
      : table.constructors === undefined
        ? [implicitConstructor(binaryName, modifiers)]
        : validateArray(table.constructors, `${fieldPath}.constructors`).map((item, index) =>
            parseConstructor(item, `${fieldPath}.constructors[${String(index)}]`, binaryName)
          );

  const methods =
    table.methods === undefined
      ? []
      : validateArray(table.methods, `${fieldPath}.methods`).map((item, index) =>
          parseMethod(item, `${fieldPath}.methods[${String(index)}]`, binaryName, kind)
        );

  const declaration: RawTypeDeclaration = {
    binaryName,
    canonicalName,
    simpleName: simpleNameOf(canonicalName),
    kind,
    modifiers: kind === 'interface' ? normalizeModifiers([...modifiers, 'abstract']) : modifiers,
    ...(superclass !== undefined ? { superclass } : {}),
    interfaces: table.interfaces === undefined ? [] : validateStringArray(table.interfaces, `${fieldPath}.interfaces`),
    constructors,
    methods,
    ...(table.origin !== undefined ? { origin: validateNonEmptyString(table.origin, `${fieldPath}.origin`) } : {}),
  };
  return declaration;
}

/**
 * Parses TOML catalog content.
 *
 * @param tomlContent - Catalog text.
 * @returns Declarations keyed by binary name.
 * @throws {CatalogParseError} On invalid TOML or any invalid field, naming the field path.
 */
export function parseTypeCatalog(tomlContent: string): TypeCatalog {
  let parsed: Record<string, unknown>;
  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new CatalogParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  const catalog = new Map<string, RawTypeDeclaration>();
  if (parsed.types === undefined) {
    return catalog;
  }

  const types = validateTable(parsed.types, 'types');
  for (const [binaryName, value] of Object.entries(types)) {
    catalog.set(binaryName, parseType(binaryName, value, `types.${binaryName}`));
  }
  return catalog;
}

/**
 * Reads and parses a catalog file.
 *
 * @throws {CatalogParseError} If the content is invalid; the message names the file.
 */
export async function loadTypeCatalog(filePath: string): Promise<TypeCatalog> {
  const content = await safeReadFile(filePath);
  try {
    return parseTypeCatalog(content);
  } catch (error) {
    if (error instanceof CatalogParseError) {
      throw new CatalogParseError(`${filePath}: ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Type source over a parsed catalog.
 *
 * @example
 * ```typescript
 * const source = await CatalogTypeSource.fromFile('types.toml');
 * ```
 */
export class CatalogTypeSource implements TypeSource {
  readonly description: string;
  private readonly catalog: TypeCatalog;

  constructor(catalog: TypeCatalog, description = 'type catalog') {
    this.catalog = catalog;
    this.description = description;
  }

  /**
   * Loads a catalog file into a new source.
   */
  static async fromFile(filePath: string): Promise<CatalogTypeSource> {
    return new CatalogTypeSource(await loadTypeCatalog(filePath), `catalog ${filePath}`);
  }

  lookup(binaryName: string): Promise<RawTypeDeclaration | undefined> {
    return Promise.resolve(this.catalog.get(binaryName));
  }
}
