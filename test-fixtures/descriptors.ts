/**
 * Builders for type snapshots used across tests.
 */

import type {
  ConstructorDeclaration,
  MethodDeclaration,
  Modifier,
  ParameterDeclaration,
  TypeDescriptor,
  TypeLevel,
} from '../src/model/types.js';

export interface MethodFields {
  readonly name: string;
  readonly modifiers?: readonly Modifier[];
  readonly parameters?: readonly (string | ParameterDeclaration)[];
  readonly returnType?: string;
  readonly exceptions?: readonly string[];
}

export interface ConstructorFields {
  readonly modifiers?: readonly Modifier[];
  readonly parameters?: readonly (string | ParameterDeclaration)[];
  readonly exceptions?: readonly string[];
}

function toParameters(parameters: readonly (string | ParameterDeclaration)[] = []): ParameterDeclaration[] {
  return parameters.map((parameter) => (typeof parameter === 'string' ? { type: parameter } : parameter));
}

export function method(declaringType: string, fields: MethodFields): MethodDeclaration {
  return {
    declaringType,
    name: fields.name,
    modifiers: fields.modifiers ?? ['public', 'abstract'],
    parameters: toParameters(fields.parameters),
    returnType: fields.returnType ?? 'void',
    exceptions: fields.exceptions ?? [],
  };
}

export function constructorOf(declaringType: string, fields: ConstructorFields = {}): ConstructorDeclaration {
  return {
    declaringType,
    modifiers: fields.modifiers ?? ['public'],
    parameters: toParameters(fields.parameters),
    exceptions: fields.exceptions ?? [],
  };
}

export function level(
  binaryName: string,
  methods: readonly MethodFields[] = [],
  constructors: readonly ConstructorFields[] = []
): TypeLevel {
  return {
    binaryName,
    methods: methods.map((fields) => method(binaryName, fields)),
    constructors: constructors.map((fields) => constructorOf(binaryName, fields)),
  };
}

export interface DescriptorFields {
  readonly binaryName: string;
  readonly kind?: TypeDescriptor['kind'];
  readonly modifiers?: readonly Modifier[];
  readonly chain?: readonly TypeLevel[];
  readonly visible?: readonly MethodDeclaration[];
  readonly interfaces?: readonly string[];
}

/**
 * Builds a descriptor whose chain defaults to a single empty level for the subject.
 */
export function descriptor(fields: DescriptorFields): TypeDescriptor {
  const lastDot = fields.binaryName.lastIndexOf('.');
  const packageName = lastDot === -1 ? '' : fields.binaryName.slice(0, lastDot);
  const local = fields.binaryName.slice(lastDot + 1);
  const kind = fields.kind ?? 'class';
  return {
    binaryName: fields.binaryName,
    qualifiedName: fields.binaryName.replaceAll('$', '.'),
    simpleName: local.slice(local.lastIndexOf('$') + 1),
    packageName,
    kind,
    modifiers: fields.modifiers ?? ['public', 'abstract'],
    ancestorChain: fields.chain ?? [level(fields.binaryName)],
    implementedInterfaces: fields.interfaces ?? [],
    externallyVisibleMethods: fields.visible ?? [],
  };
}
