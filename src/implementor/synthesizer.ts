/**
 * Source synthesizer.
 *
 * Renders the package line, class declaration, delegating constructor and one
 * stub per obligation, then escapes every non-ASCII code unit so the text is
 * 7-bit clean.
 *
 * @packageDocumentation
 */

import { normalizeModifiers } from '../model/types.js';
import type { Modifier, ParameterDeclaration, TypeDescriptor } from '../model/types.js';
import type { ConstructorChoice } from './constructor-selector.js';
import type { MethodObligation } from './resolver.js';

/** Suffix appended to the subject's simple name. */
export const DEFAULT_CLASS_SUFFIX = 'Impl';

/** One indentation level in generated source. */
export const DEFAULT_INDENT = '\t';

/**
 * Options for rendering.
 */
export interface RenderOptions {
  /** Suffix for the generated class name. Default: 'Impl'. */
  readonly classSuffix?: string;
  /** One indentation level. Default: a tab. */
  readonly indent?: string;
}

/**
 * Rendered Java source for one implementation class.
 */
export interface GeneratedSource {
  /** Package of the generated class, empty for the default package. */
  readonly packageName: string;
  /** Simple name of the generated class. */
  readonly className: string;
  /** Complete, ASCII-only file content. */
  readonly text: string;
  /** Number of method blocks in {@link text}. */
  readonly methodCount: number;
}

const STRIPPED_MODIFIERS: ReadonlySet<Modifier> = new Set<Modifier>([
  'abstract',
  'native',
  'transient',
]);

const VISIBILITY_MODIFIERS: ReadonlySet<Modifier> = new Set<Modifier>([
  'public',
  'protected',
  'private',
]);

/** Keywords and literals that cannot name a parameter. */
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  '_', 'abstract', 'assert', 'boolean', 'break', 'byte', 'case', 'catch', 'char', 'class',
  'const', 'continue', 'default', 'do', 'double', 'else', 'enum', 'extends', 'false', 'final',
  'finally', 'float', 'for', 'goto', 'if', 'implements', 'import', 'instanceof', 'int',
  'interface', 'long', 'native', 'new', 'null', 'package', 'private', 'protected', 'public',
  'return', 'short', 'static', 'strictfp', 'super', 'switch', 'synchronized', 'this', 'throw',
  'throws', 'transient', 'true', 'try', 'void', 'volatile', 'while',
]);

const IDENTIFIER_PATTERN = /^[\p{L}\p{Nl}_$][\p{L}\p{Nl}\p{Nd}\p{Mn}\p{Mc}\p{Pc}_$]*$/u;

const NUMERIC_PRIMITIVES: ReadonlySet<string> = new Set([
  'byte',
  'short',
  'int',
  'long',
  'float',
  'double',
  'char',
]);

/**
 * Returns the simple name of the generated class.
 */
export function implementationClassName(
  subject: Pick<TypeDescriptor, 'simpleName'>,
  classSuffix: string = DEFAULT_CLASS_SUFFIX
): string {
  return `${subject.simpleName}${classSuffix}`;
}

/**
 * Returns the expression a stub returns for `returnType`, or `undefined` for
 * `void`.
 *
 * @example
 * ```typescript
 * defaultValueFor('boolean'); // 'false'
 * defaultValueFor('long');    // '0'
 * defaultValueFor('int[]');   // 'null'
 * defaultValueFor('void');    // undefined
 * ```
 */
export function defaultValueFor(returnType: string): string | undefined {
  if (returnType === 'void') {
    return undefined;
  }
  if (returnType === 'boolean') {
    return 'false';
  }
  if (NUMERIC_PRIMITIVES.has(returnType)) {
    return '0';
  }
  return 'null';
}

/**
 * Replaces every UTF-16 code unit at or above 128 with its `\uXXXX` escape.
 */
export function encodeAscii(text: string): string {
  let result = '';
  for (let index = 0; index < text.length; index++) {
    const code = text.charCodeAt(index);
    result += code < 128 ? text.charAt(index) : `\\u${code.toString(16).padStart(4, '0')}`;
  }
  return result;
}

/**
 * Returns true when `name` is a legal Java identifier that is not reserved.
 */
export function isJavaIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name) && !RESERVED_WORDS.has(name);
}

/**
 * Chooses a usable, unique name for every parameter.
 *
 * A declared name is kept when it is a legal identifier not already taken;
 * anything else becomes the positional `arg<index>`.
 */
export function parameterNames(parameters: readonly ParameterDeclaration[]): string[] {
  const used = new Set<string>();
  return parameters.map((parameter, index) => {
    const declared = parameter.name;
    let name =
      declared !== undefined && isJavaIdentifier(declared) && !used.has(declared)
        ? declared
        : `arg${String(index)}`;
    while (used.has(name)) {
      name = `${name}_`;
    }
    used.add(name);
    return name;
  });
}

function renderModifiers(modifiers: readonly Modifier[]): string {
  const kept = normalizeModifiers(modifiers.filter((modifier) => !STRIPPED_MODIFIERS.has(modifier)));
  return kept.length === 0 ? '' : `${kept.join(' ')} `;
}

function renderParameters(parameters: readonly ParameterDeclaration[], names: readonly string[]): string {
  return parameters.map((parameter, index) => `${parameter.type} ${names[index] ?? `arg${String(index)}`}`).join(', ');
}

function renderThrows(exceptions: readonly string[]): string {
  return exceptions.length === 0 ? '' : ` throws ${exceptions.join(', ')}`;
}

function renderConstructor(className: string, constructor: ConstructorChoice, indent: string): string {
  const names = parameterNames(constructor.parameters);
  const modifiers: Modifier[] = [
    'public',
    ...constructor.modifiers.filter((modifier) => !VISIBILITY_MODIFIERS.has(modifier)),
  ];
  return (
    `${indent}${renderModifiers(modifiers)}${className}(${renderParameters(constructor.parameters, names)})` +
    `${renderThrows(constructor.exceptions)} {\n` +
    `${indent}${indent}super(${names.join(', ')});\n` +
    `${indent}}\n`
  );
}

function renderMethod(obligation: MethodObligation, indent: string): string {
  const { representative } = obligation;
  const names = parameterNames(representative.parameters);
  const value = defaultValueFor(representative.returnType);
  const body = value === undefined ? '' : `${indent}${indent}return ${value};\n`;
  return (
    `${indent}${renderModifiers(obligation.modifiers)}${representative.returnType} ${representative.name}` +
    `(${renderParameters(representative.parameters, names)})${renderThrows(obligation.exceptions)} {\n` +
    body +
    `${indent}}\n`
  );
}

/**
 * Renders the implementation class for a subject.
 *
 * @param subject - Introspected snapshot of the subject.
 * @param obligations - Methods to stub, in output order.
 * @param constructorChoice - Constructor to delegate to; omitted for interfaces.
 * @param options - Naming and layout options.
 * @returns ASCII-only Java source.
 */
export function renderSource(
  subject: TypeDescriptor,
  obligations: readonly MethodObligation[],
  constructorChoice: ConstructorChoice | undefined,
  options: RenderOptions = {}
): GeneratedSource {
  const indent = options.indent ?? DEFAULT_INDENT;
  const className = implementationClassName(subject, options.classSuffix);
  const relation = subject.kind === 'interface' ? 'implements' : 'extends';

  const packageLine = subject.packageName === '' ? '' : `package ${subject.packageName};\n\n`;
  const declaration = `public class ${className} ${relation} ${subject.qualifiedName} {\n`;

  const blocks: string[] = [];
  if (constructorChoice !== undefined) {
    blocks.push(renderConstructor(className, constructorChoice, indent));
  }
  for (const obligation of obligations) {
    blocks.push(renderMethod(obligation, indent));
  }

  return {
    packageName: subject.packageName,
    className,
    text: encodeAscii(`${packageLine}${declaration}${blocks.join('\n')}}\n`),
    methodCount: obligations.length,
  };
}
