/**
 * Generation facade.
 *
 * Validates the subject, obtains its snapshot, resolves obligations, picks
 * the delegating constructor, renders the source and hands it to a sink.
 *
 * @packageDocumentation
 */

import { ImplementorError, toError } from '../model/errors.js';
import { ROOT_TYPE, hasModifier } from '../model/types.js';
import type { TypeDescriptor } from '../model/types.js';
import type { Introspector } from '../introspection/introspector.js';
import { isArrayTypeName, isPrimitiveTypeName } from '../introspection/type-names.js';
import { createSilentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { selectConstructor } from './constructor-selector.js';
import { resolveObligations } from './resolver.js';
import type { ResolutionWarning } from './resolver.js';
import { FileSystemSink, SOURCE_EXTENSION, sourceFilePath } from './sink.js';
import type { OutputSink } from './sink.js';
import { renderSource } from './synthesizer.js';
import type { GeneratedSource, RenderOptions } from './synthesizer.js';

/** The enum root; its subclasses cannot be written by hand. */
export const ENUM_ROOT_TYPE = 'java.lang.Enum';

/**
 * Rendered source plus what resolution noticed on the way.
 */
export interface GenerationResult {
  readonly source: GeneratedSource;
  readonly warnings: readonly ResolutionWarning[];
}

/**
 * Result of writing an implementation.
 */
export interface ImplementResult extends GenerationResult {
  /** File the source was written to. */
  readonly path: string;
}

/**
 * Options for creating an Implementor.
 */
export interface ImplementorOptions extends RenderOptions {
  /** Resolves type names; required when subjects are passed by name. */
  readonly introspector?: Introspector;
  /** Destination for generated files. Default: {@link FileSystemSink}. */
  readonly sink?: OutputSink;
  readonly logger?: Logger;
}

/**
 * Rejects subject names that can never be implemented, before any lookup.
 *
 * @throws {ImplementorError} With code `INVALID_SUBJECT`.
 */
export function validateSubjectName(typeName: string): void {
  const name = typeName.trim();
  if (name === '') {
    throw new ImplementorError('Type name must not be empty', 'INVALID_SUBJECT');
  }
  if (isPrimitiveTypeName(name)) {
    throw new ImplementorError(`Cannot implement primitive type '${name}'`, 'INVALID_SUBJECT');
  }
  if (isArrayTypeName(name)) {
    throw new ImplementorError(`Cannot implement array type '${name}'`, 'INVALID_SUBJECT');
  }
  if (name === ROOT_TYPE || name === ENUM_ROOT_TYPE) {
    throw new ImplementorError(`Cannot implement '${name}'`, 'INVALID_SUBJECT');
  }
}

/**
 * Rejects snapshots that cannot be extended or implemented.
 *
 * @throws {ImplementorError} With code `INVALID_SUBJECT`.
 */
export function validateSubject(subject: TypeDescriptor): void {
  validateSubjectName(subject.binaryName);
  if (hasModifier(subject.modifiers, 'final')) {
    throw new ImplementorError(`Cannot implement final class '${subject.qualifiedName}'`, 'INVALID_SUBJECT');
  }
  if (hasModifier(subject.modifiers, 'private')) {
    throw new ImplementorError(`Cannot implement private type '${subject.qualifiedName}'`, 'INVALID_SUBJECT');
  }
}

/**
 * Renders the implementation of an already introspected subject.
 *
 * @throws {ImplementorError} `INVALID_SUBJECT` for final or private subjects,
 *   `NO_USABLE_CONSTRUCTOR` for classes without a non-private constructor.
 */
export function generateSource(subject: TypeDescriptor, options: RenderOptions = {}): GenerationResult {
  validateSubject(subject);
  const constructorChoice = selectConstructor(subject);
  const { obligations, warnings } = resolveObligations(subject);
  return { source: renderSource(subject, obligations, constructorChoice, options), warnings };
}

/**
 * Generates stub implementations of abstract classes and interfaces.
 *
 * @example
 * ```typescript
 * const implementor = new Implementor({ introspector });
 * const { path } = await implementor.implement('com.example.Shape', 'out');
 * // path === 'out/com/example/ShapeImpl.java'
 * ```
 */
export class Implementor {
  private readonly introspector: Introspector | undefined;
  private readonly sink: OutputSink;
  private readonly renderOptions: RenderOptions;
  private readonly logger: Logger;

  constructor(options: ImplementorOptions = {}) {
    this.introspector = options.introspector;
    this.sink = options.sink ?? new FileSystemSink();
    this.renderOptions = {
      ...(options.classSuffix !== undefined ? { classSuffix: options.classSuffix } : {}),
      ...(options.indent !== undefined ? { indent: options.indent } : {}),
    };
    this.logger = options.logger ?? createSilentLogger('Implementor');
  }

  /**
   * Renders the implementation without writing it.
   */
  async generate(subject: string | TypeDescriptor): Promise<GenerationResult> {
    const descriptor = await this.describe(subject);
    const result = generateSource(descriptor, this.renderOptions);

    for (const warning of result.warnings) {
      this.logger.warn('resolution_warning', {
        type: descriptor.binaryName,
        code: warning.code,
        signature: warning.signature,
        declaringTypes: warning.declaringTypes,
        message: warning.message,
      });
    }
    this.logger.debug('source_generated', {
      type: descriptor.binaryName,
      className: result.source.className,
      methods: result.source.methodCount,
    });
    return result;
  }

  /**
   * Renders the implementation and writes it to
   * `<root>/<package path>/<Simple><suffix>.java`.
   *
   * @throws {ImplementorError} `RENDER_FAILURE` when the sink rejects the text.
   */
  async implement(subject: string | TypeDescriptor, root: string): Promise<ImplementResult> {
    if (root.trim() === '') {
      throw new ImplementorError('Output root must not be empty', 'INVALID_ARGUMENT');
    }

    const result = await this.generate(subject);
    const filePath = sourceFilePath(root, result.source.packageName, result.source.className, SOURCE_EXTENSION);

    try {
      await this.sink.write(filePath, result.source.text);
    } catch (error) {
      const cause = toError(error);
      throw new ImplementorError(
        `Cannot write '${filePath}': ${cause.message}`,
        'RENDER_FAILURE',
        undefined,
        cause
      );
    }

    this.logger.info('source_written', { path: filePath, methods: result.source.methodCount });
    return { ...result, path: filePath };
  }

  private async describe(subject: string | TypeDescriptor): Promise<TypeDescriptor> {
    if (typeof subject !== 'string') {
      return subject;
    }
    validateSubjectName(subject);
    if (this.introspector === undefined) {
      throw new ImplementorError(
        `Cannot resolve '${subject}': no introspector configured`,
        'TYPE_RESOLUTION_ERROR'
      );
    }
    return this.introspector.introspect(subject.trim());
  }
}
