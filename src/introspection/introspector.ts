/**
 * Builds {@link TypeDescriptor} snapshots from a {@link TypeSource}.
 *
 * @packageDocumentation
 */

import { ImplementorError, toError } from '../model/errors.js';
import { MethodSignature } from '../model/signature.js';
import { ROOT_TYPE, hasModifier } from '../model/types.js';
import type { MethodDeclaration, TypeDescriptor, TypeLevel } from '../model/types.js';
import { createSilentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { packageOf } from './type-names.js';
import type { RawTypeDeclaration, TypeSource } from './types.js';

/**
 * Anything that can produce a type snapshot by name.
 */
export interface Introspector {
  /**
   * @param binaryName - e.g. `com.example.Outer$Inner`.
   * @throws {ImplementorError} With code `TYPE_RESOLUTION_ERROR` when the type
   *   or one of its supertypes cannot be found or read.
   */
  introspect(binaryName: string): Promise<TypeDescriptor>;
}

/**
 * Options for creating a TypeIntrospector.
 */
export interface TypeIntrospectorOptions {
  readonly logger?: Logger;
}

function toLevel(declaration: RawTypeDeclaration): TypeLevel {
  return {
    binaryName: declaration.binaryName,
    constructors: declaration.constructors,
    methods: declaration.methods,
  };
}

/**
 * Introspector that assembles the hierarchy from raw declarations.
 *
 * The superclass chain is followed up to, and excluding, `java.lang.Object`.
 * Interfaces are collected breadth-first from every chain level. The
 * externally visible set holds the chain's public methods (most derived
 * wins) followed by public instance methods of the interfaces that no class
 * method and no sub-interface redeclares.
 *
 * @example
 * ```typescript
 * const introspector = new TypeIntrospector(new ClassPathTypeSource(['build/classes']));
 * const shape = await introspector.introspect('com.example.Shape');
 * shape.ancestorChain.map((level) => level.binaryName); // ['com.example.Shape', 'com.example.Base']
 * ```
 */
export class TypeIntrospector implements Introspector {
  private readonly source: TypeSource;
  private readonly logger: Logger;
  private readonly declarations = new Map<string, Promise<RawTypeDeclaration>>();

  constructor(source: TypeSource, options: TypeIntrospectorOptions = {}) {
    this.source = source;
    this.logger = options.logger ?? createSilentLogger('TypeIntrospector');
  }

  async introspect(binaryName: string): Promise<TypeDescriptor> {
    const subject = await this.load(binaryName);
    if (subject.canonicalName === undefined) {
      throw new ImplementorError(
        `Type '${binaryName}' is a local or anonymous class and has no canonical name`,
        'INVALID_SUBJECT'
      );
    }

    const chain = await this.loadChain(subject);
    const interfaces = await this.loadInterfaces(chain);
    const visible = await this.visibleMethods(chain, interfaces);

    this.logger.debug('type_introspected', {
      type: binaryName,
      kind: subject.kind,
      chain: chain.map((level) => level.binaryName),
      interfaces: interfaces.map((declaration) => declaration.binaryName),
      visibleMethods: visible.length,
    });

    return {
      binaryName: subject.binaryName,
      qualifiedName: subject.canonicalName,
      simpleName: subject.simpleName,
      packageName: packageOf(subject.binaryName),
      kind: subject.kind,
      modifiers: subject.modifiers,
      ancestorChain: chain.map(toLevel),
      implementedInterfaces: interfaces.map((declaration) => declaration.binaryName),
      externallyVisibleMethods: visible,
      ...(subject.origin !== undefined ? { origin: subject.origin } : {}),
    };
  }

  private load(binaryName: string, requiredBy?: string): Promise<RawTypeDeclaration> {
    let pending = this.declarations.get(binaryName);
    if (pending === undefined) {
      pending = this.lookup(binaryName, requiredBy);
      this.declarations.set(binaryName, pending);
    }
    return pending;
  }

  private async lookup(binaryName: string, requiredBy?: string): Promise<RawTypeDeclaration> {
    const context = requiredBy === undefined ? '' : ` (required by '${requiredBy}')`;
    let declaration: RawTypeDeclaration | undefined;
    try {
      declaration = await this.source.lookup(binaryName);
    } catch (error) {
      const cause = toError(error);
      throw new ImplementorError(
        `Cannot read type '${binaryName}'${context}: ${cause.message}`,
        'TYPE_RESOLUTION_ERROR',
        undefined,
        cause
      );
    }
    if (declaration === undefined) {
      throw new ImplementorError(
        `Cannot resolve type '${binaryName}'${context} in ${this.source.description}`,
        'TYPE_RESOLUTION_ERROR'
      );
    }
    return declaration;
  }

  private async loadChain(subject: RawTypeDeclaration): Promise<RawTypeDeclaration[]> {
    const chain = [subject];
    if (subject.kind === 'interface') {
      return chain;
    }

    const seen = new Set([subject.binaryName]);
    let current = subject;
    while (current.superclass !== undefined && current.superclass !== ROOT_TYPE) {
      if (seen.has(current.superclass)) {
        throw new ImplementorError(
          `Cyclic superclass chain through '${current.superclass}'`,
          'TYPE_RESOLUTION_ERROR'
        );
      }
      const parent = await this.load(current.superclass, current.binaryName);
      if (parent.kind !== 'class') {
        throw new ImplementorError(
          `Superclass '${parent.binaryName}' of '${current.binaryName}' is an interface`,
          'TYPE_RESOLUTION_ERROR'
        );
      }
      seen.add(parent.binaryName);
      chain.push(parent);
      current = parent;
    }
    return chain;
  }

  private async loadInterfaces(chain: readonly RawTypeDeclaration[]): Promise<RawTypeDeclaration[]> {
    const subject = chain[0];
    const queue: { name: string; requiredBy: string }[] = chain.flatMap((level) =>
      level.interfaces.map((name) => ({ name, requiredBy: level.binaryName }))
    );
    const seen = new Set<string>(subject?.kind === 'interface' ? [subject.binaryName] : []);
    const collected: RawTypeDeclaration[] = [];

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      if (seen.has(next.name)) {
        continue;
      }
      seen.add(next.name);
      const declaration = await this.load(next.name, next.requiredBy);
      if (declaration.kind !== 'interface') {
        throw new ImplementorError(
          `'${declaration.binaryName}' is listed as an interface of '${next.requiredBy}' but is a class`,
          'TYPE_RESOLUTION_ERROR'
        );
      }
      collected.push(declaration);
      for (const name of declaration.interfaces) {
        queue.push({ name, requiredBy: declaration.binaryName });
      }
    }
    return collected;
  }

  private async visibleMethods(
    chain: readonly RawTypeDeclaration[],
    interfaces: readonly RawTypeDeclaration[]
  ): Promise<MethodDeclaration[]> {
    const visible: MethodDeclaration[] = [];
    const classKeys = new Set<string>();

    for (const level of chain) {
      if (level.kind === 'interface') {
        continue;
      }
      for (const method of level.methods) {
        const key = MethodSignature.of(method).key;
        if (hasModifier(method.modifiers, 'public') && !classKeys.has(key)) {
          classKeys.add(key);
          visible.push(method);
        }
      }
    }

    const interfaceLevels = chain[0]?.kind === 'interface' ? [chain[0], ...interfaces] : interfaces;
    const ancestors = new Map<string, ReadonlySet<string>>();
    for (const declaration of interfaceLevels) {
      ancestors.set(declaration.binaryName, await this.superInterfaces(declaration));
    }

    const declaredBy = new Map<string, string[]>();
    for (const declaration of interfaceLevels) {
      for (const method of declaration.methods) {
        if (hasModifier(method.modifiers, 'public') && !hasModifier(method.modifiers, 'static')) {
          const key = MethodSignature.of(method).key;
          declaredBy.set(key, [...(declaredBy.get(key) ?? []), declaration.binaryName]);
        }
      }
    }

    for (const declaration of interfaceLevels) {
      for (const method of declaration.methods) {
        if (!hasModifier(method.modifiers, 'public') || hasModifier(method.modifiers, 'static')) {
          continue;
        }
        const key = MethodSignature.of(method).key;
        if (classKeys.has(key)) {
          continue;
        }
        const shadowed = (declaredBy.get(key) ?? []).some(
          (other) =>
            other !== declaration.binaryName &&
            (ancestors.get(other)?.has(declaration.binaryName) ?? false)
        );
        if (!shadowed) {
          visible.push(method);
        }
      }
    }

    return visible;
  }

  /**
   * Every interface `declaration` extends, directly or transitively.
   */
  private async superInterfaces(declaration: RawTypeDeclaration): Promise<ReadonlySet<string>> {
    const result = new Set<string>();
    const queue = [...declaration.interfaces];
    for (let name = queue.shift(); name !== undefined; name = queue.shift()) {
      if (result.has(name)) {
        continue;
      }
      result.add(name);
      const parent = await this.load(name, declaration.binaryName);
      queue.push(...parent.interfaces);
    }
    return result;
  }
}
