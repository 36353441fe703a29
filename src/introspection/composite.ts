/**
 * Type source that consults several sources in order.
 *
 * @packageDocumentation
 */

import type { RawTypeDeclaration, TypeSource } from './types.js';

/**
 * Returns the first declaration any source knows; earlier sources shadow later ones.
 */
export class CompositeTypeSource implements TypeSource {
  readonly description: string;
  private readonly sources: readonly TypeSource[];

  constructor(sources: readonly TypeSource[]) {
    this.sources = sources;
    this.description = sources.map((source) => source.description).join(', ');
  }

  async lookup(binaryName: string): Promise<RawTypeDeclaration | undefined> {
    for (const source of this.sources) {
      const declaration = await source.lookup(binaryName);
      if (declaration !== undefined) {
        return declaration;
      }
    }
    return undefined;
  }
}
