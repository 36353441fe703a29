import { describe, expect, it, vi } from 'vitest';
import { TypeIntrospector } from './introspector.js';
import { CatalogTypeSource, parseTypeCatalog } from './catalog.js';
import type { RawTypeDeclaration, TypeSource } from './types.js';
import { isImplementorError } from '../model/errors.js';
import { resolveObligations } from '../implementor/resolver.js';
import { Logger } from '../utils/logger.js';

function introspectorFor(toml: string): TypeIntrospector {
  return new TypeIntrospector(new CatalogTypeSource(parseTypeCatalog(toml)));
}

const HIERARCHY = `
[types."p.Top"]
kind = "class"
modifiers = ["public", "abstract"]
interfaces = ["p.Named"]

[[types."p.Top".methods]]
name = "describe"
modifiers = ["public"]
returns = "java.lang.String"

[[types."p.Top".methods]]
name = "step"
modifiers = ["protected", "abstract"]

[types."p.Mid"]
kind = "class"
modifiers = ["public", "abstract"]
superclass = "p.Top"
interfaces = ["p.Runner"]

[[types."p.Mid".methods]]
name = "describe"
modifiers = ["public", "final"]
returns = "java.lang.String"

[types."p.Leaf"]
kind = "class"
modifiers = ["public", "abstract"]
superclass = "p.Mid"
origin = "lib/leaf.jar"

[[types."p.Leaf".constructors]]
modifiers = ["protected"]
parameters = ["int"]

[types."p.Named"]
kind = "interface"
modifiers = ["public"]

[[types."p.Named".methods]]
name = "name"
returns = "java.lang.String"

[[types."p.Named".methods]]
name = "describe"
returns = "java.lang.String"

[types."p.Runner"]
kind = "interface"
modifiers = ["public"]
interfaces = ["p.Named"]

[[types."p.Runner".methods]]
name = "run"

[[types."p.Runner".methods]]
name = "of"
modifiers = ["static"]
returns = "p.Runner"
`;

describe('TypeIntrospector', () => {
  it('assembles the superclass chain below java.lang.Object', async () => {
    const leaf = await introspectorFor(HIERARCHY).introspect('p.Leaf');

    expect(leaf.qualifiedName).toBe('p.Leaf');
    expect(leaf.simpleName).toBe('Leaf');
    expect(leaf.packageName).toBe('p');
    expect(leaf.origin).toBe('lib/leaf.jar');
    expect(leaf.ancestorChain.map((level) => level.binaryName)).toEqual(['p.Leaf', 'p.Mid', 'p.Top']);
    expect(leaf.ancestorChain[0]?.constructors.map((constructor) => constructor.parameters)).toEqual([[{ type: 'int' }]]);
  });

  it('collects interfaces breadth-first without repeats', async () => {
    const leaf = await introspectorFor(HIERARCHY).introspect('p.Leaf');

    expect(leaf.implementedInterfaces).toEqual(['p.Runner', 'p.Named']);
  });

  it('lists the most derived public class methods and unimplemented interface methods', async () => {
    const leaf = await introspectorFor(HIERARCHY).introspect('p.Leaf');

    expect(leaf.externallyVisibleMethods.map((method) => `${method.declaringType}.${method.name}`)).toEqual([
      'p.Mid.describe',
      'p.Runner.run',
      'p.Named.name',
    ]);
  });

  it('feeds obligations from every branch of the hierarchy', async () => {
    const leaf = await introspectorFor(HIERARCHY).introspect('p.Leaf');

    const { obligations } = resolveObligations(leaf);

    expect(obligations.map((obligation) => obligation.signature.key)).toEqual([
      'name()java.lang.String',
      'run()void',
      'step()void',
    ]);
  });

  it('uses the interface alone as the chain of an interface subject', async () => {
    const runner = await introspectorFor(HIERARCHY).introspect('p.Runner');

    expect(runner.kind).toBe('interface');
    expect(runner.ancestorChain.map((level) => level.binaryName)).toEqual(['p.Runner']);
    expect(runner.implementedInterfaces).toEqual(['p.Named']);
    expect(runner.externallyVisibleMethods.map((method) => method.name)).toEqual(['run', 'name', 'describe']);
  });

  it('lets a sub-interface redeclaration shadow the inherited declaration', async () => {
    const introspector = introspectorFor(`
[types."p.Resource"]
kind = "interface"
interfaces = ["p.Closer"]

[[types."p.Resource".methods]]
name = "close"
exceptions = ["java.io.IOException"]

[types."p.Closer"]
kind = "interface"

[[types."p.Closer".methods]]
name = "close"
exceptions = ["java.lang.Exception"]
`);

    const resource = await introspector.introspect('p.Resource');
    const { obligations, warnings } = resolveObligations(resource);

    expect(resource.externallyVisibleMethods.map((method) => method.declaringType)).toEqual(['p.Resource']);
    expect(obligations[0]?.exceptions).toEqual(['java.io.IOException']);
    expect(warnings).toEqual([]);
  });

  it('keeps same-signature methods of unrelated interfaces so their exceptions merge', async () => {
    const introspector = introspectorFor(`
[types."p.Both"]
kind = "interface"
interfaces = ["p.Left", "p.Right"]

[types."p.Left"]
kind = "interface"

[[types."p.Left".methods]]
name = "close"
exceptions = ["java.io.IOException"]

[types."p.Right"]
kind = "interface"

[[types."p.Right".methods]]
name = "close"
`);

    const both = await introspector.introspect('p.Both');
    const { obligations, warnings } = resolveObligations(both);

    expect(both.externallyVisibleMethods.map((method) => method.declaringType)).toEqual(['p.Left', 'p.Right']);
    expect(obligations[0]?.exceptions).toEqual([]);
    expect(warnings.map((warning) => warning.code)).toEqual(['CONFLICTING_THROWS']);
  });

  it('reports types the source does not know', async () => {
    const introspector = introspectorFor(HIERARCHY);

    await expect(introspector.introspect('p.Missing')).rejects.toThrow(
      "Cannot resolve type 'p.Missing' in type catalog"
    );
  });

  it('names the type that required a missing supertype', async () => {
    const introspector = introspectorFor('[types."p.A"]\nkind = "class"\nsuperclass = "p.Gone"\n');

    await expect(introspector.introspect('p.A')).rejects.toThrow(
      "Cannot resolve type 'p.Gone' (required by 'p.A') in type catalog"
    );
  });

  it('rejects cyclic superclass chains', async () => {
    const introspector = introspectorFor(
      '[types."p.A"]\nkind = "class"\nsuperclass = "p.B"\n[types."p.B"]\nkind = "class"\nsuperclass = "p.A"\n'
    );

    await expect(introspector.introspect('p.A')).rejects.toThrow("Cyclic superclass chain through 'p.A'");
  });

  it('rejects an interface used as a superclass', async () => {
    const introspector = introspectorFor(
      '[types."p.A"]\nkind = "class"\nsuperclass = "p.I"\n[types."p.I"]\nkind = "interface"\n'
    );

    await expect(introspector.introspect('p.A')).rejects.toThrow("Superclass 'p.I' of 'p.A' is an interface");
  });

  it('rejects a class listed as an interface', async () => {
    const introspector = introspectorFor(
      '[types."p.A"]\nkind = "class"\ninterfaces = ["p.C"]\n[types."p.C"]\nkind = "class"\n'
    );

    await expect(introspector.introspect('p.A')).rejects.toThrow(
      "'p.C' is listed as an interface of 'p.A' but is a class"
    );
  });

  it('wraps source failures with their cause', async () => {
    const cause = new Error('corrupt archive');
    const source: TypeSource = { description: 'test source', lookup: () => Promise.reject(cause) };

    let caught: unknown;
    try {
      await new TypeIntrospector(source).introspect('p.A');
    } catch (error) {
      caught = error;
    }

    expect(isImplementorError(caught, 'TYPE_RESOLUTION_ERROR')).toBe(true);
    expect(caught instanceof Error ? caught.message : '').toBe("Cannot read type 'p.A': corrupt archive");
    expect(caught instanceof Error ? caught.cause : undefined).toBe(cause);
  });

  it('rejects local and anonymous classes', async () => {
    const anonymous: RawTypeDeclaration = {
      binaryName: 'p.Outer$1',
      simpleName: '',
      kind: 'class',
      modifiers: [],
      interfaces: [],
      constructors: [],
      methods: [],
    };
    const source: TypeSource = { description: 'test source', lookup: () => Promise.resolve(anonymous) };

    let caught: unknown;
    try {
      await new TypeIntrospector(source).introspect('p.Outer$1');
    } catch (error) {
      caught = error;
    }

    expect(isImplementorError(caught, 'INVALID_SUBJECT')).toBe(true);
  });

  it('looks each type up once', async () => {
    const source = new CatalogTypeSource(parseTypeCatalog(HIERARCHY));
    const lookup = vi.spyOn(source, 'lookup');
    const introspector = new TypeIntrospector(source);

    await introspector.introspect('p.Leaf');
    await introspector.introspect('p.Leaf');

    expect(lookup.mock.calls.map(([name]) => name).sort()).toEqual(['p.Leaf', 'p.Mid', 'p.Named', 'p.Runner', 'p.Top']);
  });

  it('logs a debug entry per introspected type', async () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'TypeIntrospector', debugMode: true, write: (line) => lines.push(line) });
    const introspector = new TypeIntrospector(new CatalogTypeSource(parseTypeCatalog(HIERARCHY)), { logger });

    await introspector.introspect('p.Runner');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'debug',
      component: 'TypeIntrospector',
      event: 'type_introspected',
      data: { type: 'p.Runner', kind: 'interface', chain: ['p.Runner'], interfaces: ['p.Named'], visibleMethods: 3 },
    });
  });
});
