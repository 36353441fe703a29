/**
 * Assembles minimal class files for reader and class-path tests.
 *
 * Names are internal names (`java/lang/Object`).
 */

export interface MemberInfo {
  readonly flags: number;
  readonly name: string;
  readonly descriptor: string;
  /** Internal names for the Exceptions attribute. */
  readonly exceptions?: readonly string[];
  /** Entries for the MethodParameters attribute; undefined records a nameless parameter. */
  readonly parameterNames?: readonly (string | undefined)[];
}

export interface InnerClassInfo {
  readonly inner: string;
  readonly outer?: string;
  readonly name?: string;
  readonly flags: number;
}

export interface ClassFileInfo {
  readonly name: string;
  readonly flags: number;
  /** Default: java/lang/Object. Pass null for none. */
  readonly superName?: string | null;
  readonly interfaces?: readonly string[];
  readonly fieldCount?: number;
  readonly methods?: readonly MemberInfo[];
  readonly innerClasses?: readonly InnerClassInfo[];
  /** Adds a long constant so the pool contains a two-slot entry. */
  readonly withLongConstant?: boolean;
}

class ByteWriter {
  readonly bytes: number[] = [];

  u1(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  u2(value: number): this {
    return this.u1(value >> 8).u1(value);
  }

  u4(value: number): this {
    return this.u2(value >>> 16).u2(value & 0xffff);
  }

  append(other: ByteWriter): this {
    this.bytes.push(...other.bytes);
    return this;
  }
}

/**
 * Encodes text as class-file modified UTF-8.
 */
export function encodeModifiedUtf8(text: string): number[] {
  const out: number[] = [];
  for (let index = 0; index < text.length; index++) {
    const unit = text.charCodeAt(index);
    if (unit !== 0 && unit < 0x80) {
      out.push(unit);
    } else if (unit < 0x800) {
      out.push(0xc0 | (unit >> 6), 0x80 | (unit & 0x3f));
    } else {
      out.push(0xe0 | (unit >> 12), 0x80 | ((unit >> 6) & 0x3f), 0x80 | (unit & 0x3f));
    }
  }
  return out;
}

class PoolBuilder {
  readonly writer = new ByteWriter();
  private next = 1;
  private readonly utf8s = new Map<string, number>();
  private readonly classes = new Map<string, number>();

  get count(): number {
    return this.next;
  }

  utf8(text: string): number {
    const existing = this.utf8s.get(text);
    if (existing !== undefined) {
      return existing;
    }
    const encoded = encodeModifiedUtf8(text);
    this.writer.u1(1).u2(encoded.length);
    encoded.forEach((byte) => this.writer.u1(byte));
    const index = this.next++;
    this.utf8s.set(text, index);
    return index;
  }

  classRef(internalName: string): number {
    const existing = this.classes.get(internalName);
    if (existing !== undefined) {
      return existing;
    }
    const nameIndex = this.utf8(internalName);
    this.writer.u1(7).u2(nameIndex);
    const index = this.next++;
    this.classes.set(internalName, index);
    return index;
  }

  longConstant(value: number): void {
    this.writer.u1(5).u4(0).u4(value);
    this.next += 2;
  }
}

/**
 * Builds class file bytes for `info`.
 */
export function buildClassFile(info: ClassFileInfo): Uint8Array {
  const pool = new PoolBuilder();
  if (info.withLongConstant === true) {
    pool.longConstant(42);
  }

  const body = new ByteWriter();
  body.u2(info.flags);
  body.u2(pool.classRef(info.name));
  const superName = info.superName === undefined ? 'java/lang/Object' : info.superName;
  body.u2(superName === null ? 0 : pool.classRef(superName));

  const interfaces = info.interfaces ?? [];
  body.u2(interfaces.length);
  interfaces.forEach((name) => body.u2(pool.classRef(name)));

  const fieldCount = info.fieldCount ?? 0;
  body.u2(fieldCount);
  for (let i = 0; i < fieldCount; i++) {
    body.u2(0x0002).u2(pool.utf8(`field${String(i)}`)).u2(pool.utf8('I'));
    body.u2(1).u2(pool.utf8('Synthetic')).u4(0);
  }

  const methods = info.methods ?? [];
  body.u2(methods.length);
  for (const method of methods) {
    body.u2(method.flags).u2(pool.utf8(method.name)).u2(pool.utf8(method.descriptor));
    const attributes: ByteWriter[] = [];
    if (method.exceptions !== undefined) {
      const attribute = new ByteWriter().u2(pool.utf8('Exceptions'));
      const payload = new ByteWriter().u2(method.exceptions.length);
      method.exceptions.forEach((name) => payload.u2(pool.classRef(name)));
      attributes.push(attribute.u4(payload.bytes.length).append(payload));
    }
    if (method.parameterNames !== undefined) {
      const attribute = new ByteWriter().u2(pool.utf8('MethodParameters'));
      const payload = new ByteWriter().u1(method.parameterNames.length);
      method.parameterNames.forEach((name) => payload.u2(name === undefined ? 0 : pool.utf8(name)).u2(0));
      attributes.push(attribute.u4(payload.bytes.length).append(payload));
    }
    const code = new ByteWriter().u2(pool.utf8('Code')).u4(2).u2(0);
    attributes.push(code);
    body.u2(attributes.length);
    attributes.forEach((attribute) => body.append(attribute));
  }

  const classAttributes: ByteWriter[] = [];
  const innerClasses = info.innerClasses ?? [];
  if (innerClasses.length > 0) {
    const payload = new ByteWriter().u2(innerClasses.length);
    for (const entry of innerClasses) {
      payload
        .u2(pool.classRef(entry.inner))
        .u2(entry.outer === undefined ? 0 : pool.classRef(entry.outer))
        .u2(entry.name === undefined ? 0 : pool.utf8(entry.name))
        .u2(entry.flags);
    }
    classAttributes.push(new ByteWriter().u2(pool.utf8('InnerClasses')).u4(payload.bytes.length).append(payload));
  }
  classAttributes.push(new ByteWriter().u2(pool.utf8('SourceFile')).u4(2).u2(pool.utf8('Source.java')));
  body.u2(classAttributes.length);
  classAttributes.forEach((attribute) => body.append(attribute));

  const file = new ByteWriter().u4(0xcafebabe).u2(0).u2(52).u2(pool.count).append(pool.writer).append(body);
  return Uint8Array.from(file.bytes);
}
