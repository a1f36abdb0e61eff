import { PayloadTypeMismatchError, TruncatedSequenceError, type CodecError } from "./errors";
import { appendPath } from "./path";
import { err, ok, type Result } from "./result";
import type { Codec, CodingPath, StructuredObject, StructuredValue } from "./types/structured";

export function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeShape(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export class ObjectWriter {
  readonly path: CodingPath;
  private readonly entries: StructuredObject = {};

  private constructor(path: CodingPath) {
    this.path = path;
  }

  static open(path: CodingPath = []): ObjectWriter {
    return new ObjectWriter(path);
  }

  writeKey<T>(key: string, codec: Codec<T>, value: T): void {
    this.entries[key] = codec.encode(value, appendPath(this.path, key));
  }

  openNestedArray(key: string): ArrayWriter {
    const nested = ArrayWriter.open(appendPath(this.path, key));
    this.entries[key] = nested.finish();
    return nested;
  }

  finish(): StructuredObject {
    return this.entries;
  }
}

export class ArrayWriter {
  readonly path: CodingPath;
  private readonly elements: StructuredValue[] = [];

  private constructor(path: CodingPath) {
    this.path = path;
  }

  static open(path: CodingPath = []): ArrayWriter {
    return new ArrayWriter(path);
  }

  append<T>(codec: Codec<T>, value: T): void {
    this.elements.push(codec.encode(value, appendPath(this.path, this.elements.length)));
  }

  /* The returned array is live: later appends still land in it */
  finish(): StructuredValue[] {
    return this.elements;
  }
}

export class ObjectReader {
  readonly path: CodingPath;
  private readonly value: Readonly<Record<string, unknown>>;

  private constructor(value: Readonly<Record<string, unknown>>, path: CodingPath) {
    this.value = value;
    this.path = path;
  }

  static open(input: unknown, path: CodingPath = []): Result<ObjectReader, CodecError> {
    if (!isPlainObject(input)) {
      return err(
        new PayloadTypeMismatchError(`Expected an object but found ${describeShape(input)}`, path, {
          expected: "object",
          actual: describeShape(input),
        }),
      );
    }
    return ok(new ObjectReader(input, path));
  }

  presentKeys(): readonly string[] {
    return Object.keys(this.value);
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.value, key);
  }

  readValue<T>(key: string, codec: Codec<T>): Result<T, CodecError> {
    const keyPath = appendPath(this.path, key);
    if (!this.has(key)) {
      return err(new PayloadTypeMismatchError(`Missing key '${key}' for ${codec.name}`, keyPath, { key }));
    }
    return codec.decode(this.value[key], keyPath);
  }

  openNestedArray(key: string): Result<ArrayReader, CodecError> {
    const keyPath = appendPath(this.path, key);
    if (!this.has(key)) {
      return err(new PayloadTypeMismatchError(`Missing key '${key}'`, keyPath, { key }));
    }
    return ArrayReader.open(this.value[key], keyPath);
  }
}

export class ArrayReader {
  readonly path: CodingPath;
  private readonly elements: readonly unknown[];
  private index = 0;

  private constructor(elements: readonly unknown[], path: CodingPath) {
    this.elements = elements;
    this.path = path;
  }

  static open(input: unknown, path: CodingPath = []): Result<ArrayReader, CodecError> {
    if (!Array.isArray(input)) {
      return err(
        new PayloadTypeMismatchError(`Expected an array but found ${describeShape(input)}`, path, {
          expected: "array",
          actual: describeShape(input),
        }),
      );
    }
    return ok(new ArrayReader(input, path));
  }

  get count(): number {
    return this.elements.length;
  }

  get remaining(): number {
    return this.elements.length - this.index;
  }

  readNext<T>(codec: Codec<T>): Result<T, CodecError> {
    if (this.index >= this.elements.length) {
      return err(
        new TruncatedSequenceError(`Sequence ended before ${codec.name} at position ${this.index}`, this.path, {
          expected: this.index + 1,
          actual: this.elements.length,
        }),
      );
    }
    const position = this.index;
    this.index += 1;
    return codec.decode(this.elements[position], appendPath(this.path, position));
  }
}
