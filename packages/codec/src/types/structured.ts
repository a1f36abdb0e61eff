import type { CodecError } from "../errors";
import type { Result } from "../result";

/* JSON-compatible tree that every encoder writes and every decoder reads */
export type StructuredValue = null | boolean | number | string | StructuredValue[] | StructuredObject;

export interface StructuredObject {
  [key: string]: StructuredValue;
}

/** Keys and indices leading from the root of a document to a value. */
export type CodingPath = ReadonlyArray<string | number>;

/**
 * Encode/decode contract shared by scalar codecs, payload records and
 * variant codecs.
 *
 * `encode` throws a `CodecEncodeError` when the value cannot be represented.
 * `decode` reports malformed input through the returned result and never throws for it.
 */
export interface Codec<T> {
  readonly name: string;
  encode(value: T, path: CodingPath): StructuredValue;
  decode(input: unknown, path: CodingPath): Result<T, CodecError>;
}

export type CodecValue<C> = C extends Codec<infer T> ? T : never;
