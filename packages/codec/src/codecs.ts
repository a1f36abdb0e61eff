/**
 * Scalar and container codecs.
 *
 * Leaf validation is delegated to Zod; a failed parse becomes a
 * PayloadTypeMismatchError at the path of the offending value.
 */

import { z } from "zod";
import { CodecEncodeError, PayloadTypeMismatchError, type CodecError } from "./errors";
import { appendPath } from "./path";
import { err, ok, type Result } from "./result";
import { ArrayReader, ArrayWriter } from "./structured";
import type { Codec, CodingPath, StructuredValue } from "./types/structured";

function firstIssue(error: z.ZodError, path: CodingPath): { path: CodingPath; message: string } {
  const issue = error.issues[0];
  if (!issue) {
    return { path, message: error.message };
  }
  return { path: appendPath(path, ...issue.path), message: issue.message };
}

/**
 * Adapt a Zod schema whose output is already JSON-shaped.
 * Encoding re-validates the value so an invalid payload never reaches the wire.
 */
export function fromZod<T extends StructuredValue>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Codec<T> {
  return {
    name,
    encode(value, path) {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        const issue = firstIssue(parsed.error, path);
        throw new CodecEncodeError(`Cannot encode ${name}: ${issue.message}`, issue.path, { codec: name });
      }
      return parsed.data;
    },
    decode(input, path): Result<T, CodecError> {
      const parsed = schema.safeParse(input);
      if (parsed.success) {
        return ok(parsed.data);
      }
      const issue = firstIssue(parsed.error, path);
      return err(new PayloadTypeMismatchError(`Invalid ${name}: ${issue.message}`, issue.path, { codec: name }));
    },
  };
}

export const stringCodec: Codec<string> = fromZod("string", z.string());
export const booleanCodec: Codec<boolean> = fromZod("boolean", z.boolean());
export const numberCodec: Codec<number> = fromZod("number", z.number().finite());
export const uuidCodec: Codec<string> = fromZod("uuid", z.string().uuid());
export const urlCodec: Codec<string> = fromZod("url", z.string().url());

export function stringEnum<const U extends string>(name: string, values: readonly [U, ...U[]]): Codec<U> {
  return fromZod(name, z.enum(values));
}

/* Placeholder for payload-less variants: writes `true`, accepts any present value */
export const presenceMarker: Codec<undefined> = {
  name: "marker",
  encode: () => true,
  decode: () => ok(undefined),
};

export function arrayOf<T>(element: Codec<T>): Codec<T[]> {
  return {
    name: `${element.name}[]`,
    encode(values, path) {
      const sequence = ArrayWriter.open(path);
      values.forEach((value) => sequence.append(element, value));
      return sequence.finish();
    },
    decode(input, path) {
      const opened = ArrayReader.open(input, path);
      if (!opened.ok) return opened;
      const sequence = opened.value;
      const values: T[] = [];
      while (sequence.remaining > 0) {
        const next = sequence.readNext(element);
        if (!next.ok) return next;
        values.push(next.value);
      }
      return ok(values);
    },
  };
}

export function nullable<T>(inner: Codec<T>): Codec<T | null> {
  return {
    name: `${inner.name}?`,
    encode: (value, path) => (value === null ? null : inner.encode(value, path)),
    decode: (input, path) => (input === null ? ok(null) : inner.decode(input, path)),
  };
}
