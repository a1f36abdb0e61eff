/**
 * Multi-value packing.
 *
 * A fixed-arity tuple of independently typed values travels as one JSON
 * array. Position is the only link between a value and its slot.
 */

import { CodecEncodeError, TrailingElementsError, TruncatedSequenceError, type CodecError } from "./errors";
import { type CodecOptions, resolveCodecOptions, type ResolvedCodecOptions } from "./options";
import { err, ok, type Result } from "./result";
import { ArrayReader, ArrayWriter, type ObjectReader, type ObjectWriter } from "./structured";
import type { Codec, CodingPath } from "./types/structured";

export type CodecTuple<T extends readonly unknown[]> = { readonly [I in keyof T]: Codec<T[I]> };

function appendAll(sequence: ArrayWriter, codecs: readonly Codec<unknown>[], values: readonly unknown[]): void {
  if (values.length !== codecs.length) {
    throw new CodecEncodeError(`Expected ${codecs.length} values to pack but got ${values.length}`, sequence.path, {
      expected: codecs.length,
      actual: values.length,
    });
  }
  codecs.forEach((codec, index) => sequence.append(codec, values[index]));
}

function readAll(
  sequence: ArrayReader,
  codecs: readonly Codec<unknown>[],
  options: ResolvedCodecOptions,
): Result<readonly unknown[], CodecError> {
  const expected = codecs.length;
  if (sequence.count < expected) {
    return err(
      new TruncatedSequenceError(`Expected ${expected} packed values but found ${sequence.count}`, sequence.path, {
        expected,
        actual: sequence.count,
      }),
    );
  }

  const values: unknown[] = [];
  for (const codec of codecs) {
    const next = sequence.readNext(codec);
    if (!next.ok) return next;
    values.push(next.value);
  }

  if (sequence.remaining > 0) {
    if (options.trailingElements === "reject") {
      return err(
        new TrailingElementsError(`Expected ${expected} packed values but found ${sequence.count}`, sequence.path, {
          expected,
          actual: sequence.count,
        }),
      );
    }
    options.logger.debug("ignoring trailing elements in packed sequence", {
      path: sequence.path,
      expected,
      actual: sequence.count,
    });
  }

  return ok(values);
}

/**
 * Write `values` as one ordered array under `key`, each with the codec at the same position.
 */
export function packValues<T extends readonly unknown[]>(
  writer: ObjectWriter,
  key: string,
  codecs: CodecTuple<T>,
  values: T,
): void;
export function packValues(
  writer: ObjectWriter,
  key: string,
  codecs: readonly Codec<unknown>[],
  values: readonly unknown[],
): void {
  appendAll(writer.openNestedArray(key), codecs, values);
}

/**
 * Read the array under `key` back into a tuple, in packing order.
 */
export function unpackValues<T extends readonly unknown[]>(
  reader: ObjectReader,
  key: string,
  codecs: CodecTuple<T>,
  options?: CodecOptions,
): Result<T, CodecError>;
export function unpackValues(
  reader: ObjectReader,
  key: string,
  codecs: readonly Codec<unknown>[],
  options?: CodecOptions,
): Result<readonly unknown[], CodecError> {
  const opened = reader.openNestedArray(key);
  if (!opened.ok) return opened;
  return readAll(opened.value, codecs, resolveCodecOptions(options));
}

/** Same packing as a standalone codec, for tuples that are not under an object key. */
export function tupleCodec<T extends readonly unknown[]>(
  name: string,
  codecs: CodecTuple<T>,
  options?: CodecOptions,
): Codec<T>;
export function tupleCodec(
  name: string,
  codecs: readonly Codec<unknown>[],
  options?: CodecOptions,
): Codec<readonly unknown[]> {
  const resolved = resolveCodecOptions(options);
  return {
    name,
    encode(values: readonly unknown[], path: CodingPath) {
      const sequence = ArrayWriter.open(path);
      appendAll(sequence, codecs, values);
      return sequence.finish();
    },
    decode(input: unknown, path: CodingPath) {
      const opened = ArrayReader.open(input, path);
      if (!opened.ok) return opened;
      return readAll(opened.value, codecs, resolved);
    },
  };
}
