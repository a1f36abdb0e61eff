/**
 * Keyed variant codec.
 *
 * A closed tagged union is written as an object holding exactly one key,
 * the discriminator of the active variant:
 *
 *   { "empty": true }                 payload-less variant
 *   { "editing": "body" }             single payload, encoded by its own codec
 *   { "list": [selectedId, items] }   several payloads, packed in declaration order
 */

import { presenceMarker } from "./codecs";
import {
  AmbiguousDiscriminatorError,
  CodecEncodeError,
  UnknownDiscriminatorError,
  type CodecError,
} from "./errors";
import { type CodecOptions, resolveCodecOptions, type ResolvedCodecOptions } from "./options";
import { type CodecTuple, packValues, tupleCodec, unpackValues } from "./packer";
import { err, mapResult, ok, type Result, unwrap } from "./result";
import { ObjectReader, ObjectWriter } from "./structured";
import type { Codec, CodingPath, StructuredObject } from "./types/structured";
import type { TaggedEnum } from "./types/tagged-enum";

export interface UnitVariant {
  readonly arity: "unit";
  readonly codec: Codec<undefined>;
}

export interface SingleVariant<T> {
  readonly arity: "single";
  readonly codec: Codec<T>;
}

export interface TupleVariant<T extends readonly unknown[]> {
  readonly arity: "tuple";
  /**
   * Standalone array codec over `codecs`, built with default options.
   * A variant codec never calls it: it packs through `codecs` with its own options.
   */
  readonly codec: Codec<T>;
  readonly codecs: CodecTuple<T>;
}

export type VariantShape = UnitVariant | SingleVariant<unknown> | TupleVariant<readonly unknown[]>;

export type VariantDefinition = Readonly<Record<string, VariantShape>>;

type PayloadOf<S> = S extends { readonly codec: Codec<infer T> } ? T : never;

export type VariantsOf<D extends VariantDefinition> = { [K in keyof D]: PayloadOf<D[K]> };

/** In-memory value of the union described by `D`. */
export type VariantValue<D extends VariantDefinition> = TaggedEnum<VariantsOf<D>>;

export interface VariantCodec<T> extends Codec<T> {
  /** Discriminator keys in declaration order. */
  readonly keys: readonly string[];
  encode(value: T, path?: CodingPath): StructuredObject;
  decode(input: unknown, path?: CodingPath): Result<T, CodecError>;
  /** Like `decode`, but throws the CodecError. */
  decodeOrThrow(input: unknown): T;
}

export function unit(): UnitVariant {
  return { arity: "unit", codec: presenceMarker };
}

export function single<T>(codec: Codec<T>): SingleVariant<T> {
  return { arity: "single", codec };
}

export function tuple<T extends readonly unknown[]>(...codecs: CodecTuple<T>): TupleVariant<T> {
  const name = `(${codecs.map((codec) => codec.name).join(", ")})`;
  return { arity: "tuple", codec: tupleCodec(name, codecs), codecs };
}

interface AnyVariant {
  readonly type: string;
  readonly data?: unknown;
}

class KeyedVariantCodec implements VariantCodec<AnyVariant> {
  readonly name: string;
  readonly keys: readonly string[];
  private readonly variants: ReadonlyMap<string, VariantShape>;
  private readonly options: ResolvedCodecOptions;

  constructor(name: string, definition: VariantDefinition, options?: CodecOptions) {
    this.name = name;
    this.variants = new Map(Object.entries(definition));
    this.keys = Object.freeze([...this.variants.keys()]);
    this.options = resolveCodecOptions(options);
  }

  encode(value: AnyVariant, path: CodingPath = []): StructuredObject {
    const shape = this.variants.get(value.type);
    if (!shape) {
      throw new CodecEncodeError(`'${value.type}' is not a variant of ${this.name}`, path, {
        key: value.type,
        knownKeys: this.keys,
      });
    }

    const writer = ObjectWriter.open(path);
    switch (shape.arity) {
      case "unit":
        writer.writeKey(value.type, shape.codec, undefined);
        break;
      case "single":
        writer.writeKey(value.type, shape.codec, value.data);
        break;
      case "tuple":
        if (!Array.isArray(value.data)) {
          throw new CodecEncodeError(`Variant '${value.type}' of ${this.name} needs a tuple payload`, path, {
            key: value.type,
          });
        }
        packValues(writer, value.type, shape.codecs, value.data);
        break;
      default:
        shape satisfies never;
    }
    return writer.finish();
  }

  decode(input: unknown, path: CodingPath = []): Result<AnyVariant, CodecError> {
    const opened = ObjectReader.open(input, path);
    if (!opened.ok) return opened;
    const reader = opened.value;

    // the discriminator is resolved before any payload is touched
    const presentKeys = reader.presentKeys();
    if (presentKeys.length !== 1) {
      this.options.logger.warn("rejected discriminator", {
        codec: this.name,
        path,
        presentKeys,
      });
      return err(
        new AmbiguousDiscriminatorError(
          `${this.name} expects exactly one discriminator key but found ${presentKeys.length}`,
          path,
          { presentKeys, knownKeys: this.keys },
        ),
      );
    }

    const key = presentKeys[0];
    const shape = this.variants.get(key);
    if (!shape) {
      this.options.logger.warn("rejected discriminator", { codec: this.name, path, key });
      return err(
        new UnknownDiscriminatorError(`'${key}' is not a variant of ${this.name}`, path, {
          key,
          knownKeys: this.keys,
        }),
      );
    }

    this.options.logger.debug("decoding variant", { codec: this.name, path, key, arity: shape.arity });
    switch (shape.arity) {
      case "unit": {
        const marker = reader.readValue(key, shape.codec);
        if (!marker.ok) return marker;
        return ok({ type: key });
      }
      case "single":
        return mapResult(reader.readValue(key, shape.codec), (data) => ({ type: key, data }));
      case "tuple":
        return mapResult(unpackValues(reader, key, shape.codecs, this.options), (data) => ({ type: key, data }));
      default:
        shape satisfies never;
        throw new UnknownDiscriminatorError(`'${key}' has no decoder in ${this.name}`, path, { key });
    }
  }

  decodeOrThrow(input: unknown): AnyVariant {
    return unwrap(this.decode(input));
  }
}

/**
 * Build the codec for a closed union from its discriminator keys and their payload shapes.
 *
 * @example
 * const shapeCodec = defineVariantCodec("Shape", {
 *   point: unit(),
 *   circle: single(numberCodec),
 *   rect: tuple(numberCodec, numberCodec),
 * });
 * shapeCodec.encode({ type: "rect", data: [2, 3] }); // { rect: [2, 3] }
 */
export function defineVariantCodec<D extends VariantDefinition>(
  name: string,
  definition: D,
  options?: CodecOptions,
): VariantCodec<VariantValue<D>>;
export function defineVariantCodec(
  name: string,
  definition: VariantDefinition,
  options?: CodecOptions,
): VariantCodec<AnyVariant> {
  return new KeyedVariantCodec(name, definition, options);
}
