export {
  arrayOf,
  booleanCodec,
  fromZod,
  nullable,
  numberCodec,
  presenceMarker,
  stringCodec,
  stringEnum,
  urlCodec,
  uuidCodec,
} from "./codecs";
export {
  AmbiguousDiscriminatorError,
  CodecEncodeError,
  CodecError,
  DataCorruptedError,
  PayloadTypeMismatchError,
  TrailingElementsError,
  TruncatedSequenceError,
  UnknownDiscriminatorError,
} from "./errors";
export type { CodecErrorCode } from "./errors";
export { fromBytes, fromJson, toBytes, toJson } from "./json";
export { createConsoleLogger, NOOP_LOGGER } from "./logger";
export type { CodecLogger, DecodeLogEntry } from "./logger";
export { resolveCodecOptions } from "./options";
export type { CodecOptions, ResolvedCodecOptions, TrailingElementsPolicy } from "./options";
export { packValues, tupleCodec, unpackValues } from "./packer";
export type { CodecTuple } from "./packer";
export { appendPath, formatPath } from "./path";
export { err, isErr, isOk, mapResult, ok, unwrap } from "./result";
export type { Result } from "./result";
export { ArrayReader, ArrayWriter, isPlainObject, ObjectReader, ObjectWriter } from "./structured";
export type { Codec, CodecValue, CodingPath, StructuredObject, StructuredValue } from "./types/structured";
export type { TaggedEnum } from "./types/tagged-enum";
export { defineVariantCodec, single, tuple, unit } from "./variant";
export type {
  SingleVariant,
  TupleVariant,
  UnitVariant,
  VariantCodec,
  VariantDefinition,
  VariantShape,
  VariantsOf,
  VariantValue,
} from "./variant";
