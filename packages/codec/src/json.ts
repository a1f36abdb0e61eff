import { DataCorruptedError, type CodecError } from "./errors";
import { err, type Result } from "./result";
import type { Codec } from "./types/structured";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toJson<T>(codec: Codec<T>, value: T): string {
  return JSON.stringify(codec.encode(value, []));
}

export function fromJson<T>(codec: Codec<T>, text: string): Result<T, CodecError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err(new DataCorruptedError(`Input for ${codec.name} is not valid JSON`, [], { cause: messageOf(error) }));
  }
  return codec.decode(parsed, []);
}

export function toBytes<T>(codec: Codec<T>, value: T): Uint8Array {
  return utf8Encoder.encode(toJson(codec, value));
}

export function fromBytes<T>(codec: Codec<T>, bytes: Uint8Array): Result<T, CodecError> {
  let text: string;
  try {
    text = utf8Decoder.decode(bytes);
  } catch (error) {
    return err(new DataCorruptedError(`Input for ${codec.name} is not valid UTF-8`, [], { cause: messageOf(error) }));
  }
  return fromJson(codec, text);
}
