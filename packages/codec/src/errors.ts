import { formatPath } from "./path";
import type { CodingPath } from "./types/structured";

export type CodecErrorCode =
  | "AMBIGUOUS_OR_MISSING_DISCRIMINATOR"
  | "UNKNOWN_DISCRIMINATOR"
  | "PAYLOAD_TYPE_MISMATCH"
  | "TRUNCATED_SEQUENCE"
  | "TRAILING_ELEMENTS"
  | "DATA_CORRUPTED"
  | "ENCODE_ERROR";

export class CodecError extends Error {
  readonly code: CodecErrorCode;
  readonly path: CodingPath;
  readonly details?: Record<string, unknown>;

  constructor(code: CodecErrorCode, message: string, path: CodingPath, details?: Record<string, unknown>) {
    super(`${message} at ${formatPath(path)}`);
    this.code = code;
    this.path = path;
    this.details = details;
    this.name = this.constructor.name;
  }
}

/* Zero or several discriminator keys in a container that must hold exactly one */
export class AmbiguousDiscriminatorError extends CodecError {
  constructor(message: string, path: CodingPath, details?: Record<string, unknown>) {
    super("AMBIGUOUS_OR_MISSING_DISCRIMINATOR", message, path, details);
  }
}

export class UnknownDiscriminatorError extends CodecError {
  constructor(message: string, path: CodingPath, details?: Record<string, unknown>) {
    super("UNKNOWN_DISCRIMINATOR", message, path, details);
  }
}

export class PayloadTypeMismatchError extends CodecError {
  constructor(message: string, path: CodingPath, details?: Record<string, unknown>) {
    super("PAYLOAD_TYPE_MISMATCH", message, path, details);
  }
}

export class TruncatedSequenceError extends CodecError {
  constructor(message: string, path: CodingPath, details?: Record<string, unknown>) {
    super("TRUNCATED_SEQUENCE", message, path, details);
  }
}

export class TrailingElementsError extends CodecError {
  constructor(message: string, path: CodingPath, details?: Record<string, unknown>) {
    super("TRAILING_ELEMENTS", message, path, details);
  }
}

export class DataCorruptedError extends CodecError {
  constructor(message: string, path: CodingPath, details?: Record<string, unknown>) {
    super("DATA_CORRUPTED", message, path, details);
  }
}

export class CodecEncodeError extends CodecError {
  constructor(message: string, path: CodingPath, details?: Record<string, unknown>) {
    super("ENCODE_ERROR", message, path, details);
  }
}
