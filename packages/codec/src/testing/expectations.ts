import type { CodecError } from "../errors";
import type { Result } from "../result";

export function expectSuccess<T>(result: Result<T, CodecError>): T {
  if (!result.ok) {
    throw new Error(`Expected decode to succeed but it failed with ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

export function expectFailure<T>(result: Result<T, CodecError>): CodecError {
  if (result.ok) {
    throw new Error(`Expected decode to fail but it produced ${JSON.stringify(result.value)}`);
  }
  return result.error;
}
