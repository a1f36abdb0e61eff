import { formatPath } from "./path";
import type { CodingPath } from "./types/structured";

/** Context attached to every decode diagnostic; `path` locates the container being read. */
export interface DecodeLogEntry {
  path: CodingPath;
  codec?: string;
  [field: string]: unknown;
}

/**
 * Sink for decode diagnostics. The codec only reports dispatch (`debug`)
 * and rejected input (`warn`); failures themselves travel in the Result.
 */
export interface CodecLogger {
  debug(message: string, entry: DecodeLogEntry): void;
  warn(message: string, entry: DecodeLogEntry): void;
}

const noop = (): void => undefined;

export const NOOP_LOGGER: CodecLogger = {
  debug: noop,
  warn: noop,
};

function render(prefix: string, message: string, { path, codec, ...rest }: DecodeLogEntry): [string, Record<string, unknown>] {
  const source = codec ? `${codec} ` : "";
  return [`[${prefix}] ${source}${message} at ${formatPath(path)}`, rest];
}

/** Writes to the console with the codec name and rendered path folded into the line. */
export function createConsoleLogger(prefix = "KeyedUnion"): CodecLogger {
  return {
    debug: (message, entry) => console.debug(...render(prefix, message, entry)),
    warn: (message, entry) => console.warn(...render(prefix, message, entry)),
  };
}
