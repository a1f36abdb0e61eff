/**
 * Codec configuration.
 */

import { type CodecLogger, NOOP_LOGGER } from "./logger";

/** How a packed sequence treats elements after the last expected position. */
export type TrailingElementsPolicy = "ignore" | "reject";

export interface CodecOptions {
  /** Receives decode diagnostics (default: NOOP_LOGGER) */
  logger?: CodecLogger;

  /**
   * Extra elements after a packed multi-value payload.
   * "ignore" leaves them unread and logs at debug level; "reject" fails the decode.
   * @default "ignore"
   */
  trailingElements?: TrailingElementsPolicy;
}

export type ResolvedCodecOptions = Required<CodecOptions>;

export function resolveCodecOptions(options: CodecOptions = {}): ResolvedCodecOptions {
  return {
    logger: options.logger ?? NOOP_LOGGER,
    trailingElements: options.trailingElements ?? "ignore",
  };
}
