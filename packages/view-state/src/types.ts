/**
 * Payload records carried by ViewState variants.
 */

import { z } from "zod";

export const EDIT_SUBVIEWS = ["headers", "query", "body"] as const;

export type EditSubview = (typeof EDIT_SUBVIEWS)[number];

export const ItemSchema = z.object({
  name: z.string(),
});

export type Item = z.infer<typeof ItemSchema>;

/** A websocket session and the messages exchanged over it. */
export const ConnectionSchema = z.object({
  url: z.string().url(),
  messages: z.array(z.string()),
});

export type Connection = z.infer<typeof ConnectionSchema>;
