// ── Webhook wire types ──────────────────────────────────────────────────────

import type { CallerIdentity, JsonValue } from "./common.js";
import type { ChatCompletionRequest } from "./openai.js";

/** JSON body POSTed to the webhook. */
export interface UpstreamEnvelope
  extends Omit<ChatCompletionRequest, "user"> {
  user: CallerIdentity;
}

export type TransportErrorKind = "connection" | "unexpected";

export type UpstreamResult =
  | { kind: "http_error"; status: number; body: string }
  | { kind: "transport_error"; errorKind: TransportErrorKind; message: string }
  | { kind: "streaming"; lines: AsyncIterable<string> }
  | { kind: "buffered"; payload: JsonValue };
