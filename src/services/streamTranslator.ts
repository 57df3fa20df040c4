import { v4 as uuidv4 } from "uuid";
import { logger } from "../config/logger.js";
import type { JsonValue } from "../types/common.js";
import type { ChatCompletionResponse } from "../types/openai.js";
import type { TransportErrorKind, UpstreamResult } from "../types/webhook.js";
import { WebhookTransportError, classifyTransportError } from "./webhookClient.js";

export const DATA_PREFIX = "data: ";
export const DONE_FRAME = "data: [DONE]\n\n";

export function sseFrame(data: string): string {
  return `${DATA_PREFIX}${data}\n\n`;
}

export function errorFrame(message: string): string {
  return sseFrame(JSON.stringify({ error: message }));
}

function transportErrorFrame(errorKind: TransportErrorKind, message: string): string {
  return errorFrame(
    errorKind === "connection"
      ? `Connection error: ${message}`
      : `Unexpected error: ${message}`,
  );
}

/**
 * Frame one upstream line. Lines the webhook already framed as SSE keep
 * their prefix; blank lines produce nothing.
 */
export function frameLine(line: string): string | null {
  const text = line.trimEnd();
  if (!text) return null;
  return text.startsWith(DATA_PREFIX) ? `${text}\n\n` : sseFrame(text);
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pick the assistant text out of a buffered webhook reply: `content`, then `response`, then the whole reply. */
export function extractContent(payload: JsonValue): JsonValue {
  if (isJsonObject(payload)) {
    if ("content" in payload) return payload.content;
    if ("response" in payload) return payload.response;
  }
  return typeof payload === "string" ? payload : JSON.stringify(payload);
}

export function generateCompletionId(): string {
  return `chatcmpl-${uuidv4().replace(/-/g, "").slice(0, 8)}`;
}

/** Wrap a buffered reply in a chat.completion object. Token usage is unknown, so it is reported as zero. */
export function buildCompletion(
  payload: JsonValue,
  model: string,
): ChatCompletionResponse {
  return {
    id: generateCompletionId(),
    object: "chat.completion",
    created: Math.floor(Date.now() / 1000),
    model,
    choices: [
      {
        index: 0,
        message: { role: "assistant", content: extractContent(payload) },
        finish_reason: "stop",
      },
    ],
    usage: {
      prompt_tokens: 0,
      completion_tokens: 0,
      total_tokens: 0,
    },
  };
}

/**
 * Turn a webhook result into SSE frames for the client.
 *
 * Only the buffered branch appends `[DONE]`: error branches stop after their
 * error frame, and the streaming branch relays whatever terminator the
 * webhook sends.
 */
export async function* translateUpstream(
  result: UpstreamResult,
  model: string,
): AsyncGenerator<string> {
  switch (result.kind) {
    case "http_error":
      logger.error({
        action: "webhook_http_error",
        status: result.status,
        body: result.body,
      });
      yield errorFrame(`n8n webhook error: ${result.body}`);
      return;

    case "transport_error":
      logger.error({
        action: "webhook_transport_error",
        errorKind: result.errorKind,
        error: result.message,
      });
      yield transportErrorFrame(result.errorKind, result.message);
      return;

    case "buffered":
      yield sseFrame(JSON.stringify(buildCompletion(result.payload, model)));
      yield DONE_FRAME;
      return;

    case "streaming": {
      let relayed = 0;
      try {
        for await (const line of result.lines) {
          const frame = frameLine(line);
          if (frame === null) continue;
          relayed++;
          yield frame;
        }
      } catch (err) {
        const errorKind =
          err instanceof WebhookTransportError ? err.errorKind : classifyTransportError(err);
        const message = err instanceof Error ? err.message : String(err);
        logger.error({
          action: "webhook_stream_error",
          errorKind,
          error: message,
          relayed,
        });
        yield transportErrorFrame(errorKind, message);
        return;
      }
      logger.debug({ action: "webhook_stream_end", relayed });
      return;
    }
  }
}
