import { setTimeout as delay } from "node:timers/promises";
import { Agent, errors, request } from "undici";
import type { Dispatcher } from "undici";
import type { WebhookSettings } from "../config/index.js";
import { logger, registerSecrets } from "../config/logger.js";
import type { JsonValue } from "../types/common.js";
import type {
  TransportErrorKind,
  UpstreamEnvelope,
  UpstreamResult,
} from "../types/webhook.js";

type ResponseBody = Dispatcher.ResponseData["body"];

export interface WebhookClient {
  /**
   * POST the envelope to the webhook. Never rejects: failures come back as
   * `http_error` or `transport_error` results.
   */
  send(envelope: UpstreamEnvelope, signal?: AbortSignal): Promise<UpstreamResult>;
  close(): Promise<void>;
}

/** Raised while reading a streaming webhook body. */
export class WebhookTransportError extends Error {
  constructor(
    message: string,
    public readonly errorKind: TransportErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WebhookTransportError";
  }
}

// ── Deadline ────────────────────────────────────────────────────────────────
// One timer for the whole exchange: connect, headers, body and retries.
// The caller's signal (client disconnect) aborts the same controller.

class ExchangeDeadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private expired = false;

  constructor(
    private readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal,
  ) {
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort(new Error(this.timeoutMessage));
    }, timeoutMs);

    if (callerSignal?.aborted) {
      this.onCallerAbort();
    } else {
      callerSignal?.addEventListener("abort", this.onCallerAbort, { once: true });
    }
  }

  private readonly onCallerAbort = (): void => {
    this.controller.abort(new Error("Request aborted by client"));
  };

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  get callerAborted(): boolean {
    return this.callerSignal?.aborted ?? false;
  }

  get timeoutMessage(): string {
    return `Webhook request timed out after ${this.timeoutMs / 1000}s`;
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener("abort", this.onCallerAbort);
  }
}

// ── Error classification ────────────────────────────────────────────────────

/**
 * Network-level failures (undici errors, refused/reset sockets, DNS) are
 * connection errors; everything else is unexpected.
 */
export function classifyTransportError(err: unknown): TransportErrorKind {
  if (err instanceof errors.UndiciError) return "connection";
  if (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    /^E[A-Z]+$/.test(err.code)
  ) {
    return "connection";
  }
  return "unexpected";
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    if (err.message) return err.message;
    if ("code" in err && typeof err.code === "string") return err.code;
    return err.name;
  }
  return String(err);
}

function describeFailure(
  err: unknown,
  deadline: ExchangeDeadline,
): { errorKind: TransportErrorKind; message: string } {
  if (deadline.timedOut) {
    return { errorKind: "connection", message: deadline.timeoutMessage };
  }
  if (deadline.callerAborted) {
    return { errorKind: "connection", message: "Request aborted by client" };
  }
  return { errorKind: classifyTransportError(err), message: errorMessage(err) };
}

// ── Body handling ───────────────────────────────────────────────────────────

/** Buffered replies are JSON when they parse, raw text otherwise. */
export function parsePayload(text: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/** Re-chunk a byte stream into `\n`-terminated lines (the last may lack one). */
export async function* splitLines(
  source: AsyncIterable<Uint8Array>,
): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let pending = "";

  for await (const chunk of source) {
    pending += decoder.decode(chunk, { stream: true });
    let newline = pending.indexOf("\n");
    while (newline !== -1) {
      yield pending.slice(0, newline + 1);
      pending = pending.slice(newline + 1);
      newline = pending.indexOf("\n");
    }
  }

  pending += decoder.decode();
  if (pending) yield pending;
}

async function* streamLines(
  body: ResponseBody,
  deadline: ExchangeDeadline,
): AsyncGenerator<string> {
  try {
    yield* splitLines(body);
  } catch (err) {
    const failure = describeFailure(err, deadline);
    throw new WebhookTransportError(failure.message, failure.errorKind, { cause: err });
  } finally {
    body.destroy();
    deadline.dispose();
  }
}

async function readResponse(
  response: Dispatcher.ResponseData,
  stream: boolean,
  deadline: ExchangeDeadline,
): Promise<UpstreamResult> {
  const { statusCode, body } = response;
  const ok = statusCode >= 200 && statusCode < 300;

  if (ok && stream) {
    return { kind: "streaming", lines: streamLines(body, deadline) };
  }

  try {
    const text = await body.text();
    if (!ok) return { kind: "http_error", status: statusCode, body: text };
    return { kind: "buffered", payload: parsePayload(text) };
  } catch (err) {
    return { kind: "transport_error", ...describeFailure(err, deadline) };
  } finally {
    body.destroy();
    deadline.dispose();
  }
}

async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal.aborted) return false;
    throw err;
  }
}

// ── Client ──────────────────────────────────────────────────────────────────

/**
 * Pool options for the webhook. undici's header and body timers are off and
 * its connect timer is no shorter than the deadline: `ExchangeDeadline` is
 * the only timeout on the exchange.
 */
export function agentOptions(settings: WebhookSettings): Agent.Options {
  return {
    headersTimeout: 0,
    bodyTimeout: 0,
    connect: {
      rejectUnauthorized: settings.tlsVerify,
      timeout: settings.timeoutMs,
    },
  };
}

export function createWebhookClient(
  settings: WebhookSettings,
  dispatcher: Dispatcher = new Agent(agentOptions(settings)),
): WebhookClient {
  registerSecrets(settings.authToken);
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (settings.authToken) {
    headers["Authorization"] = `Bearer ${settings.authToken}`;
  }

  return {
    async send(envelope, signal) {
      const deadline = new ExchangeDeadline(settings.timeoutMs, signal);
      const body = JSON.stringify(envelope);

      for (let attempt = 0; ; attempt++) {
        logger.debug({
          action: "webhook_request",
          url: settings.url,
          stream: envelope.stream,
          attempt,
          hasAuthToken: settings.authToken !== undefined,
          tlsVerify: settings.tlsVerify,
        });

        let response: Dispatcher.ResponseData;
        try {
          response = await request(settings.url, {
            method: "POST",
            headers,
            body,
            dispatcher,
            signal: deadline.signal,
          });
        } catch (err) {
          // Only failures before any response are retried; HTTP errors never are.
          if (attempt < settings.maxRetries && !deadline.signal.aborted) {
            logger.warn({
              action: "webhook_retry",
              attempt: attempt + 1,
              maxRetries: settings.maxRetries,
              error: errorMessage(err),
            });
            if (await pause(settings.retryDelayMs, deadline.signal)) continue;
          }
          deadline.dispose();
          return { kind: "transport_error", ...describeFailure(err, deadline) };
        }

        return readResponse(response, envelope.stream, deadline);
      }
    },

    async close() {
      await dispatcher.close();
    },
  };
}
