import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { Settings } from "../config/index.js";
import { logger } from "../config/logger.js";
import { AppError } from "../middleware/error-handler.js";
import { requireCaller } from "../middleware/auth.js";
import { requireWebhook } from "../middleware/require-webhook.js";
import { errorFrame, translateUpstream } from "../services/streamTranslator.js";
import type { WebhookClient } from "../services/webhookClient.js";
import type { CallerIdentity, JsonValue } from "../types/common.js";
import type { ChatCompletionRequest } from "../types/openai.js";
import type { UpstreamEnvelope } from "../types/webhook.js";

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

// ── Request validation ──────────────────────────────────────────────────────

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValue),
    z.record(jsonValue),
  ]),
);

const messageSchema = z
  .object({
    role: z.string(),
    content: jsonValue.optional(),
  })
  .catchall(jsonValue);

function chatRequestSchema(settings: Settings) {
  const { model } = settings;
  return z.object({
    model: z.string().min(1).default(model.name),
    messages: z.array(messageSchema),
    stream: z.boolean().default(false),
    temperature: z.number().nullable().default(model.temperature),
    max_tokens: z.number().int().nullable().default(model.maxTokens),
    top_p: z.number().nullable().default(model.topP),
    frequency_penalty: z.number().nullable().default(0),
    presence_penalty: z.number().nullable().default(0),
    user: z.string().nullish(),
  });
}

/** Validate a chat request body, filling sampling defaults from settings. */
export function parseChatRequest(body: unknown, settings: Settings): ChatCompletionRequest {
  const parsed = chatRequestSchema(settings).safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new AppError(
      `Invalid chat completion request: ${where}${issue?.message ?? "malformed body"}`,
      400,
      "invalid_request",
    );
  }
  return parsed.data;
}

/** The webhook receives the request with the verified caller under `user`. */
export function buildEnvelope(
  request: ChatCompletionRequest,
  user: CallerIdentity,
): UpstreamEnvelope {
  return {
    model: request.model,
    messages: request.messages,
    stream: request.stream,
    temperature: request.temperature,
    max_tokens: request.max_tokens,
    top_p: request.top_p,
    frequency_penalty: request.frequency_penalty,
    presence_penalty: request.presence_penalty,
    user: {
      id: user.id,
      name: user.name,
      email: user.email,
      role: user.role,
    },
  };
}

// ── Relay ───────────────────────────────────────────────────────────────────

/** Write a frame, waiting for the socket to drain (or close) when it is full. */
function writeFrame(res: Response, frame: string): Promise<void> {
  if (res.write(frame)) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}

async function relay(
  req: Request,
  res: Response,
  client: WebhookClient,
  envelope: UpstreamEnvelope,
): Promise<void> {
  res.writeHead(200, SSE_HEADERS);
  res.flushHeaders();

  // Client went away: abort the webhook call and stop relaying.
  const disconnect = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) disconnect.abort();
  });

  let frames = 0;
  try {
    const result = await client.send(envelope, disconnect.signal);
    for await (const frame of translateUpstream(result, envelope.model)) {
      if (res.destroyed) break;
      await writeFrame(res, frame);
      frames++;
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({
      action: "chat_completion_relay_failed",
      requestId: req.context.requestId,
      error: message,
    });
    if (!res.destroyed) res.write(errorFrame(`Unexpected error: ${message}`));
  } finally {
    res.end();
  }

  logger.info({
    action: "chat_completion_done",
    requestId: req.context.requestId,
    frames,
    clientDisconnected: disconnect.signal.aborted,
    duration: Date.now() - req.context.startTime,
  });
}

// ── POST /chat/completions ──────────────────────────────────────────────────

export function createChatCompletionsRouter(
  settings: Settings,
  client: WebhookClient,
): Router {
  const router = Router();

  router.post(
    "/",
    requireWebhook(settings),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const user = requireCaller(req);
        const body = parseChatRequest(req.body, settings);

        logger.info({
          action: "chat_completion_request",
          requestId: req.context.requestId,
          userEmail: user.email,
          message: `chat completion request from user: ${user.email}`,
        });

        logger.debug({
          action: "chat_completion_detail",
          requestId: req.context.requestId,
          model: body.model,
          stream: body.stream,
          messageCount: body.messages.length,
          temperature: body.temperature,
          maxTokens: body.max_tokens,
          topP: body.top_p,
          webhookUrl: settings.webhook.url,
          hasAuthToken: settings.webhook.authToken !== undefined,
        });

        await relay(req, res, client, buildEnvelope(body, user));
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
