import express from "express";
import type { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import type { Settings } from "./config/index.js";
import { registerSecrets } from "./config/logger.js";
import { requestContext } from "./middleware/request-context.js";
import { requestLogger } from "./middleware/request-logger.js";
import { errorHandler } from "./middleware/error-handler.js";
import { createAuth } from "./middleware/auth.js";
import { createStatusRouter } from "./routes/status.js";
import { createModelsRouter } from "./routes/models.js";
import { createChatCompletionsRouter } from "./routes/chat-completions.js";
import { createEmbeddingsRouter } from "./routes/embeddings.js";
import { createWebhookClient } from "./services/webhookClient.js";
import type { WebhookClient } from "./services/webhookClient.js";

export interface AppDependencies {
  webhookClient?: WebhookClient;
}

export function createApp(settings: Settings, deps: AppDependencies = {}): Express {
  registerSecrets(settings.webhook.authToken, settings.jwtSecret);
  const webhookClient = deps.webhookClient ?? createWebhookClient(settings.webhook);
  const app = express();
  const api = express.Router();

  // ── Global middleware ─────────────────────────────────────────────────────
  app.use(helmet());
  app.use(
    cors({
      origin: settings.corsOrigin,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: [
        "Content-Type", "Authorization",
        "X-Request-Id", "X-User-Id", "X-User-Name", "X-User-Email", "X-User-Role",
      ],
      exposedHeaders: ["X-Request-Id"],
    }),
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(requestContext);
  app.use(requestLogger);
  app.use(createAuth(settings));

  // ── Routes ────────────────────────────────────────────────────────────────
  api.use("/models", createModelsRouter(settings));
  api.use("/chat/completions", createChatCompletionsRouter(settings, webhookClient));
  api.use("/embeddings", createEmbeddingsRouter(settings));
  api.use("/", createStatusRouter(settings));
  app.use(settings.basePath || "/", api);

  // ── Error handler (must be last) ──────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
