import { Router } from "express";
import type { Settings } from "../config/index.js";
import { logger } from "../config/logger.js";
import { requireCaller } from "../middleware/auth.js";
import type { EmbeddingsResponse } from "../types/openai.js";

export const EMBEDDING_DIMENSIONS = 1536;

// Placeholder: the webhook has no embeddings contract, so every request gets
// a single zero vector.
export function createEmbeddingsRouter(settings: Settings): Router {
  const router = Router();

  router.post("/", (req, res) => {
    const user = requireCaller(req);
    logger.info({
      action: "embeddings_request",
      requestId: req.context.requestId,
      userEmail: user.email,
    });

    const response: EmbeddingsResponse = {
      object: "list",
      data: [
        {
          object: "embedding",
          embedding: new Array<number>(EMBEDDING_DIMENSIONS).fill(0),
          index: 0,
        },
      ],
      model: settings.model.name,
      usage: { prompt_tokens: 0, total_tokens: 0 },
    };
    res.json(response);
  });

  return router;
}
