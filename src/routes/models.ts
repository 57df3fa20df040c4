import { Router } from "express";
import type { Settings } from "../config/index.js";
import { requireCaller } from "../middleware/auth.js";
import type { ModelList } from "../types/openai.js";

/**
 * Display name for a model id: dashes become spaces and each word is
 * capitalised, with letters after a digit counting as a new word
 * ("n8n-agent" → "N8N Agent").
 */
export function displayName(modelId: string): string {
  let previousIsLetter = false;
  let name = "";
  for (const char of modelId.replace(/-/g, " ")) {
    const isLetter = char.toLowerCase() !== char.toUpperCase();
    name += isLetter
      ? previousIsLetter ? char.toLowerCase() : char.toUpperCase()
      : char;
    previousIsLetter = isLetter;
  }
  return name;
}

export function createModelsRouter(settings: Settings): Router {
  const router = Router();

  router.get("/", (req, res) => {
    requireCaller(req);
    const { name, description } = settings.model;
    const response: ModelList = {
      object: "list",
      data: [
        {
          id: name,
          object: "model",
          created: Math.floor(Date.now() / 1000),
          owned_by: "n8n",
          permission: [],
          root: name,
          parent: null,
          name: displayName(name),
          description,
        },
      ],
    };
    res.json(response);
  });

  return router;
}
