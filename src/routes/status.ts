import { Router } from "express";
import { isWebhookConfigured } from "../config/index.js";
import type { Settings } from "../config/index.js";
import { requireCaller } from "../middleware/auth.js";
import type { StatusResponse } from "../types/common.js";

export function createStatusRouter(settings: Settings): Router {
  const router = Router();

  router.get("/", (req, res) => {
    requireCaller(req);
    const configured = isWebhookConfigured(settings);
    const response: StatusResponse = {
      status: configured ? "ready" : "not_configured",
      configured,
      model: settings.model.name,
      description: settings.model.description,
    };
    res.json(response);
  });

  return router;
}
