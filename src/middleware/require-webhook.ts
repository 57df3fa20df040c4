import type { Request, Response, NextFunction } from "express";
import { isWebhookConfigured } from "../config/index.js";
import type { Settings } from "../config/index.js";
import { AppError } from "./error-handler.js";

/** Fails fast with a 500 before anything is sent upstream when no webhook URL is set. */
export function requireWebhook(settings: Settings) {
  return function checkWebhook(_req: Request, _res: Response, next: NextFunction): void {
    if (!isWebhookConfigured(settings)) {
      next(
        new AppError(
          "n8n webhook URL not configured. Please set the N8N_WEBHOOK_URL.",
          500,
          "webhook_not_configured",
        ),
      );
      return;
    }
    next();
  };
}
