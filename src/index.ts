import { config, isWebhookConfigured } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createApp } from "./app.js";
import { createWebhookClient } from "./services/webhookClient.js";

const webhookClient = createWebhookClient(config.webhook);
const app = createApp(config, { webhookClient });

// ── Start server ────────────────────────────────────────────────────────────
const server = app.listen(config.port, () => {
  logger.info({
    action: "server_start",
    port: config.port,
    env: config.env,
    basePath: config.basePath || "/",
    model: config.model.name,
    webhookConfigured: isWebhookConfigured(config),
    tlsVerify: config.webhook.tlsVerify,
    message: `Webhook relay listening on port ${config.port}`,
  });
  if (!config.webhook.tlsVerify) {
    logger.warn({
      action: "tls_verification_disabled",
      message: "N8N_TLS_VERIFY=false: webhook certificates are not verified",
    });
  }
});

// ── Graceful shutdown ───────────────────────────────────────────────────────
function shutdown(signal: string): void {
  logger.info({ action: "shutdown_start", signal });

  server.close(() => {
    webhookClient
      .close()
      .then(() => {
        logger.info({ action: "shutdown_complete", signal });
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({
          action: "shutdown_failed",
          signal,
          error: err instanceof Error ? err.message : String(err),
        });
        process.exit(1);
      });
  });

  // Force exit after 10s if connections won't drain
  setTimeout(() => {
    logger.error({ action: "shutdown_forced", signal });
    process.exit(1);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

export default app;
