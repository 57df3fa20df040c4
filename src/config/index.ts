import "dotenv/config";
import { z } from "zod";

export const WEBHOOK_URL_PLACEHOLDER = "YOUR_N8N_WEBHOOK_URL";
export const WEBHOOK_TOKEN_PLACEHOLDER = "YOUR_N8N_WEBHOOK_AUTH_TOKEN";

// Blank values count as unset so they fall back like missing ones.
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const number = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().finite()).catch(fallback);

// setTimeout takes at most 2^31 - 1 ms; longer delays fire immediately.
export const MAX_TIMER_MS = 2_147_483_647;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

const integer = (fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER) =>
  z
    .preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max))
    .catch(fallback);

const FLAG_VALUES: Record<string, boolean> = {
  true: true, "1": true, yes: true, on: true,
  false: false, "0": false, no: false, off: false,
};

const flag = (fallback: boolean) =>
  z
    .string()
    .transform((value) => FLAG_VALUES[value.trim().toLowerCase()] ?? fallback)
    .catch(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).catch("development"),
  PORT: integer(3001, 1),
  LOG_LEVEL: z.string().min(1).catch("info"),
  CORS_ORIGIN: z.string().min(1).catch("http://localhost:3000"),
  AUTH_MODE: z.enum(["mock", "jwt"]).catch("mock"),
  JWT_SECRET: z.string().min(1).catch("webhook-relay-local-dev-secret"),
  BASE_PATH: z.string().catch(""),

  N8N_WEBHOOK_URL: z.string().catch(WEBHOOK_URL_PLACEHOLDER),
  N8N_WEBHOOK_AUTH_TOKEN: z.string().catch(""),
  N8N_MODEL_NAME: z.string().min(1).catch("n8n-agent"),
  N8N_MODEL_DESCRIPTION: z.string().min(1).catch("n8n Webhook Agent for AI interactions"),
  N8N_TIMEOUT: integer(120, 1, MAX_TIMEOUT_SECONDS),
  N8N_MAX_RETRIES: integer(3),
  N8N_RETRY_DELAY_MS: integer(250, 0, MAX_TIMER_MS),
  N8N_TLS_VERIFY: flag(true),
  N8N_DEFAULT_TEMPERATURE: number(0.7),
  N8N_DEFAULT_MAX_TOKENS: integer(2048, 1),
  N8N_DEFAULT_TOP_P: number(1.0),
  N8N_DEBUG: flag(false),
});

export interface WebhookSettings {
  readonly url: string;
  /** Bearer token sent to the webhook. Never logged. */
  readonly authToken?: string;
  /** Single deadline for the whole exchange, connect through last byte. */
  readonly timeoutMs: number;
  /** Extra attempts after a transport failure that happened before any response. */
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  /**
   * Verify the webhook's TLS certificate. Turning this off is meant for
   * webhooks on a trusted local network with self-signed certificates.
   */
  readonly tlsVerify: boolean;
}

export interface ModelSettings {
  readonly name: string;
  readonly description: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly topP: number;
}

export interface Settings {
  readonly env: "development" | "production" | "test";
  readonly port: number;
  readonly logLevel: string;
  readonly corsOrigin: string;
  readonly authMode: "mock" | "jwt";
  readonly jwtSecret: string;
  readonly basePath: string;
  readonly debug: boolean;
  readonly webhook: WebhookSettings;
  readonly model: ModelSettings;
}

function normalizeBasePath(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, "");
  if (!trimmed) return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

/**
 * Build the settings snapshot from an environment map. Missing or malformed
 * values fall back to their defaults, so this never throws.
 */
export function resolveSettings(
  env: Record<string, string | undefined> = process.env,
): Settings {
  const parsed = envSchema.parse(env);

  const token = parsed.N8N_WEBHOOK_AUTH_TOKEN.trim();
  const authToken =
    token && token !== WEBHOOK_TOKEN_PLACEHOLDER ? token : undefined;

  return Object.freeze({
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    corsOrigin: parsed.CORS_ORIGIN,
    authMode: parsed.AUTH_MODE,
    jwtSecret: parsed.JWT_SECRET,
    basePath: normalizeBasePath(parsed.BASE_PATH),
    debug: parsed.N8N_DEBUG,
    webhook: Object.freeze({
      url: parsed.N8N_WEBHOOK_URL.trim(),
      authToken,
      timeoutMs: parsed.N8N_TIMEOUT * 1000,
      maxRetries: parsed.N8N_MAX_RETRIES,
      retryDelayMs: parsed.N8N_RETRY_DELAY_MS,
      tlsVerify: parsed.N8N_TLS_VERIFY,
    }),
    model: Object.freeze({
      name: parsed.N8N_MODEL_NAME,
      description: parsed.N8N_MODEL_DESCRIPTION,
      temperature: parsed.N8N_DEFAULT_TEMPERATURE,
      maxTokens: parsed.N8N_DEFAULT_MAX_TOKENS,
      topP: parsed.N8N_DEFAULT_TOP_P,
    }),
  });
}

export function isWebhookConfigured(settings: Settings): boolean {
  const { url } = settings.webhook;
  return url !== "" && url !== WEBHOOK_URL_PLACEHOLDER;
}

export const config = resolveSettings(process.env);
