import winston from "winston";
import { config } from "./index.js";

export const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS = new Set(["authorization", "authtoken", "token", "jwtsecret"]);

// Secrets the running app holds (webhook token, JWT secret), masked wherever
// they turn up in a log entry.
const registeredSecrets = new Set<string>();

/** Mask these values in every log entry written from now on. */
export function registerSecrets(...secrets: Array<string | undefined>): void {
  for (const secret of secrets) {
    if (secret) registeredSecrets.add(secret);
  }
}

interface RedactOptions {
  secrets?: Array<string | undefined>;
}

function maskSecrets(value: string, secrets: string[]): string {
  return secrets.reduce((text, secret) => text.split(secret).join(REDACTED), value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function scrub(value: unknown, secrets: string[], seen: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return secrets.length > 0 ? maskSecrets(value, secrets) : value;
  }
  if (Array.isArray(value)) {
    if (seen.has(value)) return value;
    seen.add(value);
    return value.map((item) => scrub(item, secrets, seen));
  }
  if (!isPlainObject(value) || seen.has(value)) return value;
  seen.add(value);

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = SENSITIVE_KEYS.has(key.toLowerCase())
      ? REDACTED
      : scrub(nested, secrets, seen);
  }
  return copy;
}

/**
 * Drops credentials from a log entry at any depth: sensitive keys are
 * replaced wholesale and every known secret is masked inside string values.
 * `logger.info({ ... })` without a `message` key arrives here wrapped as
 * `{ message: { ... } }`, so nested objects are walked too.
 */
export const redactSecrets = winston.format((info, opts: RedactOptions = {}) => {
  const secrets = [...(opts.secrets ?? []), ...registeredSecrets].filter(
    (secret): secret is string => typeof secret === "string" && secret.length > 0,
  );
  const seen = new WeakSet<object>([info]);

  for (const key of Object.keys(info)) {
    info[key] = SENSITIVE_KEYS.has(key.toLowerCase())
      ? REDACTED
      : scrub(info[key], secrets, seen);
  }
  return info;
});

export const logger = winston.createLogger({
  level: config.debug ? "debug" : config.logLevel,
  format: winston.format.combine(
    redactSecrets(),
    winston.format.timestamp(),
    winston.format.json(),
  ),
  defaultMeta: { service: "webhook-relay" },
  transports: [new winston.transports.Console()],
});
