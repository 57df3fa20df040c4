import { describe, it, expect, vi } from "vitest";
import { Writable } from "node:stream";
import winston from "winston";
import { REDACTED, logger, redactSecrets, registerSecrets } from "../src/config/logger.js";

function redact(info: Record<string, unknown>, secrets: string[] = []) {
  const format = redactSecrets({ secrets });
  const result = format.transform({ level: "info", message: "", ...info }, format.options);
  if (typeof result === "boolean") throw new Error("entry was filtered out");
  return result;
}

describe("redactSecrets", () => {
  it("replaces sensitive keys", () => {
    const entry = redact({
      authorization: "Bearer test-token",
      authToken: "test-token",
      userEmail: "ada@example.com",
    });

    expect(entry.authorization).toBe(REDACTED);
    expect(entry.authToken).toBe(REDACTED);
    expect(entry.userEmail).toBe("ada@example.com");
  });

  it("masks configured secrets inside string values", () => {
    const entry = redact(
      { message: "sent test-token upstream", error: "rejected test-token", status: 401 },
      ["test-token"],
    );

    expect(entry.message).toBe(`sent ${REDACTED} upstream`);
    expect(entry.error).toBe(`rejected ${REDACTED}`);
    expect(entry.status).toBe(401);
  });

  it("ignores unset secrets", () => {
    const format = redactSecrets({ secrets: [undefined, ""] });
    const result = format.transform({ level: "info", message: "nothing to hide" }, format.options);
    expect(result).toEqual({ level: "info", message: "nothing to hide" });
  });

  it("walks nested objects and arrays", () => {
    const entry = redact(
      {
        message: {
          action: "webhook_http_error",
          authorization: "Bearer test-token",
          body: "rejected test-token",
          upstream: { token: "test-token", attempts: ["test-token", 2] },
        },
      },
      ["test-token"],
    );

    expect(entry.message).toEqual({
      action: "webhook_http_error",
      authorization: REDACTED,
      body: `rejected ${REDACTED}`,
      upstream: { token: REDACTED, attempts: [REDACTED, 2] },
    });
  });

  it("leaves the caller's object untouched", () => {
    const meta = { action: "webhook_request", token: "test-token" };
    redact({ message: meta }, ["test-token"]);
    expect(meta.token).toBe("test-token");
  });
});

describe("logger", () => {
  it("masks registered secrets in entries logged without a message", async () => {
    const lines: string[] = [];
    const transport = new winston.transports.Stream({
      stream: new Writable({
        write(chunk, _encoding, callback) {
          lines.push(String(chunk));
          callback();
        },
      }),
    });
    registerSecrets("test-logger-token");
    logger.add(transport);

    try {
      logger.error({
        action: "webhook_http_error",
        status: 401,
        body: "rejected credentials: Bearer test-logger-token",
        authorization: "Bearer test-logger-token",
      });
      await vi.waitFor(() => expect(lines).toHaveLength(1));
    } finally {
      logger.remove(transport);
    }

    expect(JSON.parse(lines[0]).message).toEqual({
      action: "webhook_http_error",
      status: 401,
      body: `rejected credentials: Bearer ${REDACTED}`,
      authorization: REDACTED,
    });
  });
});
