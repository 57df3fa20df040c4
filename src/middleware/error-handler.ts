import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger.js";
import type { ErrorResponse } from "../types/common.js";

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

// express.json() marks unparseable bodies with type "entity.parse.failed"
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = req.context?.requestId ?? "unknown";

  if (isBodyParseError(err)) {
    const body: ErrorResponse = {
      error: {
        message: "Request body is not valid JSON",
        type: "invalid_request_error",
        code: "invalid_json",
        requestId,
      },
    };
    res.status(400).json(body);
    return;
  }

  if (err instanceof AppError) {
    logger.log({
      level: err.statusCode >= 500 ? "error" : "warn",
      message: err.message,
      action: "request_error",
      requestId,
      code: err.code,
      statusCode: err.statusCode,
    });

    const body: ErrorResponse = {
      error: {
        message: err.message,
        type: err.name,
        code: err.code,
        requestId,
      },
    };
    res.status(err.statusCode).json(body);
    return;
  }

  logger.error({
    action: "unhandled_error",
    requestId,
    error: err.message,
    stack: err.stack,
  });

  const body: ErrorResponse = {
    error: {
      message: "Internal server error",
      type: "internal_error",
      code: "internal_error",
      requestId,
    },
  };
  res.status(500).json(body);
}
