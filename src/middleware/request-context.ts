import type { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";

export function requestContext(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  req.context = {
    requestId: req.get("x-request-id") || uuidv4(),
    startTime: Date.now(),
  };
  res.setHeader("X-Request-Id", req.context.requestId);
  next();
}
