import type { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import type { Settings } from "../config/index.js";
import { logger } from "../config/logger.js";
import { AppError } from "./error-handler.js";
import type { AuthMethod, CallerIdentity } from "../types/common.js";

export const DEFAULT_ROLE = "user";

export const MOCK_IDENTITY: Readonly<CallerIdentity> = {
  id: "local-dev",
  name: "Local Developer",
  email: "dev@localhost",
  role: "admin",
};

// ── JWT payload shape ───────────────────────────────────────────────────────

interface JwtPayload {
  sub?: string;
  id?: string;
  email?: string;
  name?: string;
  role?: string;
}

/**
 * Decode and verify a JWT token. Returns the payload or null on failure.
 * Exported for testing.
 */
export function verifyJwt(token: string, secret: string): JwtPayload | null {
  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === "string") return null;
    return {
      sub: decoded.sub,
      id: typeof decoded.id === "string" ? decoded.id : undefined,
      email: typeof decoded.email === "string" ? decoded.email : undefined,
      name: typeof decoded.name === "string" ? decoded.name : undefined,
      role: typeof decoded.role === "string" ? decoded.role : undefined,
    };
  } catch (err) {
    logger.debug({
      action: "jwt_rejected",
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

export function identityFromJwt(payload: JwtPayload): CallerIdentity {
  const id = payload.sub ?? payload.id ?? payload.email ?? "unknown";
  const email = payload.email ?? "";
  return {
    id,
    name: payload.name ?? email,
    email,
    role: payload.role ?? DEFAULT_ROLE,
  };
}

// ── Auth detection helpers ──────────────────────────────────────────────────

function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) return null;
  return authHeader.slice(7);
}

function header(req: Request, name: string): string | undefined {
  const value = req.get(name);
  return value ? value : undefined;
}

/**
 * Mock identity for local development: X-User-* headers, falling back to a
 * fixed developer account.
 * Exported for testing.
 */
export function identityFromHeaders(req: Request): CallerIdentity {
  const email = header(req, "x-user-email");
  return {
    id: header(req, "x-user-id") ?? email ?? MOCK_IDENTITY.id,
    name: header(req, "x-user-name") ?? MOCK_IDENTITY.name,
    email: email ?? MOCK_IDENTITY.email,
    role: header(req, "x-user-role") ?? MOCK_IDENTITY.role,
  };
}

function authenticate(req: Request, user: CallerIdentity, method: AuthMethod): void {
  req.context.user = user;
  req.context.authMethod = method;
}

// ── Middleware ──────────────────────────────────────────────────────────────

/**
 * Resolves the verified caller for every request.
 *
 * In mock mode (AUTH_MODE=mock) the caller comes from X-User-* headers.
 * In JWT mode (AUTH_MODE=jwt) a `Bearer <jwt>` signed with JWT_SECRET is
 * required; anything else is a 401.
 */
export function createAuth(settings: Settings) {
  return function auth(req: Request, _res: Response, next: NextFunction): void {
    if (settings.authMode === "mock") {
      authenticate(req, identityFromHeaders(req), "mock");
      next();
      return;
    }

    const token = extractBearerToken(req);
    if (!token) {
      next(new AppError("Authentication required", 401, "auth_required"));
      return;
    }

    const payload = verifyJwt(token, settings.jwtSecret);
    if (!payload) {
      next(new AppError("Invalid or expired token", 401, "invalid_token"));
      return;
    }

    authenticate(req, identityFromJwt(payload), "jwt");
    next();
  };
}

/** The verified caller, or a 401 when the identity provider supplied none. */
export function requireCaller(req: Request): CallerIdentity {
  const user = req.context?.user;
  if (!user) {
    throw new AppError("Authentication required", 401, "auth_required");
  }
  return user;
}
