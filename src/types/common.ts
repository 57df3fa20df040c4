export type AuthMethod = "jwt" | "mock";

/** Verified caller, forwarded verbatim to the webhook under `user`. */
export interface CallerIdentity {
  id: string;
  name: string;
  email: string;
  role: string;
}

export interface RequestContext {
  requestId: string;
  user?: CallerIdentity;
  authMethod?: AuthMethod;
  startTime: number;
}

declare global {
  namespace Express {
    interface Request {
      context: RequestContext;
    }
  }
}

export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    code: string | number;
    requestId: string;
  };
}

export interface StatusResponse {
  status: "ready" | "not_configured";
  configured: boolean;
  model: string;
  description: string;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };
