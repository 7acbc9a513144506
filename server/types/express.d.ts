import type { Logger } from "../logger";

export type UserRole = "customer" | "admin";

/** Caller identity forwarded by the upstream gateway */
export type CurrentUser = {
  id: string;
  role: UserRole;
};

declare global {
  namespace Express {
    interface Request {
      currentUser?: CurrentUser;
      /** Unique request trace ID (from X-Request-ID header or generated) */
      requestId: string;
      /** Child logger with requestId pre-bound */
      log: Logger;
    }
  }
}

export {};
