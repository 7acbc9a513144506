import crypto from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import logger from "../logger";
import { Errors } from "../utils/apiError";

/** Constant-time comparison of a received credential with the expected one */
export const matchesSecret = (received: string | undefined, expected: string): boolean => {
  if (!received || received.length !== expected.length) return false;
  try {
    return crypto.timingSafeEqual(Buffer.from(received), Buffer.from(expected));
  } catch (error) {
    logger.warn("[Auth] Secret comparison failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
};

/** Timing-safe cron secret verification */
export const verifyCronSecret = (
  authHeader: string | undefined,
  cronSecret: string | undefined
): boolean => {
  if (!cronSecret) {
    logger.warn("[Cron] CRON_SECRET not configured, rejecting request");
    return false;
  }
  return matchesSecret(authHeader, `Bearer ${cronSecret}`);
};

export function requireCronSecret(cronSecret: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!verifyCronSecret(req.headers.authorization, cronSecret)) {
      logger.warn("[Cron] Unauthorized cron request", { path: req.path });
      return Errors.unauthorized(res);
    }
    next();
  };
}
