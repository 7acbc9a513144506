import type { Request, Response } from "express";
import { ZodError } from "zod";
import { DatabaseUnavailableError } from "../db";
import logger, { type Logger } from "../logger";
import { CommerceError } from "../services/commerce/errors";

/**
 * Standardized API Error Response
 *
 * All error responses from the server follow this structure:
 *
 *  {
 *    "error":   "MACHINE_READABLE_CODE",        // UPPER_SNAKE_CASE, always present
 *    "message": "Human-readable description.",   // always present
 *    "details": { ... }                          // optional: validation issues, field info, etc.
 *  }
 */
export interface ApiErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Send a standardized JSON error response.
 */
export function sendError(
  res: Response,
  status: number,
  error: string,
  message: string,
  details?: Record<string, unknown>
): Response {
  const body: ApiErrorBody = { error, message };
  if (details && Object.keys(details).length > 0) body.details = details;
  return res.status(status).json(body);
}

// ============================================================================
// Convenience helpers: one per common HTTP error status
// ============================================================================

export const Errors = {
  /** 400 Bad Request */
  badRequest: (res: Response, error: string, message: string, details?: Record<string, unknown>) =>
    sendError(res, 400, error, message, details),

  /** 400 Validation failed (includes Zod issues in details) */
  validation: (res: Response, issues: unknown, error = "VALIDATION_ERROR", message = "Request validation failed.") =>
    sendError(res, 400, error, message, { issues }),

  /** 401 Unauthorized */
  unauthorized: (res: Response, error = "UNAUTHORIZED", message = "Authentication required.") =>
    sendError(res, 401, error, message),

  /** 403 Forbidden */
  forbidden: (res: Response, error = "FORBIDDEN", message = "Insufficient permissions.") =>
    sendError(res, 403, error, message),

  /** 404 Not Found */
  notFound: (res: Response, error = "NOT_FOUND", message = "Resource not found.") =>
    sendError(res, 404, error, message),

  /** 500 Internal Server Error */
  internal: (res: Response, error = "INTERNAL_ERROR", message = "An unexpected error occurred.") =>
    sendError(res, 500, error, message),

  /** 503 Database Unavailable */
  dbUnavailable: (res: Response) =>
    sendError(res, 503, "DATABASE_UNAVAILABLE", "Database unavailable. Please try again shortly."),
} as const;

// ============================================================================
// Commerce errors
// ============================================================================

/**
 * Maps an error thrown by a commerce operation to a response. Known errors
 * keep their code and status; anything else is logged and becomes a 500.
 */
export function sendCommerceError(res: Response, error: unknown, log: Logger = logger): Response {
  if (error instanceof CommerceError) {
    if (error.status >= 500) {
      log.error("[API] Commerce operation failed", { code: error.code, error });
    }
    return sendError(res, error.status, error.code, error.message, error.details);
  }
  if (error instanceof ZodError) {
    return Errors.validation(res, error.flatten());
  }
  if (error instanceof DatabaseUnavailableError) {
    return Errors.dbUnavailable(res);
  }

  log.error("[API] Unhandled error", { error });
  return Errors.internal(res);
}

/** Wraps an async handler so rejections go through sendCommerceError. */
export function withCommerceErrors(
  handler: (req: Request, res: Response) => Promise<unknown>
): (req: Request, res: Response) => Promise<void> {
  return async (req: Request, res: Response) => {
    try {
      await handler(req, res);
    } catch (error) {
      sendCommerceError(res, error, req.log ?? logger);
    }
  };
}
