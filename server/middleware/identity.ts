import type { NextFunction, Request, Response } from "express";
import type { Actor } from "../services/commerce/types";
import type { CurrentUser } from "../types/express";
import { Errors } from "../utils/apiError";

const USER_ID_HEADER = "x-user-id";
const USER_ROLE_HEADER = "x-user-role";
const MAX_USER_ID_LENGTH = 255;

/**
 * Reads the caller identity the upstream gateway forwards. A request without
 * a usable X-User-Id stays anonymous; anything but "admin" is a customer.
 */
export function identity(req: Request, _res: Response, next: NextFunction) {
  const rawId = req.headers[USER_ID_HEADER];
  const rawRole = req.headers[USER_ROLE_HEADER];
  const id = typeof rawId === "string" ? rawId.trim() : "";

  if (id && id.length <= MAX_USER_ID_LENGTH) {
    const user: CurrentUser = {
      id,
      role: typeof rawRole === "string" && rawRole.trim().toLowerCase() === "admin" ? "admin" : "customer",
    };
    req.currentUser = user;
  }

  next();
}

export function requireUser(req: Request, res: Response, next: NextFunction) {
  if (!req.currentUser) {
    return Errors.unauthorized(res);
  }
  next();
}

export function requireAdmin(req: Request, res: Response, next: NextFunction) {
  if (!req.currentUser) {
    return Errors.unauthorized(res);
  }
  if (req.currentUser.role !== "admin") {
    req.log?.warn("[Auth] Admin route denied", { userId: req.currentUser.id, path: req.path });
    return Errors.forbidden(res);
  }
  next();
}

export function toActor(user: CurrentUser): Actor {
  return user.role === "admin" ? { type: "admin", id: user.id } : { type: "customer", id: user.id };
}

/** The authenticated user; only call behind requireUser or requireAdmin */
export function currentUserOf(req: Request): CurrentUser {
  if (!req.currentUser) {
    throw new Error("currentUserOf called on an unauthenticated request");
  }
  return req.currentUser;
}
