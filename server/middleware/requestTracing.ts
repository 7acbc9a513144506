import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";
import { createChildLogger } from "../logger";

const REQUEST_ID_HEADER = "X-Request-ID";

/** Upstream ids are echoed into headers and logs, so only plain tokens are kept */
const UPSTREAM_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function resolveRequestId(incoming: string | string[] | undefined): string {
  const candidate = typeof incoming === "string" ? incoming.trim() : "";
  return UPSTREAM_ID_PATTERN.test(candidate) ? candidate : randomUUID();
}

/**
 * Tags each request with a trace id (the gateway's X-Request-ID when usable)
 * and a child logger bound to it. Logs one line per finished request: warn
 * for 4xx, error for 5xx.
 */
export function requestTracing(req: Request, res: Response, next: NextFunction) {
  const requestId = resolveRequestId(req.headers[REQUEST_ID_HEADER.toLowerCase()]);

  req.requestId = requestId;
  req.log = createChildLogger({ requestId });
  res.setHeader(REQUEST_ID_HEADER, requestId);

  const start = Date.now();

  res.on("finish", () => {
    const context = {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start,
      userId: req.currentUser?.id,
    };
    if (res.statusCode >= 500) {
      req.log.error("request failed", context);
    } else if (res.statusCode >= 400) {
      req.log.warn("request rejected", context);
    } else {
      req.log.info("request completed", context);
    }
  });

  next();
}
