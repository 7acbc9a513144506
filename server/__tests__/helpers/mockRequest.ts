/**
 * Typed Express request / response / next mock factories for route and
 * middleware tests. Handlers are called directly, without a running server.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";
import type { Request, Response, NextFunction } from "express";
import type { CurrentUser } from "../../types/express";
import { createMockLogger, type MockLogger } from "./mockLogger";

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export interface MockRequestOptions {
  body?: unknown;
  params?: Record<string, string>;
  query?: Record<string, string>;
  headers?: Record<string, string | string[] | undefined>;
  ip?: string;
  method?: string;
  path?: string;
  url?: string;
  currentUser?: CurrentUser;
  requestId?: string;
  log?: MockLogger;
}

/**
 * Create a typed mock Express `Request`.
 *
 * @example
 * ```ts
 * const req = createMockRequest({
 *   body: { productId: "prod-1" },
 *   currentUser: { id: "buyer", role: "customer" },
 * });
 * await handlers.addItem(req, res);
 * ```
 */
export function createMockRequest(options: MockRequestOptions = {}): Request {
  const headers: Record<string, string | string[] | undefined> = options.headers ?? {};

  const req: Partial<Request> & Record<string, unknown> = {
    body: options.body ?? {},
    params: (options.params ?? {}) as Request["params"],
    query: (options.query ?? {}) as Request["query"],
    headers: headers as Request["headers"],
    ip: options.ip ?? "127.0.0.1",
    method: options.method ?? "GET",
    path: options.path ?? "/",
    url: options.url ?? "/",
    originalUrl: options.url ?? "/",
    get: ((name: string) => {
      const lower = name.toLowerCase();
      for (const [key, val] of Object.entries(headers)) {
        if (key.toLowerCase() === lower) return val;
      }
      return undefined;
    }) as Request["get"],
    currentUser: options.currentUser,
    requestId: options.requestId ?? "test-request-id",
    log: options.log ?? createMockLogger(),
  };

  return req as Request;
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

export interface MockResponse extends Response {
  status: Mock;
  json: Mock;
  send: Mock;
  set: Mock;
  end: Mock;
  setHeader: Mock;
}

/**
 * Create a typed mock Express `Response`.
 *
 * All mutating methods (`.status()`, `.json()`, etc.) are chainable mocks.
 * `statusCode` starts at 200 and follows `.status()`.
 */
export function createMockResponse(): MockResponse {
  const res: Partial<MockResponse> & { statusCode: number } = { statusCode: 200 };

  // Chainable methods: each returns `res`
  res.status = vi.fn((code: number) => {
    res.statusCode = code;
    return res;
  }) as Mock;
  res.json = vi.fn().mockReturnValue(res) as Mock;
  res.send = vi.fn().mockReturnValue(res) as Mock;
  res.set = vi.fn().mockReturnValue(res) as Mock;
  res.end = vi.fn().mockReturnValue(res) as Mock;
  res.setHeader = vi.fn().mockReturnValue(res) as Mock;

  return res as MockResponse;
}

/** The body passed to the most recent `res.json()` call */
export function jsonBody(res: MockResponse): unknown {
  const calls = res.json.mock.calls;
  return calls.length > 0 ? calls[calls.length - 1]?.[0] : undefined;
}

// ---------------------------------------------------------------------------
// NextFunction
// ---------------------------------------------------------------------------

/**
 * Create a mock Express `next` function.
 */
export function createMockNext(): NextFunction & Mock {
  return vi.fn() as NextFunction & Mock;
}
