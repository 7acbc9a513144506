/**
 * Monitoring Module
 *
 *   - Request metrics middleware (latency, status codes, error rates)
 *   - /api/health with a deep store check
 *   - /api/health/live for liveness probes
 *   - /api/health/ready for readiness probes
 *   - /api/admin/system-status for operators
 */

import type { Express, Request, Response, NextFunction } from "express";
import logger from "../logger";
import { requireAdmin } from "../middleware/identity";

// ============================================================================
// Types
// ============================================================================

export interface ComponentHealth {
  status: "up" | "down" | "unconfigured";
  latencyMs?: number;
  detail?: string;
}

export interface HealthCheckResult {
  status: "healthy" | "unhealthy";
  uptime: number;
  timestamp: string;
  version: string;
  checks: {
    store: ComponentHealth;
    scheduler: ComponentHealth;
  };
}

/** Resolves true when the backing store answers */
export type StoreProbe = () => Promise<boolean>;

export type MonitoringOptions = {
  probeStore: StoreProbe;
  /** Reports whether the sweep scheduler is running; omitted when it isn't wired */
  schedulerStarted?: () => boolean;
};

export interface RequestMetrics {
  totalRequests: number;
  totalErrors: number;
  statusCodes: Record<number, number>;
  latencyHistogram: number[]; // last 1000 request latencies (ms)
  startedAt: Date;
}

// ============================================================================
// In-memory metrics store (ring buffer for latencies)
// ============================================================================

const MAX_LATENCY_SAMPLES = 1000;

export function createRequestMetrics(): RequestMetrics {
  return {
    totalRequests: 0,
    totalErrors: 0,
    statusCodes: {},
    latencyHistogram: [],
    startedAt: new Date(),
  };
}

export function recordRequest(metrics: RequestMetrics, statusCode: number, latencyMs: number) {
  metrics.totalRequests++;
  metrics.statusCodes[statusCode] = (metrics.statusCodes[statusCode] ?? 0) + 1;
  if (statusCode >= 500) metrics.totalErrors++;

  metrics.latencyHistogram.push(latencyMs);
  if (metrics.latencyHistogram.length > MAX_LATENCY_SAMPLES) {
    metrics.latencyHistogram.shift();
  }
}

export function percentile(arr: number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const idx = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}

// ============================================================================
// Request metrics middleware
// ============================================================================

export function metricsMiddleware(metrics: RequestMetrics) {
  return (_req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();

    res.on("finish", () => {
      const durationNs = Number(process.hrtime.bigint() - start);
      recordRequest(metrics, res.statusCode, Math.round(durationNs / 1_000_000));
    });

    next();
  };
}

// ============================================================================
// Health check
// ============================================================================

async function checkStore(probe: StoreProbe): Promise<ComponentHealth> {
  const start = Date.now();
  try {
    const ok = await probe();
    return ok
      ? { status: "up", latencyMs: Date.now() - start }
      : { status: "down", latencyMs: Date.now() - start, detail: "Store did not answer" };
  } catch (err) {
    return { status: "down", latencyMs: Date.now() - start, detail: String(err) };
  }
}

export async function runHealthCheck(
  options: MonitoringOptions,
  metrics: RequestMetrics
): Promise<HealthCheckResult> {
  const store = await checkStore(options.probeStore);
  const scheduler: ComponentHealth = options.schedulerStarted
    ? { status: options.schedulerStarted() ? "up" : "down" }
    : { status: "unconfigured" };

  return {
    status: store.status === "down" ? "unhealthy" : "healthy",
    uptime: Math.round((Date.now() - metrics.startedAt.getTime()) / 1000),
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || "unknown",
    checks: { store, scheduler },
  };
}

// ============================================================================
// Route handlers
// ============================================================================

export function registerMonitoringRoutes(
  app: Express,
  options: MonitoringOptions,
  metrics: RequestMetrics
) {
  // Liveness probe: always returns 200 if process is running
  app.get("/api/health/live", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/health/ready", async (_req, res) => {
    const health = await runHealthCheck(options, metrics);
    res.status(health.status === "healthy" ? 200 : 503).json(health);
  });

  app.get("/api/health", async (_req, res) => {
    const health = await runHealthCheck(options, metrics);
    res.status(health.status === "healthy" ? 200 : 503).json(health);
  });

  app.get("/api/admin/system-status", requireAdmin, async (_req, res) => {
    const health = await runHealthCheck(options, metrics);
    const uptimeSeconds = Math.round((Date.now() - metrics.startedAt.getTime()) / 1000);
    const memUsage = process.memoryUsage();

    res.json({
      health,
      metrics: {
        totalRequests: metrics.totalRequests,
        totalErrors: metrics.totalErrors,
        errorRate: metrics.totalRequests > 0 ? metrics.totalErrors / metrics.totalRequests : 0,
        uptimeSeconds,
        p95LatencyMs: percentile(metrics.latencyHistogram, 95),
        p99LatencyMs: percentile(metrics.latencyHistogram, 99),
        topStatusCodes: Object.entries(metrics.statusCodes)
          .map(([code, count]) => ({ code: Number(code), count }))
          .sort((a, b) => b.count - a.count)
          .slice(0, 10),
      },
      process: {
        memoryUsageMb: Math.round(memUsage.rss / (1024 * 1024)),
        heapUsedMb: Math.round(memUsage.heapUsed / (1024 * 1024)),
        pid: process.pid,
        nodeVersion: process.version,
      },
    });
  });

  logger.info("[Monitoring] Health and metrics routes registered");
}
