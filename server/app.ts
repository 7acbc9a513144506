/**
 * Express Application Factory
 *
 * Builds the app around an already wired commerce engine. Shared between
 * server/index.ts and the route-level tests.
 */
import express, { type NextFunction, type Request, type Response } from "express";
import compression from "compression";
import helmet from "helmet";
import cors from "cors";
import logger from "./logger";
import { BODY_PARSE_LIMIT, getAllowedOrigins } from "./config/server";
import { identity } from "./middleware/identity";
import { apiLimiter } from "./middleware/rateLimit";
import { requestTracing } from "./middleware/requestTracing";
import {
  createRequestMetrics,
  metricsMiddleware,
  registerMonitoringRoutes,
  type StoreProbe,
} from "./monitoring/index";
import { createCartRouter } from "./routes/cart";
import { createCouponsRouter } from "./routes/coupons";
import { createCronRouter } from "./routes/cron";
import { createMerchantsRouter, createPayoutsRouter } from "./routes/merchants";
import { createOrdersRouter } from "./routes/orders";
import { createPaymentsRouter } from "./routes/payments";
import { createPointsRouter } from "./routes/points";
import { createReferralsRouter } from "./routes/referrals";
import type { CommerceEngine } from "./services/commerce";
import type { SweepScheduler } from "./services/commerce/scheduler";
import { Errors, sendCommerceError } from "./utils/apiError";

export type AppOptions = {
  engine: CommerceEngine;
  scheduler: SweepScheduler;
  probeStore: StoreProbe;
  nodeEnv: string;
  allowedOrigins?: string;
  cronSecret?: string;
  webhookSecret?: string;
};

export function createApp(options: AppOptions): express.Express {
  const { engine, scheduler } = options;
  const app = express();
  const metrics = createRequestMetrics();

  // Trust the first proxy hop so req.ip reflects the real client address.
  app.set("trust proxy", 1);

  app.use(metricsMiddleware(metrics));

  // Request tracing: generate/propagate request ID before anything else
  app.use(requestTracing);

  app.use(helmet());

  const allowed = getAllowedOrigins(options.allowedOrigins, options.nodeEnv);
  app.use(
    cors({
      origin(origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
        // Allow server-to-server requests (no origin) or matching allowed domains
        if (!origin || allowed.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
    })
  );

  app.use(compression());
  app.use(express.json({ limit: BODY_PARSE_LIMIT }));

  app.use(identity);
  app.use("/api", apiLimiter);

  app.use("/api/cart", createCartRouter(engine));
  app.use("/api/orders", createOrdersRouter(engine));
  app.use("/api/payments", createPaymentsRouter(engine, { webhookSecret: options.webhookSecret }));
  app.use("/api/referrals", createReferralsRouter(engine));
  app.use("/api/merchants", createMerchantsRouter(engine));
  app.use("/api/payouts", createPayoutsRouter(engine));
  app.use("/api/points", createPointsRouter(engine));
  app.use("/api/coupons", createCouponsRouter(engine));
  app.use("/api/cron", createCronRouter({ scheduler, cronSecret: options.cronSecret }));

  registerMonitoringRoutes(
    app,
    { probeStore: options.probeStore, schedulerStarted: () => scheduler.isStarted() },
    metrics
  );

  app.use("/api", (_req, res) => Errors.notFound(res, "NOT_FOUND", "Endpoint not found."));

  // Four arguments mark this as Express's error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return Errors.badRequest(res, "INVALID_JSON", "Request body is not valid JSON.");
    }
    sendCommerceError(res, err, req.log);
  });

  logger.info("[Server] Commerce routes registered");
  return app;
}
