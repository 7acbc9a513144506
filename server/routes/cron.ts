import { Router, type Request, type Response } from "express";
import logger from "../logger";
import { requireCronSecret } from "../middleware/cronAuth";
import type { SweepScheduler } from "../services/commerce/scheduler";

export type CronRouterOptions = {
  scheduler: Pick<SweepScheduler, "runOnce">;
  cronSecret: string | undefined;
};

export function cronHandlers(options: Pick<CronRouterOptions, "scheduler">) {
  return {
    commerceSweeps: async (_req: Request, res: Response) => {
      try {
        const result = await options.scheduler.runOnce();
        if (!result) {
          return res.status(202).json({ success: true, skipped: true });
        }
        logger.info("[Cron] Commerce sweeps completed", result);
        res.json({ success: true, ...result });
      } catch (error) {
        logger.error("[Cron] Commerce sweeps failed", { error });
        res.status(500).json({ error: "INTERNAL_ERROR", message: "Failed to run commerce sweeps" });
      }
    },
  };
}

export function createCronRouter(options: CronRouterOptions): Router {
  const router = Router();
  const handlers = cronHandlers(options);

  router.use(requireCronSecret(options.cronSecret));

  // POST /api/cron/commerce-sweeps: expire idle carts and stale referrals
  router.post("/commerce-sweeps", handlers.commerceSweeps);

  return router;
}
