import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { POINTS_HISTORY_LIMIT } from "../config/constants";
import { currentUserOf, requireUser } from "../middleware/identity";
import type { CommerceEngine } from "../services/commerce";
import { roundMoney } from "../services/commerce/money";
import { Errors, withCommerceErrors } from "../utils/apiError";

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(POINTS_HISTORY_LIMIT),
});

export function pointsHandlers(engine: CommerceEngine) {
  return {
    summary: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = historyQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const summary = await engine.points.getSummary(user.id, parsed.data.limit);
      return res.json({
        ...summary,
        pointsValue: roundMoney(summary.account.currentBalance * engine.config.pointsUnitValue),
      });
    }),
  };
}

export function createPointsRouter(engine: CommerceEngine): Router {
  const router = Router();
  const handlers = pointsHandlers(engine);

  // GET /api/points: balance plus recent history
  router.get("/", requireUser, handlers.summary);

  return router;
}
