import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { insertCouponSchema } from "@shared/schema";
import { currentUserOf, requireAdmin, requireUser } from "../middleware/identity";
import type { CommerceEngine } from "../services/commerce";
import { Errors, withCommerceErrors } from "../utils/apiError";

const previewSchema = z.object({
  code: z.string().trim().min(1).max(50),
  orderAmount: z.number().nonnegative(),
});

export function couponHandlers(engine: CommerceEngine) {
  return {
    create: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = insertCouponSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const coupon = await engine.coupons.createCoupon(parsed.data);
      req.log.info("[Coupons] Coupon created", {
        couponId: coupon.id,
        code: coupon.code,
        adminId: currentUserOf(req).id,
      });
      return res.status(201).json({ coupon });
    }),

    preview: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = previewSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      return res.json(
        await engine.coupons.previewCoupon(parsed.data.code, user.id, parsed.data.orderAmount)
      );
    }),
  };
}

export function createCouponsRouter(engine: CommerceEngine): Router {
  const router = Router();
  const handlers = couponHandlers(engine);

  router.post("/", requireAdmin, handlers.create);
  // POST /api/coupons/preview: discount a code would give, without using it
  router.post("/preview", requireUser, handlers.preview);

  return router;
}
