import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { currentUserOf, requireAdmin, requireUser } from "../middleware/identity";
import { referralClickLimiter } from "../middleware/rateLimit";
import type { CommerceEngine } from "../services/commerce";
import { Errors, withCommerceErrors } from "../utils/apiError";

const visitorSchema = z.object({
  email: z.string().trim().email().max(255).optional(),
  source: z.string().trim().max(100).optional(),
  landingPage: z.string().trim().max(2000).optional(),
});

const clickSchema = visitorSchema.extend({
  referralCode: z.string().trim().min(1).max(32),
});

const linkClickSchema = visitorSchema.extend({
  unique: z.boolean().optional(),
});

function userAgentOf(req: Request): string | undefined {
  const userAgent = req.headers["user-agent"];
  return typeof userAgent === "string" ? userAgent.slice(0, 500) : undefined;
}

const registrationSchema = z.object({
  referralToken: z.string().trim().min(1).max(64),
});

export function referralHandlers(engine: CommerceEngine) {
  return {
    click: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = clickSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const { referralCode, ...visitor } = parsed.data;
      const result = await engine.referrals.trackClick(referralCode, {
        ...visitor,
        userAgent: userAgentOf(req),
        ipAddress: req.ip,
      });
      return res.status(201).json(result);
    }),

    linkClick: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = linkClickSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const result = await engine.referrals.trackLinkClick(req.params.slug, {
        ...parsed.data,
        userAgent: userAgentOf(req),
        ipAddress: req.ip,
      });
      return res.status(201).json(result);
    }),

    registration: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = registrationSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const referral = await engine.referrals.attributeRegistration(
        parsed.data.referralToken,
        user.id
      );
      return res.json({ attributed: referral !== null, referralId: referral?.id ?? null });
    }),

    cancel: withCommerceErrors(async (req: Request, res: Response) => {
      const referral = await engine.referrals.cancelReferral(req.params.token);
      return res.json({ referral });
    }),
  };
}

export function createReferralsRouter(engine: CommerceEngine): Router {
  const router = Router();
  const handlers = referralHandlers(engine);

  // POST /api/referrals/click: anonymous visit through a merchant link
  router.post("/click", referralClickLimiter, handlers.click);
  router.post("/links/:slug/click", referralClickLimiter, handlers.linkClick);
  router.post("/registration", requireUser, handlers.registration);
  router.post("/:token/cancel", requireAdmin, handlers.cancel);

  return router;
}
