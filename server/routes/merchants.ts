import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { currentUserOf, requireAdmin, requireUser, toActor } from "../middleware/identity";
import type { CommerceEngine } from "../services/commerce";
import { Errors, withCommerceErrors } from "../utils/apiError";

const payoutRequestSchema = z.object({
  amount: z.number().positive().optional(),
  method: z.string().trim().min(1).max(50).optional(),
});

const processPayoutSchema = z.object({
  success: z.boolean(),
  transactionId: z.string().trim().min(1).max(255).optional(),
  notes: z.string().trim().max(1000).optional(),
});

const referralLinkSchema = z.object({
  name: z.string().trim().min(1).max(200),
  targetUrl: z.string().trim().url().max(500),
  campaignName: z.string().trim().min(1).max(200).optional(),
  campaignSource: z.string().trim().min(1).max(100).optional(),
  campaignMedium: z.string().trim().min(1).max(100).optional(),
  expiresAt: z.coerce.date().optional(),
});

export function merchantHandlers(engine: CommerceEngine) {
  return {
    earnings: withCommerceErrors(async (req: Request, res: Response) => {
      const user = currentUserOf(req);
      return res.json(await engine.payouts.getEarnings(req.params.id, toActor(user)));
    }),

    listPayouts: withCommerceErrors(async (req: Request, res: Response) => {
      const user = currentUserOf(req);
      return res.json({ payouts: await engine.payouts.listPayouts(req.params.id, toActor(user)) });
    }),

    listLinks: withCommerceErrors(async (req: Request, res: Response) => {
      const user = currentUserOf(req);
      return res.json({ links: await engine.referrals.listLinks(req.params.id, toActor(user)) });
    }),

    createLink: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = referralLinkSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const link = await engine.referrals.createLink(req.params.id, parsed.data, toActor(user));
      return res.status(201).json({ link });
    }),

    requestPayout: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = payoutRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const payout = await engine.payouts.requestPayout(req.params.id, parsed.data, toActor(user));
      return res.status(201).json({ payout });
    }),

    startPayout: withCommerceErrors(async (req: Request, res: Response) => {
      const user = currentUserOf(req);
      return res.json({ payout: await engine.payouts.startPayout(req.params.id, user.id) });
    }),

    processPayout: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = processPayoutSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const payout = await engine.payouts.processPayout(req.params.id, {
        ...parsed.data,
        processorId: user.id,
      });
      return res.json({ payout });
    }),
  };
}

export function createMerchantsRouter(engine: CommerceEngine): Router {
  const router = Router();
  const handlers = merchantHandlers(engine);

  router.get("/:id/earnings", requireUser, handlers.earnings);
  router.get("/:id/payouts", requireUser, handlers.listPayouts);
  router.post("/:id/payouts", requireUser, handlers.requestPayout);
  router.get("/:id/links", requireUser, handlers.listLinks);
  router.post("/:id/links", requireUser, handlers.createLink);

  return router;
}

export function createPayoutsRouter(engine: CommerceEngine): Router {
  const router = Router();
  const handlers = merchantHandlers(engine);

  // Payout processing is back-office only
  router.post("/:id/start", requireAdmin, handlers.startPayout);
  router.post("/:id/process", requireAdmin, handlers.processPayout);

  return router;
}
