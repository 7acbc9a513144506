import { Router, type Request, type Response } from "express";
import { z } from "zod";
import logger from "../logger";
import { matchesSecret } from "../middleware/cronAuth";
import type { CommerceEngine } from "../services/commerce";
import { Errors, withCommerceErrors } from "../utils/apiError";

const WEBHOOK_SECRET_HEADER = "x-webhook-secret";

/** Gateway settlement callback, as the gateway sends it */
const webhookSchema = z.object({
  payment_id: z.string().min(1).max(64),
  status: z.enum(["completed", "failed"]),
  external_payment_id: z.string().min(1).max(255).nullish(),
  provider_details: z.record(z.unknown()).nullish(),
});

export type PaymentsRouterOptions = {
  webhookSecret: string | undefined;
};

export function paymentHandlers(engine: CommerceEngine, options: PaymentsRouterOptions) {
  return {
    webhook: withCommerceErrors(async (req: Request, res: Response) => {
      if (!options.webhookSecret) {
        logger.warn("[Payments] PAYMENT_WEBHOOK_SECRET not configured, rejecting callback");
        return Errors.unauthorized(res);
      }
      const received = req.headers[WEBHOOK_SECRET_HEADER];
      if (typeof received !== "string" || !matchesSecret(received, options.webhookSecret)) {
        logger.warn("[Payments] Webhook rejected: bad secret", { requestId: req.requestId });
        return Errors.unauthorized(res);
      }

      const parsed = webhookSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }

      const body = parsed.data;
      const result = await engine.orders.settlePayment(body.payment_id, {
        externalPaymentId: body.external_payment_id ?? null,
        status: body.status,
        providerDetails: body.provider_details ?? null,
      });

      return res.json({
        received: true,
        payment_id: result.payment.id,
        payment_status: result.payment.status,
        order_id: result.order.id,
        order_status: result.order.status,
        already_settled: result.alreadySettled,
      });
    }),
  };
}

export function createPaymentsRouter(engine: CommerceEngine, options: PaymentsRouterOptions): Router {
  const router = Router();
  const handlers = paymentHandlers(engine, options);

  // POST /api/payments/webhook: gateway settlement callback
  router.post("/webhook", handlers.webhook);

  return router;
}
