import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { addressSchema, ORDER_STATUSES, SHIPPING_METHODS } from "@shared/schema";
import { MAX_CART_LINE_QUANTITY, MAX_CART_LINES, ORDER_LIST_LIMIT } from "../config/constants";
import { currentUserOf, requireAdmin, requireUser, toActor } from "../middleware/identity";
import { checkoutLimiter } from "../middleware/rateLimit";
import type { CommerceEngine } from "../services/commerce";
import { Errors, withCommerceErrors } from "../utils/apiError";

const checkoutSchema = z.object({
  shippingMethod: z.enum(SHIPPING_METHODS),
  shippingAddress: addressSchema,
  billingAddress: addressSchema.optional(),
  couponCode: z.string().trim().min(1).max(50).optional(),
  pointsToUse: z.number().int().min(0).default(0),
  notes: z.string().max(500).optional(),
  // Explicit lines bypass the stored cart
  items: z
    .array(
      z.object({
        productId: z.string().min(1).max(64),
        variantId: z.string().min(1).max(64).nullish(),
        quantity: z.number().int().min(1).max(MAX_CART_LINE_QUANTITY),
      })
    )
    .min(1)
    .max(MAX_CART_LINES)
    .optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(ORDER_LIST_LIMIT).default(ORDER_LIST_LIMIT),
});

const cancelSchema = z.object({
  reason: z.string().trim().max(500).optional(),
});

const statusSchema = z.object({
  status: z.enum(ORDER_STATUSES),
  trackingNumber: z.string().trim().min(1).max(100).optional(),
  reason: z.string().trim().max(500).optional(),
});

const paymentSchema = z.object({
  method: z.string().trim().min(1).max(50),
  amount: z.number().positive().optional(),
  provider: z.string().trim().min(1).max(50).optional(),
  /** Charge through the configured gateway instead of awaiting a callback */
  charge: z.boolean().default(false),
});

export function orderHandlers(engine: CommerceEngine) {
  return {
    checkout: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = checkoutSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const { items, ...input } = parsed.data;
      const order = items
        ? await engine.orders.createOrder(user.id, { items }, input)
        : await engine.orders.checkout(user.id, input);
      return res.status(201).json({ order });
    }),

    list: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      return res.json({ orders: await engine.orders.listOrders(user.id, parsed.data.limit) });
    }),

    get: withCommerceErrors(async (req: Request, res: Response) => {
      const user = currentUserOf(req);
      return res.json(await engine.orders.getOrder(req.params.id, toActor(user)));
    }),

    cancel: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = cancelSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const order = await engine.orders.cancelOrder(req.params.id, toActor(user), parsed.data.reason);
      return res.json({ order });
    }),

    updateStatus: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = statusSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const { status, ...details } = parsed.data;
      const order = await engine.orders.transitionStatus(req.params.id, status, toActor(user), details);
      return res.json({ order });
    }),

    pay: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = paymentSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const { charge, ...input } = parsed.data;
      if (charge) {
        const result = await engine.orders.processPayment(req.params.id, input, toActor(user));
        return res.json({ payment: result.payment, order: result.order });
      }
      const payment = await engine.orders.recordPayment(req.params.id, input, toActor(user));
      return res.status(201).json({ payment });
    }),
  };
}

export function createOrdersRouter(engine: CommerceEngine): Router {
  const router = Router();
  const handlers = orderHandlers(engine);

  // POST /api/orders/checkout: place an order from the cart
  router.post("/checkout", requireUser, checkoutLimiter, handlers.checkout);
  router.get("/", requireUser, handlers.list);
  router.get("/:id", requireUser, handlers.get);
  router.post("/:id/cancel", requireUser, handlers.cancel);
  // POST /api/orders/:id/status: fulfilment updates (admin only)
  router.post("/:id/status", requireAdmin, handlers.updateStatus);
  router.post("/:id/payments", requireUser, checkoutLimiter, handlers.pay);

  return router;
}
