import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { MAX_CART_LINE_QUANTITY } from "../config/constants";
import { currentUserOf, requireUser } from "../middleware/identity";
import type { CommerceEngine } from "../services/commerce";
import { shippingRates } from "../services/commerce/pricing";
import { Errors, withCommerceErrors } from "../utils/apiError";

const lineRefSchema = z.object({
  productId: z.string().min(1).max(64),
  variantId: z.string().min(1).max(64).nullish(),
});

const addItemSchema = lineRefSchema.extend({
  quantity: z.number().int().min(1).max(MAX_CART_LINE_QUANTITY).default(1),
});

const updateItemSchema = lineRefSchema.extend({
  quantity: z.number().int().min(0).max(MAX_CART_LINE_QUANTITY),
});

const shippingQuerySchema = z.object({
  country: z.string().trim().length(2),
});

export function cartHandlers(engine: CommerceEngine) {
  return {
    getCart: withCommerceErrors(async (req: Request, res: Response) => {
      const user = currentUserOf(req);
      return res.json(await engine.carts.getSummary(user.id));
    }),

    addItem: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = addItemSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      return res.json(await engine.carts.addItem(user.id, parsed.data));
    }),

    updateItem: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = updateItemSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const { quantity, ...ref } = parsed.data;
      return res.json(await engine.carts.updateQuantity(user.id, ref, quantity));
    }),

    removeItem: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = lineRefSchema.safeParse(req.body);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      return res.json(await engine.carts.removeItem(user.id, parsed.data));
    }),

    clearCart: withCommerceErrors(async (req: Request, res: Response) => {
      const user = currentUserOf(req);
      return res.json(await engine.carts.clear(user.id));
    }),

    validate: withCommerceErrors(async (req: Request, res: Response) => {
      const user = currentUserOf(req);
      return res.json(await engine.carts.validateForCheckout(user.id));
    }),

    shippingRates: withCommerceErrors(async (req: Request, res: Response) => {
      const parsed = shippingQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return Errors.validation(res, parsed.error.flatten());
      }
      const user = currentUserOf(req);
      const summary = await engine.carts.getSummary(user.id);
      const lines = summary.items.filter((item) => item.isAvailable);
      return res.json({
        country: parsed.data.country.toUpperCase(),
        rates: shippingRates(lines, parsed.data.country, engine.config),
      });
    }),
  };
}

export function createCartRouter(engine: CommerceEngine): Router {
  const router = Router();
  const handlers = cartHandlers(engine);

  router.use(requireUser);

  // GET /api/cart: current cart with live prices
  router.get("/", handlers.getCart);
  router.post("/items", handlers.addItem);
  router.patch("/items", handlers.updateItem);
  router.delete("/items", handlers.removeItem);
  router.delete("/", handlers.clearCart);
  // GET /api/cart/validate: pre-checkout stock and price check
  router.get("/validate", handlers.validate);
  router.get("/shipping-rates", handlers.shippingRates);

  return router;
}
