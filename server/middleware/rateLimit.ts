import rateLimit from "express-rate-limit";
import { RATE_LIMIT_CONFIG } from "../config/rateLimits";

const RL = RATE_LIMIT_CONFIG;

export const apiLimiter = rateLimit({
  windowMs: RL.api.windowMs,
  limit: RL.api.max,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: "RATE_LIMITED", message: RL.api.message },
});

/** Keyed by caller id, falling back to IP */
export const checkoutLimiter = rateLimit({
  windowMs: RL.checkout.windowMs,
  limit: RL.checkout.max,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => req.currentUser?.id ?? req.ip ?? "anonymous",
  message: { error: "RATE_LIMITED", message: RL.checkout.message },
});

export const referralClickLimiter = rateLimit({
  windowMs: RL.referralClick.windowMs,
  limit: RL.referralClick.max,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: "RATE_LIMITED", message: RL.referralClick.message },
});
