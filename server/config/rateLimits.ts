/**
 * Rate Limiter Configuration
 *
 * Centralized configuration for all express-rate-limit instances.
 *
 * Each entry defines:
 *  - windowMs: time window in milliseconds
 *  - max: maximum number of requests per window
 *  - message: error message returned when limit is exceeded
 */

export const RATE_LIMIT_CONFIG = {
  /** Every /api request */
  api: {
    windowMs: 60 * 1000, // 1 minute
    max: 300,
    message: "Too many requests, please try again later.",
  },

  /** Order placement and payment initiation */
  checkout: {
    windowMs: 10 * 60 * 1000, // 10 minutes
    max: 20,
    message: "Too many checkout attempts, please slow down.",
  },

  /** Anonymous referral clicks per IP */
  referralClick: {
    windowMs: 60 * 60 * 1000, // 1 hour
    max: 100,
    message: "Too many referral visits from this address.",
  },
} as const;
