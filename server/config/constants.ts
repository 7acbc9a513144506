/**
 * Application Constants
 *
 * Named constants extracted from magic numbers across the codebase.
 * Grouped by feature area for discoverability.
 *
 * NOTE: Tunable commerce rules (rates, expiry windows, shipping table) live in ./commerce.ts
 */

// ============================================================================
// Cart
// ============================================================================

/** Largest quantity a single cart line may hold */
export const MAX_CART_LINE_QUANTITY = 999;

/** Largest number of distinct lines a cart may hold */
export const MAX_CART_LINES = 100;

// ============================================================================
// Orders & Payments
// ============================================================================

/** Prefix of human-readable order numbers (ORD-YYYYMMDD-XXXXXXXX) */
export const ORDER_NUMBER_PREFIX = "ORD";

/** Length of the random suffix of an order number */
export const ORDER_NUMBER_SUFFIX_LENGTH = 8;

/** Amounts within this tolerance of each other are treated as equal */
export const MONEY_EPSILON = 0.005;

/** Default page size when listing a user's orders */
export const ORDER_LIST_LIMIT = 50;

// ============================================================================
// Referrals & Merchants
// ============================================================================

/** Prefix of referral tokens handed to visitors */
export const REFERRAL_TOKEN_PREFIX = "ref_";

/** Length of the random part of a referral token */
export const REFERRAL_TOKEN_LENGTH = 12;

/** Campaign link slugs are cut to this many characters before de-duplication */
export const REFERRAL_LINK_SLUG_LENGTH = 20;

/** Default commission share for new merchants (5%) */
export const DEFAULT_COMMISSION_RATE = 0.05;

/** Default points credited to a merchant per converted referral */
export const DEFAULT_POINTS_PER_REFERRAL = 500;

/** Default minimum pending earnings before a payout may be requested */
export const DEFAULT_MINIMUM_PAYOUT = 100;

// ============================================================================
// Points
// ============================================================================

/** Recent ledger entries returned alongside a points balance */
export const POINTS_HISTORY_LIMIT = 20;

// ============================================================================
// Time
// ============================================================================

/** One day in milliseconds */
export const DAY_MS = 24 * 60 * 60 * 1000;
