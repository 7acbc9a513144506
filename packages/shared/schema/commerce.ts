import { z } from "zod";
import { sql } from "drizzle-orm";
import {
  pgTable,
  pgEnum,
  serial,
  integer,
  boolean,
  timestamp,
  json,
  varchar,
  text,
  doublePrecision,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";

// ============================================================================
// Enumerations
// ============================================================================

export const ORDER_STATUSES = [
  "pending",
  "processing",
  "shipped",
  "delivered",
  "cancelled",
  "refunded",
] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const PAYMENT_STATUSES = ["pending", "completed", "failed"] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const REFERRAL_STATUSES = ["pending", "completed", "cancelled", "expired"] as const;
export type ReferralStatus = (typeof REFERRAL_STATUSES)[number];

export const PAYOUT_STATUSES = ["pending", "processing", "completed", "failed"] as const;
export type PayoutStatus = (typeof PAYOUT_STATUSES)[number];

export const MERCHANT_STATUSES = ["pending", "approved", "rejected", "suspended", "inactive"] as const;
export type MerchantStatus = (typeof MERCHANT_STATUSES)[number];

export const DISCOUNT_TYPES = ["percentage", "fixed"] as const;
export type DiscountType = (typeof DISCOUNT_TYPES)[number];

export const SHIPPING_METHODS = ["standard", "express", "overnight", "pickup", "digital"] as const;
export type ShippingMethod = (typeof SHIPPING_METHODS)[number];

export const POINTS_TRANSACTION_TYPES = [
  "earned_purchase",
  "earned_referral",
  "earned_bonus",
  "spent_discount",
  "refund_cancellation",
] as const;
export type PointsTransactionType = (typeof POINTS_TRANSACTION_TYPES)[number];

export const orderStatusEnum = pgEnum("order_status", ORDER_STATUSES);
export const paymentStatusEnum = pgEnum("payment_status", PAYMENT_STATUSES);
export const referralStatusEnum = pgEnum("referral_status", REFERRAL_STATUSES);
export const payoutStatusEnum = pgEnum("payout_status", PAYOUT_STATUSES);
export const merchantStatusEnum = pgEnum("merchant_status", MERCHANT_STATUSES);
export const discountTypeEnum = pgEnum("discount_type", DISCOUNT_TYPES);
export const shippingMethodEnum = pgEnum("shipping_method", SHIPPING_METHODS);
export const pointsTransactionTypeEnum = pgEnum("points_transaction_type", POINTS_TRANSACTION_TYPES);

/** Postal address snapshot stored on orders. */
export interface Address {
  name: string;
  line1: string;
  line2?: string;
  city: string;
  state?: string;
  postalCode?: string;
  country: string;
  phone?: string;
}

export const addressSchema: z.ZodType<Address> = z.object({
  name: z.string().trim().min(1).max(255),
  line1: z.string().trim().min(1).max(255),
  line2: z.string().trim().max(255).optional(),
  city: z.string().trim().min(1).max(100),
  state: z.string().trim().max(100).optional(),
  postalCode: z.string().trim().max(20).optional(),
  country: z.string().trim().length(2).toUpperCase(),
  phone: z.string().trim().max(30).optional(),
});

// ============================================================================
// Catalog
// ============================================================================

export const products = pgTable(
  "products",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    sku: varchar("sku", { length: 100 }),
    name: varchar("name", { length: 255 }).notNull(),
    price: doublePrecision("price").notNull(),
    isActive: boolean("is_active").notNull().default(true),
    isDigital: boolean("is_digital").notNull().default(false),
    trackInventory: boolean("track_inventory").notNull().default(true),
    allowBackorder: boolean("allow_backorder").notNull().default(false),
    inventoryCount: integer("inventory_count").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    skuIdx: uniqueIndex("IDX_products_sku").on(table.sku),
  })
);

export const productVariants = pgTable(
  "product_variants",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    productId: varchar("product_id", { length: 64 })
      .notNull()
      .references(() => products.id, { onDelete: "cascade" }),
    sku: varchar("sku", { length: 100 }),
    name: varchar("name", { length: 255 }).notNull(),
    priceModifier: doublePrecision("price_modifier").notNull().default(0),
    inventoryCount: integer("inventory_count").notNull().default(0),
    isActive: boolean("is_active").notNull().default(true),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    productIdx: index("IDX_product_variants_product").on(table.productId),
  })
);

// ============================================================================
// Carts
// ============================================================================

export const carts = pgTable(
  "carts",
  {
    userId: varchar("user_id", { length: 255 }).primaryKey(),
    subtotal: doublePrecision("subtotal").notNull().default(0),
    itemCount: integer("item_count").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    updatedIdx: index("IDX_carts_updated_at").on(table.updatedAt),
  })
);

export const cartItems = pgTable(
  "cart_items",
  {
    id: serial("id").primaryKey(),
    userId: varchar("user_id", { length: 255 })
      .notNull()
      .references(() => carts.userId, { onDelete: "cascade" }),
    productId: varchar("product_id", { length: 64 }).notNull(),
    variantId: varchar("variant_id", { length: 64 }),
    quantity: integer("quantity").notNull(),
    unitPrice: doublePrecision("unit_price").notNull(),
    addedAt: timestamp("added_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    userIdx: index("IDX_cart_items_user").on(table.userId),
  })
);

// ============================================================================
// Orders & payments
// ============================================================================

export const orders = pgTable(
  "orders",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    orderNumber: varchar("order_number", { length: 32 }).notNull(),
    userId: varchar("user_id", { length: 255 }).notNull(),
    status: orderStatusEnum("status").notNull().default("pending"),
    currency: varchar("currency", { length: 3 }).notNull(),
    subtotal: doublePrecision("subtotal").notNull(),
    taxAmount: doublePrecision("tax_amount").notNull().default(0),
    shippingAmount: doublePrecision("shipping_amount").notNull().default(0),
    discountAmount: doublePrecision("discount_amount").notNull().default(0),
    pointsDiscount: doublePrecision("points_discount").notNull().default(0),
    totalAmount: doublePrecision("total_amount").notNull(),
    pointsEarned: integer("points_earned").notNull().default(0),
    pointsUsed: integer("points_used").notNull().default(0),
    couponCode: varchar("coupon_code", { length: 50 }),
    shippingMethod: shippingMethodEnum("shipping_method").notNull(),
    shippingAddress: json("shipping_address").$type<Address>().notNull(),
    billingAddress: json("billing_address").$type<Address>().notNull(),
    notes: text("notes"),
    trackingNumber: varchar("tracking_number", { length: 100 }),
    cancellationReason: text("cancellation_reason"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
    shippedAt: timestamp("shipped_at", { withTimezone: true }),
    deliveredAt: timestamp("delivered_at", { withTimezone: true }),
    cancelledAt: timestamp("cancelled_at", { withTimezone: true }),
  },
  (table) => ({
    orderNumberIdx: uniqueIndex("IDX_orders_order_number").on(table.orderNumber),
    userIdx: index("IDX_orders_user").on(table.userId, table.createdAt),
  })
);

export const orderLines = pgTable(
  "order_lines",
  {
    id: serial("id").primaryKey(),
    orderId: varchar("order_id", { length: 64 })
      .notNull()
      .references(() => orders.id, { onDelete: "cascade" }),
    productId: varchar("product_id", { length: 64 }).notNull(),
    variantId: varchar("variant_id", { length: 64 }),
    productName: varchar("product_name", { length: 255 }).notNull(),
    sku: varchar("sku", { length: 100 }),
    variantName: varchar("variant_name", { length: 255 }),
    quantity: integer("quantity").notNull(),
    unitPrice: doublePrecision("unit_price").notNull(),
    lineTotal: doublePrecision("line_total").notNull(),
    isDigital: boolean("is_digital").notNull().default(false),
  },
  (table) => ({
    orderIdx: index("IDX_order_lines_order").on(table.orderId),
  })
);

export const payments = pgTable(
  "payments",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    orderId: varchar("order_id", { length: 64 })
      .notNull()
      .references(() => orders.id),
    amount: doublePrecision("amount").notNull(),
    currency: varchar("currency", { length: 3 }).notNull(),
    method: varchar("method", { length: 50 }).notNull(),
    provider: varchar("provider", { length: 50 }),
    status: paymentStatusEnum("status").notNull().default("pending"),
    externalPaymentId: varchar("external_payment_id", { length: 255 }),
    providerDetails: json("provider_details").$type<Record<string, unknown>>(),
    failureReason: text("failure_reason"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    processedAt: timestamp("processed_at", { withTimezone: true }),
  },
  (table) => ({
    orderIdx: index("IDX_payments_order").on(table.orderId),
  })
);

// ============================================================================
// Loyalty points
// ============================================================================

export const pointsAccounts = pgTable("points_accounts", {
  userId: varchar("user_id", { length: 255 }).primaryKey(),
  currentBalance: integer("current_balance").notNull().default(0),
  totalEarned: integer("total_earned").notNull().default(0),
  totalSpent: integer("total_spent").notNull().default(0),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export const pointsTransactions = pgTable(
  "points_transactions",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    userId: varchar("user_id", { length: 255 }).notNull(),
    type: pointsTransactionTypeEnum("type").notNull(),
    points: integer("points").notNull(),
    balanceAfter: integer("balance_after").notNull(),
    reason: varchar("reason", { length: 255 }).notNull(),
    orderId: varchar("order_id", { length: 64 }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    userIdx: index("IDX_points_transactions_user").on(table.userId, table.createdAt),
  })
);

// ============================================================================
// Coupons
// ============================================================================

export const coupons = pgTable(
  "coupons",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    code: varchar("code", { length: 50 }).notNull(),
    name: varchar("name", { length: 255 }).notNull(),
    discountType: discountTypeEnum("discount_type").notNull(),
    discountValue: doublePrecision("discount_value").notNull(),
    minimumOrderAmount: doublePrecision("minimum_order_amount"),
    maximumDiscountAmount: doublePrecision("maximum_discount_amount"),
    usageLimit: integer("usage_limit"),
    usageLimitPerUser: integer("usage_limit_per_user"),
    usageCount: integer("usage_count").notNull().default(0),
    validFrom: timestamp("valid_from", { withTimezone: true }),
    validUntil: timestamp("valid_until", { withTimezone: true }),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    codeIdx: uniqueIndex("IDX_coupons_code").on(table.code),
  })
);

export const couponUsages = pgTable(
  "coupon_usages",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    couponId: varchar("coupon_id", { length: 64 })
      .notNull()
      .references(() => coupons.id),
    userId: varchar("user_id", { length: 255 }).notNull(),
    orderId: varchar("order_id", { length: 64 }).notNull(),
    discountAmount: doublePrecision("discount_amount").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    couponUserIdx: index("IDX_coupon_usages_coupon_user").on(table.couponId, table.userId),
  })
);

// ============================================================================
// Merchants, referrals & payouts
// ============================================================================

export const merchants = pgTable(
  "merchants",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    userId: varchar("user_id", { length: 255 }).notNull(),
    businessName: varchar("business_name", { length: 255 }).notNull(),
    referralCode: varchar("referral_code", { length: 32 }).notNull(),
    status: merchantStatusEnum("status").notNull().default("pending"),
    isActive: boolean("is_active").notNull().default(true),
    commissionRate: doublePrecision("commission_rate").notNull().default(0.05),
    pointsPerReferral: integer("points_per_referral").notNull().default(500),
    minimumPayout: doublePrecision("minimum_payout").notNull().default(100),
    payoutMethod: varchar("payout_method", { length: 50 }),
    totalReferrals: integer("total_referrals").notNull().default(0),
    successfulReferrals: integer("successful_referrals").notNull().default(0),
    totalEarnings: doublePrecision("total_earnings").notNull().default(0),
    totalPointsEarned: integer("total_points_earned").notNull().default(0),
    lastReferralAt: timestamp("last_referral_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    referralCodeIdx: uniqueIndex("IDX_merchants_referral_code").on(table.referralCode),
    userIdx: uniqueIndex("IDX_merchants_user").on(table.userId),
  })
);

export const referralLinks = pgTable(
  "referral_links",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    merchantId: varchar("merchant_id", { length: 64 })
      .notNull()
      .references(() => merchants.id),
    name: varchar("name", { length: 200 }).notNull(),
    slug: varchar("slug", { length: 100 }).notNull(),
    targetUrl: varchar("target_url", { length: 500 }).notNull(),
    campaignName: varchar("campaign_name", { length: 200 }),
    campaignSource: varchar("campaign_source", { length: 100 }),
    campaignMedium: varchar("campaign_medium", { length: 100 }),
    clickCount: integer("click_count").notNull().default(0),
    uniqueClicks: integer("unique_clicks").notNull().default(0),
    conversions: integer("conversions").notNull().default(0),
    isActive: boolean("is_active").notNull().default(true),
    expiresAt: timestamp("expires_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    slugIdx: uniqueIndex("IDX_referral_links_slug").on(table.slug),
    merchantIdx: index("IDX_referral_links_merchant").on(table.merchantId, table.createdAt),
  })
);

export const merchantReferrals = pgTable(
  "merchant_referrals",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    merchantId: varchar("merchant_id", { length: 64 })
      .notNull()
      .references(() => merchants.id),
    referralToken: varchar("referral_token", { length: 32 }).notNull(),
    referralLinkId: varchar("referral_link_id", { length: 64 }).references(() => referralLinks.id),
    referredEmail: varchar("referred_email", { length: 255 }),
    referredUserId: varchar("referred_user_id", { length: 255 }),
    orderId: varchar("order_id", { length: 64 }),
    commissionRate: doublePrecision("commission_rate").notNull(),
    pointsPerReferral: integer("points_per_referral").notNull(),
    commissionAmount: doublePrecision("commission_amount").notNull().default(0),
    pointsAwarded: integer("points_awarded").notNull().default(0),
    status: referralStatusEnum("status").notNull().default("pending"),
    source: varchar("source", { length: 100 }),
    landingPage: varchar("landing_page", { length: 500 }),
    userAgent: text("user_agent"),
    ipAddress: varchar("ip_address", { length: 64 }),
    clickedAt: timestamp("clicked_at", { withTimezone: true }).defaultNow().notNull(),
    registeredAt: timestamp("registered_at", { withTimezone: true }),
    firstPurchaseAt: timestamp("first_purchase_at", { withTimezone: true }),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    tokenIdx: uniqueIndex("IDX_merchant_referrals_token").on(table.referralToken),
    // A referral converts at most once and an order credits at most one referral
    orderIdx: uniqueIndex("IDX_merchant_referrals_order")
      .on(table.orderId)
      .where(sql`${table.orderId} IS NOT NULL`),
    pendingUserIdx: index("IDX_merchant_referrals_user_status").on(
      table.referredUserId,
      table.status
    ),
    expiryIdx: index("IDX_merchant_referrals_expiry").on(table.status, table.expiresAt),
  })
);

export const merchantPayouts = pgTable(
  "merchant_payouts",
  {
    id: varchar("id", { length: 64 }).primaryKey(),
    merchantId: varchar("merchant_id", { length: 64 })
      .notNull()
      .references(() => merchants.id),
    amount: doublePrecision("amount").notNull(),
    currency: varchar("currency", { length: 3 }).notNull(),
    status: payoutStatusEnum("status").notNull().default("pending"),
    payoutMethod: varchar("payout_method", { length: 50 }).notNull(),
    externalTransactionId: varchar("external_transaction_id", { length: 255 }),
    processedBy: varchar("processed_by", { length: 255 }),
    processingNotes: text("processing_notes"),
    failureReason: text("failure_reason"),
    requestedAt: timestamp("requested_at", { withTimezone: true }).defaultNow().notNull(),
    processedAt: timestamp("processed_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (table) => ({
    merchantIdx: index("IDX_merchant_payouts_merchant").on(table.merchantId, table.status),
  })
);

// ============================================================================
// Insert schemas & inferred types
// ============================================================================

export const insertCouponSchema = createInsertSchema(coupons, {
  code: (schema) => schema.code.trim().min(3).max(50),
  name: (schema) => schema.name.min(1).max(255),
  discountValue: (schema) => schema.discountValue.positive(),
  minimumOrderAmount: (schema) => schema.minimumOrderAmount.nonnegative(),
  maximumDiscountAmount: (schema) => schema.maximumDiscountAmount.positive(),
  usageLimit: (schema) => schema.usageLimit.int().positive(),
  usageLimitPerUser: (schema) => schema.usageLimitPerUser.int().positive(),
  validFrom: z.coerce.date(),
  validUntil: z.coerce.date(),
}).omit({
  id: true,
  usageCount: true,
  createdAt: true,
});

export type ProductRow = typeof products.$inferSelect;
export type ProductVariantRow = typeof productVariants.$inferSelect;
export type CartRow = typeof carts.$inferSelect;
export type CartItemRow = typeof cartItems.$inferSelect;
export type OrderRow = typeof orders.$inferSelect;
export type OrderLineRow = typeof orderLines.$inferSelect;
export type PaymentRow = typeof payments.$inferSelect;
export type PointsAccountRow = typeof pointsAccounts.$inferSelect;
export type PointsTransactionRow = typeof pointsTransactions.$inferSelect;
export type CouponRow = typeof coupons.$inferSelect;
export type CouponUsageRow = typeof couponUsages.$inferSelect;
export type MerchantRow = typeof merchants.$inferSelect;
export type ReferralLinkRow = typeof referralLinks.$inferSelect;
export type MerchantReferralRow = typeof merchantReferrals.$inferSelect;
export type MerchantPayoutRow = typeof merchantPayouts.$inferSelect;
export type InsertCoupon = z.infer<typeof insertCouponSchema>;
