/**
 * Commerce Engine: Type Definitions
 */

import type {
  Address,
  CartItemRow,
  CartRow,
  CouponRow,
  CouponUsageRow,
  MerchantPayoutRow,
  MerchantReferralRow,
  MerchantRow,
  OrderLineRow,
  OrderRow,
  OrderStatus,
  PaymentRow,
  PointsAccountRow,
  PointsTransactionRow,
  ProductRow,
  ProductVariantRow,
  ReferralLinkRow,
  ShippingMethod,
} from "@shared/schema";

export type {
  Address,
  DiscountType,
  MerchantStatus,
  OrderStatus,
  PaymentStatus,
  PayoutStatus,
  PointsTransactionType,
  ReferralStatus,
  ShippingMethod,
} from "@shared/schema";

// ============================================================================
// Stored records
// ============================================================================

export type ProductRecord = Omit<ProductRow, "createdAt" | "updatedAt">;
export type VariantRecord = Omit<ProductVariantRow, "updatedAt">;

/** One cart line; unitPrice is the price seen when the line was last touched */
export type CartItem = Omit<CartItemRow, "id" | "userId">;

export type CartRecord = CartRow & { items: CartItem[] };

/** Frozen copy of a purchased line */
export type OrderLine = Omit<OrderLineRow, "id" | "orderId">;

export type OrderRecord = OrderRow & { lines: OrderLine[] };

export type PaymentRecord = PaymentRow;
export type PointsAccount = PointsAccountRow;
export type PointsTransaction = PointsTransactionRow;
export type CouponRecord = CouponRow;
export type CouponUsageRecord = CouponUsageRow;
export type MerchantRecord = MerchantRow;
export type ReferralRecord = MerchantReferralRow;
export type ReferralLinkRecord = ReferralLinkRow;
export type PayoutRecord = MerchantPayoutRow;

// ============================================================================
// Inputs & views
// ============================================================================

/** Points at the row that holds stock: the variant when present, else the product */
export type StockRef = {
  productId: string;
  variantId?: string | null;
};

export type StockLine = StockRef & { quantity: number };

/** Who is asking. Customers act on their own resources; admin and system act on any. */
export type Actor =
  | { type: "customer"; id: string }
  | { type: "admin"; id: string }
  | { type: "system"; id: string };

export type CartSnapshot = {
  items: readonly StockLine[];
};

export type CheckoutInput = {
  shippingMethod: ShippingMethod;
  shippingAddress: Address;
  /** Defaults to the shipping address */
  billingAddress?: Address;
  couponCode?: string;
  pointsToUse?: number;
  notes?: string;
};

export type StatusChangeDetails = {
  trackingNumber?: string;
  reason?: string;
};

export type OrderPaymentStatus = "pending" | "completed" | "failed";

export type OrderView = {
  order: OrderRecord;
  payments: PaymentRecord[];
  amountPaid: number;
  balanceDue: number;
  isPaid: boolean;
  paymentStatus: OrderPaymentStatus;
};

export type OrderPatch = Partial<
  Pick<
    OrderRecord,
    | "status"
    | "trackingNumber"
    | "cancellationReason"
    | "updatedAt"
    | "shippedAt"
    | "deliveredAt"
    | "cancelledAt"
  >
>;

export type PaymentPatch = Partial<
  Pick<
    PaymentRecord,
    "status" | "externalPaymentId" | "providerDetails" | "failureReason" | "processedAt"
  >
>;

export type MerchantPatch = Partial<
  Pick<
    MerchantRecord,
    | "totalReferrals"
    | "successfulReferrals"
    | "totalEarnings"
    | "totalPointsEarned"
    | "lastReferralAt"
  >
>;

export type ReferralPatch = Partial<
  Pick<
    ReferralRecord,
    | "status"
    | "referredUserId"
    | "registeredAt"
    | "orderId"
    | "commissionAmount"
    | "pointsAwarded"
    | "firstPurchaseAt"
    | "updatedAt"
  >
>;

export type ReferralLinkPatch = Partial<
  Pick<ReferralLinkRecord, "clickCount" | "uniqueClicks" | "conversions" | "updatedAt">
>;

export type PayoutPatch = Partial<
  Pick<
    PayoutRecord,
    | "status"
    | "externalTransactionId"
    | "processedBy"
    | "processingNotes"
    | "failureReason"
    | "processedAt"
    | "completedAt"
  >
>;

/** Source of the current time; engines never read the wall clock directly */
export type Clock = () => Date;
