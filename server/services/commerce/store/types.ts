/**
 * Commerce Store: unit-of-work contract
 *
 * Every engine operation runs inside `CommerceStore.transaction`. Reads made
 * with `{ forUpdate: true }` hold a row lock until the transaction ends.
 */

import type {
  CartRecord,
  CouponRecord,
  CouponUsageRecord,
  MerchantPatch,
  MerchantRecord,
  OrderPatch,
  OrderRecord,
  PaymentPatch,
  PaymentRecord,
  PayoutPatch,
  PayoutRecord,
  PointsAccount,
  PointsTransaction,
  ProductRecord,
  ReferralLinkPatch,
  ReferralLinkRecord,
  ReferralPatch,
  ReferralRecord,
  VariantRecord,
} from "../types";

export type LockOptions = { forUpdate?: boolean };

export interface CatalogRepository {
  findProduct(id: string, options?: LockOptions): Promise<ProductRecord | undefined>;
  findVariant(id: string, options?: LockOptions): Promise<VariantRecord | undefined>;
  setProductInventory(id: string, inventoryCount: number): Promise<void>;
  setVariantInventory(id: string, inventoryCount: number): Promise<void>;
}

export interface CartRepository {
  findByUser(userId: string): Promise<CartRecord | undefined>;
  save(cart: CartRecord): Promise<void>;
  delete(userId: string): Promise<boolean>;
  /** Removes carts last touched before `cutoff`; returns how many went */
  deleteUpdatedBefore(cutoff: Date): Promise<number>;
}

export interface OrderRepository {
  insert(order: OrderRecord): Promise<void>;
  findById(id: string, options?: LockOptions): Promise<OrderRecord | undefined>;
  listByUser(userId: string, limit: number): Promise<OrderRecord[]>;
  update(id: string, patch: OrderPatch): Promise<OrderRecord>;
}

export interface PaymentRepository {
  insert(payment: PaymentRecord): Promise<void>;
  findById(id: string, options?: LockOptions): Promise<PaymentRecord | undefined>;
  listByOrder(orderId: string): Promise<PaymentRecord[]>;
  update(id: string, patch: PaymentPatch): Promise<PaymentRecord>;
}

export interface PointsRepository {
  findAccount(userId: string, options?: LockOptions): Promise<PointsAccount | undefined>;
  saveAccount(account: PointsAccount): Promise<void>;
  appendTransaction(entry: PointsTransaction): Promise<void>;
  listTransactions(userId: string, limit: number): Promise<PointsTransaction[]>;
}

export interface CouponRepository {
  findByCode(code: string, options?: LockOptions): Promise<CouponRecord | undefined>;
  insert(coupon: CouponRecord): Promise<void>;
  incrementUsage(id: string): Promise<void>;
  countUsageByUser(couponId: string, userId: string): Promise<number>;
  recordUsage(usage: CouponUsageRecord): Promise<void>;
}

export interface MerchantRepository {
  findById(id: string, options?: LockOptions): Promise<MerchantRecord | undefined>;
  findByReferralCode(code: string, options?: LockOptions): Promise<MerchantRecord | undefined>;
  update(id: string, patch: MerchantPatch): Promise<MerchantRecord>;
}

export interface ReferralRepository {
  insert(referral: ReferralRecord): Promise<void>;
  findByToken(token: string, options?: LockOptions): Promise<ReferralRecord | undefined>;
  findByOrderId(orderId: string): Promise<ReferralRecord | undefined>;
  /** The referred user's pending referral, if any */
  findPendingByUser(userId: string, options?: LockOptions): Promise<ReferralRecord | undefined>;
  update(id: string, patch: ReferralPatch): Promise<ReferralRecord>;
  /** Marks every pending referral with expiresAt before `now` as expired */
  expirePendingBefore(now: Date): Promise<number>;
}

export interface ReferralLinkRepository {
  insert(link: ReferralLinkRecord): Promise<void>;
  findById(id: string, options?: LockOptions): Promise<ReferralLinkRecord | undefined>;
  findBySlug(slug: string, options?: LockOptions): Promise<ReferralLinkRecord | undefined>;
  /** Newest first */
  listByMerchant(merchantId: string): Promise<ReferralLinkRecord[]>;
  update(id: string, patch: ReferralLinkPatch): Promise<ReferralLinkRecord>;
}

export interface PayoutRepository {
  insert(payout: PayoutRecord): Promise<void>;
  findById(id: string, options?: LockOptions): Promise<PayoutRecord | undefined>;
  listByMerchant(merchantId: string): Promise<PayoutRecord[]>;
  update(id: string, patch: PayoutPatch): Promise<PayoutRecord>;
  sumCompleted(merchantId: string): Promise<number>;
  /** True while a pending or processing payout exists for the merchant */
  hasOpenPayout(merchantId: string): Promise<boolean>;
}

export interface UnitOfWork {
  catalog: CatalogRepository;
  carts: CartRepository;
  orders: OrderRepository;
  payments: PaymentRepository;
  points: PointsRepository;
  coupons: CouponRepository;
  merchants: MerchantRepository;
  referrals: ReferralRepository;
  referralLinks: ReferralLinkRepository;
  payouts: PayoutRepository;
}

export interface CommerceStore {
  /**
   * Runs `work` atomically. Everything written through the unit of work
   * commits together, or nothing does when `work` throws.
   */
  transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
}
