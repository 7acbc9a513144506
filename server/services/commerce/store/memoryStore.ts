import type {
  CartRecord,
  CouponRecord,
  CouponUsageRecord,
  MerchantRecord,
  OrderRecord,
  PaymentRecord,
  PayoutRecord,
  PointsAccount,
  PointsTransaction,
  ProductRecord,
  ReferralLinkRecord,
  ReferralRecord,
  VariantRecord,
} from "../types";
import { roundMoney } from "../money";
import type { CommerceStore, UnitOfWork } from "./types";

type MemoryState = {
  products: Map<string, ProductRecord>;
  variants: Map<string, VariantRecord>;
  carts: Map<string, CartRecord>;
  orders: Map<string, OrderRecord>;
  payments: Map<string, PaymentRecord>;
  pointsAccounts: Map<string, PointsAccount>;
  pointsTransactions: PointsTransaction[];
  coupons: Map<string, CouponRecord>;
  couponUsages: CouponUsageRecord[];
  merchants: Map<string, MerchantRecord>;
  referrals: Map<string, ReferralRecord>;
  referralLinks: Map<string, ReferralLinkRecord>;
  payouts: Map<string, PayoutRecord>;
};

export type MemoryCommerceStore = CommerceStore & {
  /** Direct writes for fixtures; bypass the transaction queue */
  seed: {
    product(record: ProductRecord): void;
    variant(record: VariantRecord): void;
    coupon(record: CouponRecord): void;
    merchant(record: MerchantRecord): void;
    referralLink(record: ReferralLinkRecord): void;
    pointsAccount(record: PointsAccount): void;
    cart(record: CartRecord): void;
  };
};

const emptyState = (): MemoryState => ({
  products: new Map(),
  variants: new Map(),
  carts: new Map(),
  orders: new Map(),
  payments: new Map(),
  pointsAccounts: new Map(),
  pointsTransactions: [],
  coupons: new Map(),
  couponUsages: [],
  merchants: new Map(),
  referrals: new Map(),
  referralLinks: new Map(),
  payouts: new Map(),
});

// Records are cloned on the way in and out, so a map copy is a full snapshot
const snapshotOf = (state: MemoryState): MemoryState => ({
  products: new Map(state.products),
  variants: new Map(state.variants),
  carts: new Map(state.carts),
  orders: new Map(state.orders),
  payments: new Map(state.payments),
  pointsAccounts: new Map(state.pointsAccounts),
  pointsTransactions: [...state.pointsTransactions],
  coupons: new Map(state.coupons),
  couponUsages: [...state.couponUsages],
  merchants: new Map(state.merchants),
  referrals: new Map(state.referrals),
  referralLinks: new Map(state.referralLinks),
  payouts: new Map(state.payouts),
});

function copy<T>(value: T): T {
  return structuredClone(value);
}

function copyOrUndefined<T>(value: T | undefined): T | undefined {
  return value === undefined ? undefined : structuredClone(value);
}

function patchRecord<T extends object, P extends Partial<T>>(
  map: Map<string, T>,
  id: string,
  patch: P,
  entity: string
): T {
  const existing = map.get(id);
  if (!existing) {
    throw new Error(`${entity} ${id} does not exist`);
  }
  const updated = { ...existing, ...copy(patch) };
  map.set(id, updated);
  return copy(updated);
}

/**
 * In-process store for tests and local runs. Transactions run one at a time
 * and the previous state is restored when the work throws.
 */
export const createMemoryCommerceStore = (): MemoryCommerceStore => {
  let state = emptyState();
  let queue: Promise<void> = Promise.resolve();

  const unitOfWork: UnitOfWork = {
    catalog: {
      async findProduct(id) {
        return copyOrUndefined(state.products.get(id));
      },
      async findVariant(id) {
        return copyOrUndefined(state.variants.get(id));
      },
      async setProductInventory(id, inventoryCount) {
        patchRecord(state.products, id, { inventoryCount }, "Product");
      },
      async setVariantInventory(id, inventoryCount) {
        patchRecord(state.variants, id, { inventoryCount }, "Variant");
      },
    },

    carts: {
      async findByUser(userId) {
        return copyOrUndefined(state.carts.get(userId));
      },
      async save(cart) {
        state.carts.set(cart.userId, copy(cart));
      },
      async delete(userId) {
        return state.carts.delete(userId);
      },
      async deleteUpdatedBefore(cutoff) {
        let removed = 0;
        for (const [userId, cart] of state.carts) {
          if (cart.updatedAt.getTime() < cutoff.getTime()) {
            state.carts.delete(userId);
            removed += 1;
          }
        }
        return removed;
      },
    },

    orders: {
      async insert(order) {
        state.orders.set(order.id, copy(order));
      },
      async findById(id) {
        return copyOrUndefined(state.orders.get(id));
      },
      async listByUser(userId, limit) {
        return [...state.orders.values()]
          .filter((order) => order.userId === userId)
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
          .slice(0, limit)
          .map(copy);
      },
      async update(id, patch) {
        return patchRecord(state.orders, id, patch, "Order");
      },
    },

    payments: {
      async insert(payment) {
        state.payments.set(payment.id, copy(payment));
      },
      async findById(id) {
        return copyOrUndefined(state.payments.get(id));
      },
      async listByOrder(orderId) {
        return [...state.payments.values()]
          .filter((payment) => payment.orderId === orderId)
          .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
          .map(copy);
      },
      async update(id, patch) {
        return patchRecord(state.payments, id, patch, "Payment");
      },
    },

    points: {
      async findAccount(userId) {
        return copyOrUndefined(state.pointsAccounts.get(userId));
      },
      async saveAccount(account) {
        state.pointsAccounts.set(account.userId, copy(account));
      },
      async appendTransaction(entry) {
        state.pointsTransactions.push(copy(entry));
      },
      async listTransactions(userId, limit) {
        return state.pointsTransactions
          .filter((entry) => entry.userId === userId)
          .reverse()
          .slice(0, limit)
          .map(copy);
      },
    },

    coupons: {
      async findByCode(code) {
        for (const coupon of state.coupons.values()) {
          if (coupon.code === code) return copy(coupon);
        }
        return undefined;
      },
      async insert(coupon) {
        for (const existing of state.coupons.values()) {
          if (existing.code === coupon.code) {
            throw new Error(`Coupon code ${coupon.code} already exists`);
          }
        }
        state.coupons.set(coupon.id, copy(coupon));
      },
      async incrementUsage(id) {
        const existing = state.coupons.get(id);
        patchRecord(state.coupons, id, { usageCount: (existing?.usageCount ?? 0) + 1 }, "Coupon");
      },
      async countUsageByUser(couponId, userId) {
        return state.couponUsages.filter(
          (usage) => usage.couponId === couponId && usage.userId === userId
        ).length;
      },
      async recordUsage(usage) {
        state.couponUsages.push(copy(usage));
      },
    },

    merchants: {
      async findById(id) {
        return copyOrUndefined(state.merchants.get(id));
      },
      async findByReferralCode(code) {
        for (const merchant of state.merchants.values()) {
          if (merchant.referralCode === code) return copy(merchant);
        }
        return undefined;
      },
      async update(id, patch) {
        return patchRecord(state.merchants, id, patch, "Merchant");
      },
    },

    referrals: {
      async insert(referral) {
        state.referrals.set(referral.id, copy(referral));
      },
      async findByToken(token) {
        for (const referral of state.referrals.values()) {
          if (referral.referralToken === token) return copy(referral);
        }
        return undefined;
      },
      async findByOrderId(orderId) {
        for (const referral of state.referrals.values()) {
          if (referral.orderId === orderId) return copy(referral);
        }
        return undefined;
      },
      async findPendingByUser(userId) {
        const pending = [...state.referrals.values()]
          .filter((referral) => referral.referredUserId === userId && referral.status === "pending")
          .sort((a, b) => b.clickedAt.getTime() - a.clickedAt.getTime());
        return copyOrUndefined(pending[0]);
      },
      async update(id, patch) {
        return patchRecord(state.referrals, id, patch, "Referral");
      },
      async expirePendingBefore(now) {
        let expired = 0;
        for (const referral of state.referrals.values()) {
          if (referral.status === "pending" && referral.expiresAt.getTime() < now.getTime()) {
            patchRecord(state.referrals, referral.id, { status: "expired", updatedAt: now }, "Referral");
            expired += 1;
          }
        }
        return expired;
      },
    },

    referralLinks: {
      async insert(link) {
        state.referralLinks.set(link.id, copy(link));
      },
      async findById(id) {
        return copyOrUndefined(state.referralLinks.get(id));
      },
      async findBySlug(slug) {
        for (const link of state.referralLinks.values()) {
          if (link.slug === slug) return copy(link);
        }
        return undefined;
      },
      async listByMerchant(merchantId) {
        return [...state.referralLinks.values()]
          .filter((link) => link.merchantId === merchantId)
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
          .map(copy);
      },
      async update(id, patch) {
        return patchRecord(state.referralLinks, id, patch, "Referral link");
      },
    },

    payouts: {
      async insert(payout) {
        state.payouts.set(payout.id, copy(payout));
      },
      async findById(id) {
        return copyOrUndefined(state.payouts.get(id));
      },
      async listByMerchant(merchantId) {
        return [...state.payouts.values()]
          .filter((payout) => payout.merchantId === merchantId)
          .sort((a, b) => b.requestedAt.getTime() - a.requestedAt.getTime())
          .map(copy);
      },
      async update(id, patch) {
        return patchRecord(state.payouts, id, patch, "Payout");
      },
      async sumCompleted(merchantId) {
        let total = 0;
        for (const payout of state.payouts.values()) {
          if (payout.merchantId === merchantId && payout.status === "completed") {
            total += payout.amount;
          }
        }
        return roundMoney(total);
      },
      async hasOpenPayout(merchantId) {
        for (const payout of state.payouts.values()) {
          if (
            payout.merchantId === merchantId &&
            (payout.status === "pending" || payout.status === "processing")
          ) {
            return true;
          }
        }
        return false;
      },
    },
  };

  const runIsolated = async <T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> => {
    const snapshot = snapshotOf(state);
    try {
      return await work(unitOfWork);
    } catch (error) {
      state = snapshot;
      throw error;
    }
  };

  return {
    transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
      const run = queue.then(() => runIsolated(work));
      queue = run.then(
        () => undefined,
        () => undefined
      );
      return run;
    },

    seed: {
      product(record) {
        state.products.set(record.id, copy(record));
      },
      variant(record) {
        state.variants.set(record.id, copy(record));
      },
      coupon(record) {
        state.coupons.set(record.id, copy(record));
      },
      merchant(record) {
        state.merchants.set(record.id, copy(record));
      },
      referralLink(record) {
        state.referralLinks.set(record.id, copy(record));
      },
      pointsAccount(record) {
        state.pointsAccounts.set(record.userId, copy(record));
      },
      cart(record) {
        state.carts.set(record.userId, copy(record));
      },
    },
  };
};
