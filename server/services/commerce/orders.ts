/**
 * Order Engine
 *
 * Turns a cart snapshot into an immutable order and drives the order and
 * payment state machines. Every command is one unit of work; events are
 * published only after it commits.
 */

import type { CommerceConfig } from "../../config/commerce";
import { MONEY_EPSILON, ORDER_LIST_LIMIT } from "../../config/constants";
import logger from "../../logger";
import { availableCartLines } from "./cart";
import { normalizeCouponCode, validateCoupon } from "./coupons";
import { stockKey } from "./catalog";
import {
  ForbiddenError,
  InsufficientPoints,
  NotFoundError,
  PaymentProcessingError,
  ValidationError,
} from "./errors";
import type { CommerceEvents } from "./events";
import { newId, newOrderNumber } from "./ids";
import { releaseStock, reserveStock } from "./inventory";
import { isAtLeast, roundMoney, sumMoney } from "./money";
import type { ChargeResult, PaymentGateway } from "./paymentGateway";
import { earnPoints, refundPoints, spendPoints } from "./points";
import {
  calculatePointsEarned,
  calculatePricing,
  calculateSubtotal,
  shippingRates,
} from "./pricing";
import { orderStateMachine, paymentStateMachine } from "./stateMachines";
import type { CommerceStore, UnitOfWork } from "./store/types";
import type {
  Actor,
  CartSnapshot,
  CheckoutInput,
  Clock,
  CouponRecord,
  OrderLine,
  OrderPatch,
  OrderRecord,
  OrderStatus,
  OrderView,
  PaymentRecord,
  StatusChangeDetails,
  StockLine,
} from "./types";

/** Receives delivered orders for referral conversion */
export interface PurchaseAttribution {
  attributeFirstPurchase(orderId: string): Promise<unknown>;
}

export type OrderEngineDeps = {
  store: CommerceStore;
  config: CommerceConfig;
  events: CommerceEvents;
  clock: Clock;
  gateway?: PaymentGateway;
  attribution?: PurchaseAttribution;
};

export type RecordPaymentInput = {
  method: string;
  amount?: number;
  provider?: string;
};

/** Gateway callback, already mapped from the webhook's snake_case body */
export type PaymentCallback = {
  externalPaymentId: string | null;
  status: "completed" | "failed";
  providerDetails?: Record<string, unknown> | null;
};

export type SettlementResult = {
  payment: PaymentRecord;
  order: OrderRecord;
  /** True when the callback repeated an outcome already recorded */
  alreadySettled: boolean;
};

export function buildOrderView(order: OrderRecord, payments: PaymentRecord[]): OrderView {
  const amountPaid = sumMoney(
    payments.filter((payment) => payment.status === "completed").map((payment) => payment.amount)
  );
  const isPaid = isAtLeast(amountPaid, order.totalAmount);

  return {
    order,
    payments,
    amountPaid,
    balanceDue: isPaid ? 0 : roundMoney(order.totalAmount - amountPaid),
    isPaid,
    paymentStatus: isPaid
      ? "completed"
      : payments.some((payment) => payment.status === "failed")
        ? "failed"
        : "pending",
  };
}

function failureReasonOf(details: Record<string, unknown> | null | undefined): string {
  const reason = details?.["failure_reason"] ?? details?.["failureReason"];
  return typeof reason === "string" && reason.length > 0 ? reason : "Payment failed";
}

const toStockLines = (lines: readonly OrderLine[]): StockLine[] =>
  lines.map((line) => ({
    productId: line.productId,
    variantId: line.variantId,
    quantity: line.quantity,
  }));

export class OrderEngine {
  private readonly store: CommerceStore;
  private readonly config: CommerceConfig;
  private readonly events: CommerceEvents;
  private readonly clock: Clock;
  private readonly gateway?: PaymentGateway;
  private readonly attribution?: PurchaseAttribution;

  constructor(deps: OrderEngineDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.events = deps.events;
    this.clock = deps.clock;
    this.gateway = deps.gateway;
    this.attribution = deps.attribution;
  }

  // ==========================================================================
  // Order creation
  // ==========================================================================

  /**
   * Creates a pending order from an explicit snapshot. Inventory, coupon
   * usage, the points spend and the cart removal commit together.
   */
  async createOrder(
    userId: string,
    snapshot: CartSnapshot,
    input: CheckoutInput
  ): Promise<OrderRecord> {
    const order = await this.store.transaction((uow) =>
      this.placeOrder(uow, userId, snapshot.items, input)
    );
    this.announceCreated(order);
    return order;
  }

  /** Orders the available lines of the user's own cart. */
  async checkout(userId: string, input: CheckoutInput): Promise<OrderRecord> {
    const order = await this.store.transaction(async (uow) => {
      const lines = await availableCartLines(uow, userId);
      return this.placeOrder(uow, userId, lines, input);
    });
    this.announceCreated(order);
    return order;
  }

  private async placeOrder(
    uow: UnitOfWork,
    userId: string,
    lines: readonly StockLine[],
    input: CheckoutInput
  ): Promise<OrderRecord> {
    if (lines.length === 0) {
      throw new ValidationError("EMPTY_CART", "Cannot create an order from an empty cart");
    }
    const pointsToUse = input.pointsToUse ?? 0;
    if (!Number.isInteger(pointsToUse) || pointsToUse < 0) {
      throw new ValidationError("INVALID_POINTS", "Points to use must be a non-negative integer");
    }

    const now = this.clock();
    const reserved = await reserveStock(uow, lines);

    const orderLines: OrderLine[] = lines.map((line) => {
      const item = reserved.get(stockKey(line));
      if (!item) {
        throw new ValidationError("PRODUCT_UNAVAILABLE", "A product in your cart is no longer available", {
          productId: line.productId,
        });
      }
      const unitPrice = item.priceable.currentPrice();
      return {
        productId: item.ref.productId,
        variantId: item.ref.variantId,
        productName: item.product.name,
        sku: item.variant?.sku ?? item.product.sku,
        variantName: item.variant?.name ?? null,
        quantity: line.quantity,
        unitPrice,
        lineTotal: roundMoney(unitPrice * line.quantity),
        isDigital: item.product.isDigital,
      };
    });

    const country = input.shippingAddress.country;
    const allDigital = orderLines.every((line) => line.isDigital);
    const shippingMethod = allDigital ? "digital" : input.shippingMethod;
    if (
      !allDigital &&
      !shippingRates(orderLines, country, this.config).some((rate) => rate.method === shippingMethod)
    ) {
      throw new ValidationError(
        "SHIPPING_METHOD_UNAVAILABLE",
        `Shipping method ${shippingMethod} is not available for ${country}`
      );
    }

    let coupon: CouponRecord | undefined;
    let couponDiscount = 0;
    if (input.couponCode) {
      coupon = await uow.coupons.findByCode(normalizeCouponCode(input.couponCode), {
        forUpdate: true,
      });
      const usage = coupon ? await uow.coupons.countUsageByUser(coupon.id, userId) : 0;
      couponDiscount = validateCoupon(coupon, calculateSubtotal(orderLines), usage, now);
    }

    if (pointsToUse > 0) {
      const account = await uow.points.findAccount(userId, { forUpdate: true });
      const balance = account?.currentBalance ?? 0;
      if (pointsToUse > balance) {
        throw new InsufficientPoints(pointsToUse, balance);
      }
    }

    const breakdown = calculatePricing(
      {
        lines: orderLines,
        shippingMethod,
        destinationCountry: country,
        couponDiscount,
        pointsToUse,
      },
      this.config
    );

    const order: OrderRecord = {
      id: newId(),
      orderNumber: newOrderNumber(now),
      userId,
      status: "pending",
      currency: this.config.currency,
      subtotal: breakdown.subtotal,
      taxAmount: breakdown.tax,
      shippingAmount: breakdown.shipping,
      discountAmount: breakdown.discount,
      pointsDiscount: breakdown.pointsDiscount,
      totalAmount: breakdown.total,
      pointsEarned: calculatePointsEarned(breakdown.total, this.config.pointsEarnRate),
      pointsUsed: breakdown.pointsUsed,
      couponCode: coupon?.code ?? null,
      shippingMethod,
      shippingAddress: input.shippingAddress,
      billingAddress: input.billingAddress ?? input.shippingAddress,
      notes: input.notes ?? null,
      trackingNumber: null,
      cancellationReason: null,
      createdAt: now,
      updatedAt: now,
      shippedAt: null,
      deliveredAt: null,
      cancelledAt: null,
      lines: orderLines,
    };

    await uow.orders.insert(order);

    if (breakdown.pointsUsed > 0) {
      await spendPoints(uow, userId, breakdown.pointsUsed, {
        reason: `Redeemed on order ${order.orderNumber}`,
        orderId: order.id,
        now,
      });
    }

    if (coupon) {
      await uow.coupons.recordUsage({
        id: newId(),
        couponId: coupon.id,
        userId,
        orderId: order.id,
        discountAmount: breakdown.discount,
        createdAt: now,
      });
      await uow.coupons.incrementUsage(coupon.id);
    }

    await uow.carts.delete(userId);
    return order;
  }

  private announceCreated(order: OrderRecord): void {
    logger.info("[Orders] Order created", {
      orderId: order.id,
      orderNumber: order.orderNumber,
      userId: order.userId,
      total: order.totalAmount,
      pointsUsed: order.pointsUsed,
    });
    this.events.emit("order.created", { order });
  }

  // ==========================================================================
  // Status transitions
  // ==========================================================================

  /**
   * Moves an order along its state machine and applies the side effects of
   * the target state in the same transaction.
   *
   * @throws {InvalidStatusTransition} for moves the state machine forbids
   * @throws {ForbiddenError} when a customer does anything but cancel their own order
   */
  async transitionStatus(
    orderId: string,
    to: OrderStatus,
    actor: Actor,
    details: StatusChangeDetails = {}
  ): Promise<OrderRecord> {
    const { order, from } = await this.store.transaction(async (uow) => {
      const current = await uow.orders.findById(orderId, { forUpdate: true });
      if (!current) throw new NotFoundError("Order", orderId);
      if (actor.type === "customer") {
        if (current.userId !== actor.id) throw new NotFoundError("Order", orderId);
        if (to !== "cancelled") throw new ForbiddenError("Customers may only cancel their orders");
      }
      orderStateMachine.assertTransition(current.status, to);

      const now = this.clock();
      const patch: OrderPatch = { status: to, updatedAt: now };

      switch (to) {
        case "shipped":
          patch.shippedAt = now;
          if (details.trackingNumber) patch.trackingNumber = details.trackingNumber;
          break;
        case "delivered":
          patch.deliveredAt = now;
          if (current.pointsEarned > 0) {
            await earnPoints(uow, current.userId, current.pointsEarned, "earned_purchase", {
              reason: `Purchase ${current.orderNumber}`,
              orderId: current.id,
              now,
            });
          }
          break;
        case "cancelled":
          patch.cancelledAt = now;
          patch.cancellationReason = details.reason ?? null;
          await this.restoreReservations(uow, current, now, "cancelled");
          break;
        case "refunded":
          await this.restoreReservations(uow, current, now, "refunded");
          break;
        default:
          break;
      }

      return { order: await uow.orders.update(current.id, patch), from: current.status };
    });

    logger.info("[Orders] Order status changed", {
      orderId: order.id,
      from,
      to,
      actor: actor.type,
    });
    this.events.emit("order.status_changed", { order, from, to, actor });

    if (to === "delivered") {
      await this.attributeReferral(order.id);
    }
    return order;
  }

  cancelOrder(orderId: string, actor: Actor, reason?: string): Promise<OrderRecord> {
    return this.transitionStatus(orderId, "cancelled", actor, { reason });
  }

  private async restoreReservations(
    uow: UnitOfWork,
    order: OrderRecord,
    now: Date,
    outcome: "cancelled" | "refunded"
  ): Promise<void> {
    await releaseStock(uow, toStockLines(order.lines));
    if (order.pointsUsed > 0) {
      await refundPoints(uow, order.userId, order.pointsUsed, {
        reason: `Order ${order.orderNumber} ${outcome}`,
        orderId: order.id,
        now,
      });
    }
  }

  // Conversion is best effort: the delivery has already committed
  private async attributeReferral(orderId: string): Promise<void> {
    if (!this.attribution) return;
    try {
      await this.attribution.attributeFirstPurchase(orderId);
    } catch (error) {
      logger.error("[Orders] Referral attribution failed", {
        orderId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // ==========================================================================
  // Payments
  // ==========================================================================

  /** Opens a pending payment for the outstanding balance (or `amount`). */
  async recordPayment(
    orderId: string,
    input: RecordPaymentInput,
    actor?: Actor
  ): Promise<PaymentRecord> {
    if (input.method.trim().length === 0) {
      throw new ValidationError("INVALID_PAYMENT_METHOD", "Payment method is required");
    }

    const payment = await this.store.transaction(async (uow) => {
      const order = await uow.orders.findById(orderId, { forUpdate: true });
      if (!order || (actor?.type === "customer" && order.userId !== actor.id)) {
        throw new NotFoundError("Order", orderId);
      }
      if (order.status === "cancelled" || order.status === "refunded") {
        throw new ValidationError("ORDER_NOT_PAYABLE", `Order is ${order.status}`);
      }

      const view = buildOrderView(order, await uow.payments.listByOrder(order.id));
      if (view.isPaid) {
        throw new ValidationError("ORDER_ALREADY_PAID", "Order is already paid");
      }

      const amount = roundMoney(input.amount ?? view.balanceDue);
      if (!Number.isFinite(amount) || amount <= 0) {
        throw new ValidationError("INVALID_AMOUNT", "Payment amount must be positive");
      }
      if (amount > view.balanceDue + MONEY_EPSILON) {
        throw new ValidationError("AMOUNT_EXCEEDS_BALANCE", "Payment exceeds the balance due", {
          balanceDue: view.balanceDue,
        });
      }

      const record: PaymentRecord = {
        id: newId(),
        orderId: order.id,
        amount,
        currency: order.currency,
        method: input.method,
        provider: input.provider ?? this.gateway?.provider ?? null,
        status: "pending",
        externalPaymentId: null,
        providerDetails: null,
        failureReason: null,
        createdAt: this.clock(),
        processedAt: null,
      };
      await uow.payments.insert(record);
      return record;
    });

    logger.info("[Payments] Payment recorded", {
      paymentId: payment.id,
      orderId,
      amount: payment.amount,
      method: payment.method,
    });
    return payment;
  }

  /**
   * Applies a gateway callback. A completed payment never changes again; a
   * repeated callback with the same outcome is a no-op.
   *
   * @throws {PaymentProcessingError} when the callback contradicts a settled payment
   */
  async settlePayment(paymentId: string, callback: PaymentCallback): Promise<SettlementResult> {
    const result = await this.store.transaction(async (uow) => {
      const payment = await uow.payments.findById(paymentId, { forUpdate: true });
      if (!payment) throw new NotFoundError("Payment", paymentId);

      if (payment.status !== "pending") {
        if (payment.status !== callback.status) {
          throw new PaymentProcessingError(
            "PAYMENT_ALREADY_SETTLED",
            `Payment is already ${payment.status}`,
            { paymentId, status: payment.status }
          );
        }
        const order = await uow.orders.findById(payment.orderId);
        if (!order) throw new NotFoundError("Order", payment.orderId);
        return { payment, order, alreadySettled: true, advanced: false, orphaned: false };
      }

      paymentStateMachine.assertTransition(payment.status, callback.status);
      const order = await uow.orders.findById(payment.orderId, { forUpdate: true });
      if (!order) throw new NotFoundError("Order", payment.orderId);

      const now = this.clock();
      const settled = await uow.payments.update(payment.id, {
        status: callback.status,
        externalPaymentId: callback.externalPaymentId,
        providerDetails: callback.providerDetails ?? null,
        failureReason: callback.status === "failed" ? failureReasonOf(callback.providerDetails) : null,
        processedAt: now,
      });

      if (callback.status === "failed") {
        return { payment: settled, order, alreadySettled: false, advanced: false, orphaned: false };
      }
      if (orderStateMachine.isTerminal(order.status)) {
        return { payment: settled, order, alreadySettled: false, advanced: false, orphaned: true };
      }

      const view = buildOrderView(order, await uow.payments.listByOrder(order.id));
      if (!view.isPaid || order.status !== "pending") {
        return { payment: settled, order, alreadySettled: false, advanced: false, orphaned: false };
      }

      orderStateMachine.assertTransition(order.status, "processing");
      const advancedOrder = await uow.orders.update(order.id, { status: "processing", updatedAt: now });
      return {
        payment: settled,
        order: advancedOrder,
        alreadySettled: false,
        advanced: true,
        orphaned: false,
      };
    });

    if (result.alreadySettled) {
      logger.info("[Payments] Duplicate settlement ignored", {
        paymentId,
        status: result.payment.status,
      });
    } else if (result.payment.status === "completed") {
      logger.info("[Payments] Payment completed", {
        paymentId,
        orderId: result.order.id,
        amount: result.payment.amount,
      });
      this.events.emit("payment.completed", { payment: result.payment, order: result.order });
      if (result.orphaned) {
        logger.warn("[Payments] Payment completed on a closed order, needs reconciliation", {
          paymentId,
          orderId: result.order.id,
          orderStatus: result.order.status,
          amount: result.payment.amount,
        });
        this.events.emit("payment.needs_reconciliation", {
          payment: result.payment,
          order: result.order,
        });
      }
    } else {
      logger.warn("[Payments] Payment failed", {
        paymentId,
        orderId: result.order.id,
        reason: result.payment.failureReason,
      });
      this.events.emit("payment.failed", { payment: result.payment, order: result.order });
    }

    if (result.advanced) {
      this.events.emit("order.status_changed", {
        order: result.order,
        from: "pending",
        to: "processing",
        actor: { type: "system", id: "payments" },
      });
    }

    return { payment: result.payment, order: result.order, alreadySettled: result.alreadySettled };
  }

  /**
   * Records a payment and charges it through the configured gateway.
   *
   * @throws {PaymentProcessingError} when no gateway is configured or the charge fails
   */
  async processPayment(
    orderId: string,
    input: RecordPaymentInput,
    actor?: Actor
  ): Promise<SettlementResult> {
    const gateway = this.gateway;
    if (!gateway) {
      throw new PaymentProcessingError("GATEWAY_UNAVAILABLE", "No payment gateway is configured");
    }

    const payment = await this.recordPayment(orderId, input, actor);

    let charge: ChargeResult;
    try {
      charge = await gateway.charge({
        paymentId: payment.id,
        orderId,
        amount: payment.amount,
        currency: payment.currency,
        method: payment.method,
      });
    } catch (error) {
      logger.error("[Payments] Gateway charge threw", {
        paymentId: payment.id,
        error: error instanceof Error ? error.message : String(error),
      });
      charge = {
        status: "failed",
        failureReason: error instanceof Error ? error.message : "Gateway error",
      };
    }

    if (charge.status === "completed") {
      return this.settlePayment(payment.id, {
        externalPaymentId: charge.externalPaymentId,
        status: "completed",
        providerDetails: charge.details ?? null,
      });
    }

    await this.settlePayment(payment.id, {
      externalPaymentId: charge.externalPaymentId ?? null,
      status: "failed",
      providerDetails: { ...charge.details, failure_reason: charge.failureReason },
    });
    throw new PaymentProcessingError("PAYMENT_DECLINED", charge.failureReason, {
      paymentId: payment.id,
      orderId,
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /** Customers only see their own orders; others get a 404. */
  getOrder(orderId: string, viewer: Actor): Promise<OrderView> {
    return this.store.transaction(async (uow) => {
      const order = await uow.orders.findById(orderId);
      if (!order || (viewer.type === "customer" && order.userId !== viewer.id)) {
        throw new NotFoundError("Order", orderId);
      }
      return buildOrderView(order, await uow.payments.listByOrder(order.id));
    });
  }

  listOrders(userId: string, limit = ORDER_LIST_LIMIT): Promise<OrderRecord[]> {
    return this.store.transaction((uow) => uow.orders.listByUser(userId, limit));
  }
}
