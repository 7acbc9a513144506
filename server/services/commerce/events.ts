import { EventEmitter } from "node:events";
import logger from "../../logger";
import type { Actor, OrderRecord, OrderStatus, PaymentRecord, ReferralRecord } from "./types";

/** Payloads published after the owning transaction commits */
export type CommerceEventMap = {
  "order.created": { order: OrderRecord };
  "order.status_changed": { order: OrderRecord; from: OrderStatus; to: OrderStatus; actor: Actor };
  "payment.completed": { payment: PaymentRecord; order: OrderRecord };
  "payment.failed": { payment: PaymentRecord; order: OrderRecord };
  /** A payment completed after its order was cancelled or refunded */
  "payment.needs_reconciliation": { payment: PaymentRecord; order: OrderRecord };
  "referral.converted": {
    referral: ReferralRecord;
    orderId: string;
    commission: number;
    pointsAwarded: number;
  };
};

export type CommerceEventName = keyof CommerceEventMap;

/**
 * Typed emitter for downstream subscribers (notifications, dashboards).
 * A throwing subscriber is logged and never reaches the operation that emitted.
 */
export class CommerceEvents {
  private readonly emitter = new EventEmitter();

  on<K extends CommerceEventName>(
    event: K,
    listener: (payload: CommerceEventMap[K]) => void | Promise<void>
  ): () => void {
    const wrapped = (payload: CommerceEventMap[K]) => {
      try {
        const result = listener(payload);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportFailure(event, error));
        }
      } catch (error) {
        this.reportFailure(event, error);
      }
    };
    this.emitter.on(event, wrapped);
    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  emit<K extends CommerceEventName>(event: K, payload: CommerceEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  private reportFailure(event: CommerceEventName, error: unknown): void {
    logger.error("[CommerceEvents] Subscriber failed", {
      event,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
