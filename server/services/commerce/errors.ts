/**
 * Commerce error taxonomy
 *
 * Every error raised by the commerce engines carries a machine-readable code
 * and the HTTP status the routes answer with.
 */

export type ErrorDetails = Record<string, unknown>;

export class CommerceError extends Error {
  /** HTTP status code for the error */
  status: number;
  /** Machine-readable error code */
  code: string;
  /** Structured context returned to API clients */
  details?: ErrorDetails;

  constructor(code: string, message: string, status: number, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class ValidationError extends CommerceError {
  constructor(code: string, message: string, details?: ErrorDetails) {
    super(code, message, 400, details);
  }
}

export class NotFoundError extends CommerceError {
  constructor(entity: string, id: string) {
    super(`${entity.toUpperCase().replace(/\s+/g, "_")}_NOT_FOUND`, `${entity} not found`, 404, { id });
  }
}

export class ForbiddenError extends CommerceError {
  constructor(message = "Not allowed to perform this action") {
    super("FORBIDDEN", message, 403);
  }
}

export class InsufficientStock extends CommerceError {
  readonly productId: string;
  readonly variantId: string | null;
  readonly requested: number;
  readonly available: number;

  constructor(input: {
    productId: string;
    variantId: string | null;
    productName: string;
    requested: number;
    available: number;
  }) {
    super(
      "INSUFFICIENT_STOCK",
      `Only ${Math.max(0, input.available)} of ${input.productName} available`,
      409,
      {
        productId: input.productId,
        variantId: input.variantId,
        requested: input.requested,
        available: Math.max(0, input.available),
      }
    );
    this.productId = input.productId;
    this.variantId = input.variantId;
    this.requested = input.requested;
    this.available = input.available;
  }
}

export class InsufficientPoints extends CommerceError {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number) {
    super(
      "INSUFFICIENT_POINTS",
      `Insufficient points: requested ${requested}, available ${available}`,
      409,
      { requested, available }
    );
    this.requested = requested;
    this.available = available;
  }
}

export const COUPON_REJECTION_REASONS = [
  "not_found",
  "inactive",
  "not_yet_valid",
  "expired",
  "usage_limit_reached",
  "user_limit_reached",
  "minimum_not_met",
] as const;

export type CouponRejectionReason = (typeof COUPON_REJECTION_REASONS)[number];

export class InvalidCouponError extends CommerceError {
  readonly reason: CouponRejectionReason;

  constructor(reason: CouponRejectionReason, message: string, details?: ErrorDetails) {
    super("INVALID_COUPON", message, 400, { reason, ...details });
    this.reason = reason;
  }
}

export class InvalidStatusTransition extends CommerceError {
  readonly entity: string;
  readonly from: string;
  readonly to: string;

  constructor(entity: string, from: string, to: string) {
    super("INVALID_STATUS_TRANSITION", `Cannot move ${entity} from ${from} to ${to}`, 409, {
      entity,
      from,
      to,
    });
    this.entity = entity;
    this.from = from;
    this.to = to;
  }
}

/** Raised inside referral conversion; logged and folded into the outcome. */
export class ReferralExpired extends CommerceError {
  constructor(referralId: string, expiresAt: Date) {
    super("REFERRAL_EXPIRED", "Referral has expired", 409, {
      referralId,
      expiresAt: expiresAt.toISOString(),
    });
  }
}

/** Raised inside referral conversion; logged and folded into the outcome. */
export class ReferralAlreadyConverted extends CommerceError {
  constructor(referralId: string, orderId: string | null) {
    super("REFERRAL_ALREADY_CONVERTED", "Referral has already been converted", 409, {
      referralId,
      orderId,
    });
  }
}

export class PaymentProcessingError extends CommerceError {
  constructor(code: string, message: string, details?: ErrorDetails) {
    super(code, message, 402, details);
  }
}
