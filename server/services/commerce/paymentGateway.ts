/**
 * Payment gateway contract. The engine only needs a yes or no and a
 * reference; real providers live behind this interface.
 */

export type ChargeRequest = {
  paymentId: string;
  orderId: string;
  amount: number;
  currency: string;
  method: string;
};

export type ChargeResult =
  | { status: "completed"; externalPaymentId: string; details?: Record<string, unknown> }
  | {
      status: "failed";
      externalPaymentId?: string;
      failureReason: string;
      details?: Record<string, unknown>;
    };

export interface PaymentGateway {
  readonly provider: string;
  charge(request: ChargeRequest): Promise<ChargeResult>;
}
