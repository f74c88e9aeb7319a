/**
 * Payment gateway collaborator used by the renewal flow
 */

export const PAYMENT_GATEWAY = Symbol('PAYMENT_GATEWAY');

export interface CheckoutMetadata {
  orderId: string;
  iccid: string;
  provider: string;
  packageName: string;
  customerEmail?: string | null;
}

export interface CheckoutSession {
  handle: string;
  redirectUrl: string | null;
  raw: unknown;
}

export interface CheckoutStatus {
  handle: string;
  paid: boolean;

  /**
   * Gateway-specific payment status (e.g. "paid", "unpaid", "no_payment_required")
   */
  paymentStatus: string;

  externalPaymentReference: string | null;
  raw: unknown;
}

export interface PaymentGateway {
  createCheckout(
    amount: number,
    currency: string,
    metadata: CheckoutMetadata,
  ): Promise<CheckoutSession>;

  retrieveCheckout(handle: string): Promise<CheckoutStatus>;
}
