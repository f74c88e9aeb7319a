/**
 * Payment transaction model
 * One-to-one with a renewal order
 */

export enum PaymentTransactionStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
  REFUNDED = 'REFUNDED',
}

export interface PaymentTransaction {
  orderId: string;

  /**
   * Gateway checkout session id
   */
  checkoutHandle: string;

  /**
   * Gateway payment reference, known once the payment is confirmed
   */
  externalPaymentReference: string | null;

  amount: number;
  currency: string;
  status: PaymentTransactionStatus;

  rawProviderResponse: unknown;

  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}
