import {
  PaymentTransaction,
  PaymentTransactionStatus,
  ProviderId,
  RenewalOrder,
  RenewalOrderStatus,
} from '../../../domain/esim';
import { ConfirmAndFulfillOutcome } from '../services/renewal-order-state-machine.service';

export interface RenewalOrderResponseDto {
  orderId: string;
  iccid: string;
  provider: ProviderId;
  amount: number;
  currency: string;
  status: RenewalOrderStatus;
  paymentStatus: PaymentTransactionStatus | null;
  paymentReference: string | null;
  providerOrderReference: string | null;

  /**
   * Set when fulfillment failed after the payment was captured
   */
  failureReason: string | null;
  paymentCaptured: boolean;

  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface ConfirmPaymentResponseDto {
  success: boolean;
  order: RenewalOrderResponseDto;
  message: string;

  /**
   * Present when the provider renewal failed
   */
  error?: { code: string; message: string; step: string; cause: string | null };
}

export function toRenewalOrderResponse(
  order: RenewalOrder,
  payment: PaymentTransaction | null,
): RenewalOrderResponseDto {
  return {
    orderId: order.orderId,
    iccid: order.iccid,
    provider: order.provider,
    amount: order.amount,
    currency: order.currency,
    status: order.status,
    paymentStatus: payment?.status ?? null,
    paymentReference: payment?.externalPaymentReference ?? null,
    providerOrderReference: order.providerOrderReference,
    failureReason: order.providerContext.failureReason ?? null,
    paymentCaptured: payment?.status === PaymentTransactionStatus.SUCCEEDED,
    createdAt: order.createdAt.toISOString(),
    updatedAt: order.updatedAt.toISOString(),
    completedAt: order.completedAt?.toISOString() ?? null,
  };
}

export function toConfirmPaymentResponse(
  outcome: ConfirmAndFulfillOutcome,
  payment: PaymentTransaction | null,
): ConfirmPaymentResponseDto {
  const order = toRenewalOrderResponse(outcome.order, payment);

  switch (outcome.status) {
    case 'completed':
      return {
        success: true,
        order,
        message: 'Payment confirmed and order completed successfully',
      };
    case 'unchanged':
      return {
        success: outcome.order.status === RenewalOrderStatus.COMPLETED,
        order,
        message: `Order already processed (${outcome.order.status})`,
      };
    case 'provider_failed':
      return {
        success: false,
        order,
        message: outcome.failure.message,
        error: {
          code: outcome.failure.code,
          message: outcome.failure.causeMessage,
          step: outcome.failure.step,
          cause: outcome.causeCode,
        },
      };
  }
}
