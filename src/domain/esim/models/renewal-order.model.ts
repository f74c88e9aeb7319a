/**
 * Renewal order model
 */

import { ProviderId } from './provider.model';

/**
 * Renewal order status
 *
 * PENDING -> PAID -> COMPLETED
 * PENDING -> FAILED (payment not captured)
 * PAID -> PROVIDER_FAILED (payment captured, fulfillment failed)
 * CANCELLED is set outside the state machine
 */
export enum RenewalOrderStatus {
  PENDING = 'PENDING',
  PAID = 'PAID',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  PROVIDER_FAILED = 'PROVIDER_FAILED',
  CANCELLED = 'CANCELLED',
}

/**
 * Opaque renewal parameters carried between the payment and fulfillment phases
 */
export type ProviderContext = Record<string, string>;

export interface RenewalOrder {
  /**
   * Public order identifier
   *
   * @example "REN-3F9A1C07B2D4"
   */
  orderId: string;

  iccid: string;

  provider: ProviderId;

  /**
   * Amount in major currency units
   */
  amount: number;

  /**
   * ISO 4217 code, upper-case
   */
  currency: string;

  status: RenewalOrderStatus;

  /**
   * Provider-side order or SIM reference the renewal applies to
   */
  providerOrderReference: string | null;

  providerContext: ProviderContext;

  /**
   * Raw result of the provider fulfillment call
   */
  providerResponse: unknown;

  customerEmail: string | null;

  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}
