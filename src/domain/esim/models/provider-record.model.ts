/**
 * Provider record model
 *
 * One provider's normalized view of an eSIM subscription. Unset values are
 * `null`; provider placeholders such as "N/A" or "" never reach this shape.
 */

import { DataQuantity } from './data-quantity.model';
import { ProviderId } from './provider.model';

/**
 * Activation status
 * Normalized across providers
 */
export enum ActivationStatus {
  ACTIVE = 'Active',
  INACTIVE = 'Inactive',
  INSTALLED = 'Installed',
  RELEASED = 'Released',
  ENABLED = 'Enabled',
  DISABLED = 'Disabled',
  EXPIRED = 'Expired',
  UNKNOWN = 'Unknown',
}

export const ACTIVE_LIKE_STATUSES: readonly ActivationStatus[] = [
  ActivationStatus.ACTIVE,
  ActivationStatus.ENABLED,
  ActivationStatus.INSTALLED,
];

/**
 * Subscription fields shared by provider records and merged records
 */
export interface EsimSubscriptionFields {
  /**
   * Provider-side order id, SIM id or matching id
   */
  externalId: string | null;

  /**
   * ICCID as reported by the provider
   */
  iccid: string;

  /**
   * Human-readable plan name
   *
   * @example "eSIM, 1GB, 7 Days, Turkey, V2"
   */
  planLabel: string | null;

  activationStatus: ActivationStatus;

  purchasedAt: Date | null;

  /**
   * Plan validity in whole days
   */
  validityDays: number | null;

  /**
   * Usage figures
   */
  dataCapacity: DataQuantity | null;
  dataConsumed: DataQuantity | null;
  dataRemaining: DataQuantity | null;

  /**
   * LPA string, QR payload or SM-DP+ address
   */
  activationCode: string | null;

  accessPointName: string | null;

  /**
   * Current bundle window, used for expiry detection
   */
  bundleStartTime: Date | null;
  bundleEndTime: Date | null;
}

export interface ProviderRecord extends EsimSubscriptionFields {
  providerId: ProviderId;
}

export type EsimSubscriptionField = keyof EsimSubscriptionFields;
