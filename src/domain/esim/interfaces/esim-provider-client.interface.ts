/**
 * Contract every eSIM provider client implements
 *
 * Lookups return `null` when the provider has no subscription for the ICCID.
 * Exceptions are reserved for rejected credentials (AuthenticationFailure)
 * and network faults (TransientProviderError).
 */

import { ProviderContext, ProviderId, ProviderRecord } from '../models';

/**
 * Result of a provider-side renewal
 */
export interface ProviderFulfillmentResult {
  providerId: ProviderId;

  /**
   * Provider reference for the renewal, when the provider returns one
   */
  reference: string | null;

  /**
   * Raw provider response, stored on the order for audit
   */
  raw: unknown;
}

export interface EsimProviderClient {
  readonly providerId: ProviderId;

  /**
   * Context keys `fulfillRenewal` needs
   */
  readonly requiredContextKeys: readonly string[];

  lookupByICCID(iccid: string): Promise<ProviderRecord | null>;

  fulfillRenewal(context: ProviderContext): Promise<ProviderFulfillmentResult>;

  isHealthy(): Promise<boolean>;
}
