/**
 * Core types for the provider registry
 */

import { EsimProviderClient, ProviderId } from '../../domain/esim';

/**
 * Provider registration information
 */
export interface ProviderRegistration {
  /**
   * Provider identifier (e.g. AIRHUB)
   */
  id: ProviderId;

  /**
   * Client instance
   */
  client: EsimProviderClient;

  /**
   * Disabled providers are skipped by lookups and rejected for renewals
   */
  enabled: boolean;

  metadata: {
    displayName: string;
  };
}
