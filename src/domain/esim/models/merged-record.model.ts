/**
 * Merged record model
 *
 * Result of a reconciliation. Rebuilt from live provider data on every query.
 */

import { ProviderId } from './provider.model';
import { EsimSubscriptionFields } from './provider-record.model';

export interface MergedRecord extends EsimSubscriptionFields {
  /**
   * Highest-scoring provider, base of the merge
   */
  primaryProvider: ProviderId;

  /**
   * Providers that contributed at least one field, in processing order
   */
  dataSources: ProviderId[];

  /**
   * Display names of `dataSources` joined with " + "
   *
   * @example "AirHub + TravelRoam"
   */
  dataSourcesLabel: string;

  /**
   * Completeness score per provider that found the ICCID
   */
  scores: Partial<Record<ProviderId, number>>;
}
