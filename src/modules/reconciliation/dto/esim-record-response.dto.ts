/**
 * Response DTOs for the eSIM lookup endpoints
 */

import { formatDataQuantity } from '../../../core/utils/data-quantity.util';
import {
  ActivationStatus,
  MergedRecord,
  ProviderId,
} from '../../../domain/esim';
import {
  ProviderFailureKind,
  ProviderLookupOutcome,
} from '../services/parallel-query-coordinator.service';

export interface ProviderOutcomeView {
  provider: ProviderId;
  status: 'found' | 'not_found' | 'failed';
  failure?: ProviderFailureKind;
  durationMs: number;
}

export interface EsimRecordResponseDto {
  iccid: string;
  externalId: string | null;
  planLabel: string | null;
  status: ActivationStatus;
  purchasedAt: string | null;
  validityDays: number | null;

  /**
   * Quantities rendered as "<value> <unit>"
   *
   * @example "1.00 GB"
   */
  dataCapacity: string | null;
  dataConsumed: string | null;
  dataRemaining: string | null;

  activationCode: string | null;
  accessPointName: string | null;
  bundleStartTime: string | null;
  bundleEndTime: string | null;

  primaryProvider: ProviderId;
  dataSources: ProviderId[];
  dataSourcesLabel: string;
  scores: Partial<Record<ProviderId, number>>;
  providers: ProviderOutcomeView[];
}

export function toEsimRecordResponse(
  record: MergedRecord,
  outcomes: ProviderLookupOutcome[],
): EsimRecordResponseDto {
  return {
    iccid: record.iccid,
    externalId: record.externalId,
    planLabel: record.planLabel,
    status: record.activationStatus,
    purchasedAt: isoOrNull(record.purchasedAt),
    validityDays: record.validityDays,
    dataCapacity: formatDataQuantity(record.dataCapacity),
    dataConsumed: formatDataQuantity(record.dataConsumed),
    dataRemaining: formatDataQuantity(record.dataRemaining),
    activationCode: record.activationCode,
    accessPointName: record.accessPointName,
    bundleStartTime: isoOrNull(record.bundleStartTime),
    bundleEndTime: isoOrNull(record.bundleEndTime),
    primaryProvider: record.primaryProvider,
    dataSources: record.dataSources,
    dataSourcesLabel: record.dataSourcesLabel,
    scores: record.scores,
    providers: outcomes.map(toOutcomeView),
  };
}

function toOutcomeView(outcome: ProviderLookupOutcome): ProviderOutcomeView {
  const view: ProviderOutcomeView = {
    provider: outcome.providerId,
    status: outcome.status,
    durationMs: outcome.durationMs,
  };
  if (outcome.status === 'failed') {
    view.failure = outcome.kind;
  }
  return view;
}

function isoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}
