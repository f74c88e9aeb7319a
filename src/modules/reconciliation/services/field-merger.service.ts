import { Injectable } from '@nestjs/common';
import { logger } from '../../../core/logger/logger.config';
import {
  ActivationStatus,
  EsimSubscriptionField,
  EsimSubscriptionFields,
  MergedRecord,
  PROVIDER_DISPLAY_NAMES,
  PROVIDER_ORDER,
  ProviderId,
  ProviderRecord,
} from '../../../domain/esim';
import { scoreRecord } from './completeness-scorer';
import {
  GENERIC_ACCESS_POINT_NAMES,
  MERGE_FIELDS,
  MergeRule,
  mergeRuleFor,
} from './merge-rules';

type MergeState = {
  [K in EsimSubscriptionField]: EsimSubscriptionFields[K] | null;
};

export type ProviderRecords = Partial<Record<ProviderId, ProviderRecord>>;

@Injectable()
export class FieldMergerService {
  private readonly logger = logger();

  /**
   * Builds one record out of every provider's view, walking providers in
   * fixed order and applying the per-field rules from `MERGE_RULES`.
   */
  merge(
    records: ProviderRecords,
    primary: ProviderId,
    now: Date = new Date(),
  ): MergedRecord {
    const primaryRecord = records[primary];
    if (!primaryRecord) {
      throw new Error(`Primary provider ${primary} has no record to merge`);
    }

    const state = emptyState();
    const dataSources: ProviderId[] = [];
    const scores: Partial<Record<ProviderId, number>> = {};

    for (const provider of PROVIDER_ORDER) {
      const record = records[provider];
      if (!record) continue;

      scores[provider] = scoreRecord(record);

      const usageEmpty =
        state.dataConsumed === null || state.dataRemaining === null;

      let contributed = false;
      for (const field of MERGE_FIELDS) {
        const rule = mergeRuleFor(provider, field);
        if (applyField(state, record, field, rule, usageEmpty)) {
          contributed = true;
        }
      }

      if (contributed) {
        dataSources.push(provider);
      }
    }

    const bundleEndTime = records[ProviderId.TRAVELROAM]?.bundleEndTime;
    if (
      bundleEndTime &&
      bundleEndTime.getTime() < now.getTime() &&
      state.activationStatus !== ActivationStatus.EXPIRED
    ) {
      this.logger.debug(
        {
          iccid: primaryRecord.iccid,
          previousStatus: state.activationStatus,
          bundleEndTime: bundleEndTime.toISOString(),
        },
        'Bundle window ended, marking eSIM as expired',
      );
      state.activationStatus = ActivationStatus.EXPIRED;
      if (!dataSources.includes(ProviderId.TRAVELROAM)) {
        dataSources.push(ProviderId.TRAVELROAM);
      }
    }

    return {
      ...state,
      iccid: state.iccid ?? primaryRecord.iccid,
      activationStatus: state.activationStatus ?? ActivationStatus.UNKNOWN,
      primaryProvider: primary,
      dataSources,
      dataSourcesLabel: dataSources
        .map((provider) => PROVIDER_DISPLAY_NAMES[provider])
        .join(' + '),
      scores,
    };
  }
}

function emptyState(): MergeState {
  return {
    externalId: null,
    iccid: null,
    planLabel: null,
    activationStatus: ActivationStatus.UNKNOWN,
    purchasedAt: null,
    validityDays: null,
    dataCapacity: null,
    dataConsumed: null,
    dataRemaining: null,
    activationCode: null,
    accessPointName: null,
    bundleStartTime: null,
    bundleEndTime: null,
  };
}

/**
 * @returns whether the merged value changed
 */
function applyField<K extends EsimSubscriptionField>(
  state: MergeState,
  record: EsimSubscriptionFields,
  field: K,
  rule: MergeRule,
  usageEmpty: boolean,
): boolean {
  const incoming = record[field];
  const current = state[field];

  if (isUnset(field, incoming)) return false;

  if (!ruleApplies(rule, field, current, usageEmpty)) return false;
  if (sameValue(current, incoming)) return false;

  state[field] = incoming;
  return true;
}

function ruleApplies(
  rule: MergeRule,
  field: EsimSubscriptionField,
  current: unknown,
  usageEmpty: boolean,
): boolean {
  switch (rule) {
    case 'fill':
      return isUnset(field, current);
    case 'override-when-present':
    case 'override-when-different':
      return true;
    case 'fill-when-usage-empty':
      return usageEmpty;
    case 'override-when-generic':
      return current === null || isGenericAccessPoint(current);
  }
}

function isUnset(field: EsimSubscriptionField, value: unknown): boolean {
  if (field === 'activationStatus') {
    return value === null || value === ActivationStatus.UNKNOWN;
  }
  return value === null;
}

function isGenericAccessPoint(value: unknown): boolean {
  return (
    typeof value === 'string' &&
    GENERIC_ACCESS_POINT_NAMES.includes(value.trim().toLowerCase())
  );
}

function sameValue(left: unknown, right: unknown): boolean {
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime();
  }
  if (isQuantityLike(left) && isQuantityLike(right)) {
    return left.value === right.value && left.unit === right.unit;
  }
  return left === right;
}

function isQuantityLike(value: unknown): value is { value: unknown; unit: unknown } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'value' in value &&
    'unit' in value
  );
}
