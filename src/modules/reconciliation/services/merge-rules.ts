/**
 * Field precedence between providers during a merge
 *
 * Every field is `fill` unless a provider has an entry below.
 *
 * - fill: set only when the merged value is unset (`Unknown` for status)
 * - override-when-present: any non-null value replaces the merged one
 * - override-when-different: a known status replaces a different merged status
 * - fill-when-usage-empty: applied when merged consumed or remaining was unset
 *   at the start of the provider's pass
 * - override-when-generic: replaces an unset or placeholder merged value
 */

import { EsimSubscriptionField, ProviderId } from '../../../domain/esim';

export type MergeRule =
  | 'fill'
  | 'override-when-present'
  | 'override-when-different'
  | 'fill-when-usage-empty'
  | 'override-when-generic';

export const MERGE_FIELDS: readonly EsimSubscriptionField[] = [
  'externalId',
  'iccid',
  'planLabel',
  'activationStatus',
  'purchasedAt',
  'validityDays',
  'dataCapacity',
  'dataConsumed',
  'dataRemaining',
  'activationCode',
  'accessPointName',
  'bundleStartTime',
  'bundleEndTime',
];

export const MERGE_RULES: Record<
  ProviderId,
  Partial<Record<EsimSubscriptionField, MergeRule>>
> = {
  [ProviderId.AIRHUB]: {},
  [ProviderId.ESIMCARD]: {
    activationStatus: 'override-when-different',
    dataCapacity: 'override-when-present',
    dataConsumed: 'override-when-present',
    dataRemaining: 'override-when-present',
  },
  [ProviderId.TRAVELROAM]: {
    dataCapacity: 'fill-when-usage-empty',
    dataConsumed: 'fill-when-usage-empty',
    dataRemaining: 'fill-when-usage-empty',
    accessPointName: 'override-when-generic',
  },
};

export const GENERIC_ACCESS_POINT_NAMES: readonly string[] = [
  'n/a',
  'internet',
  'wholesale',
];

export function mergeRuleFor(
  provider: ProviderId,
  field: EsimSubscriptionField,
): MergeRule {
  return MERGE_RULES[provider][field] ?? 'fill';
}
