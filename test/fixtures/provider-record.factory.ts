import {
  ActivationStatus,
  ProviderId,
  ProviderRecord,
} from '../../src/domain/esim';

export const TEST_ICCID = '8944500000001234567';

export function makeProviderRecord(
  providerId: ProviderId,
  overrides: Partial<ProviderRecord> = {},
): ProviderRecord {
  return {
    providerId,
    externalId: null,
    iccid: TEST_ICCID,
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
    ...overrides,
  };
}
