import {
  makeProviderRecord,
  TEST_ICCID,
} from '../../../../test/fixtures/provider-record.factory';
import { ActivationStatus, ProviderId } from '../../../domain/esim';
import { FieldMergerService } from './field-merger.service';

const NOW = new Date('2024-06-15T12:00:00Z');

describe('FieldMergerService', () => {
  const merger = new FieldMergerService();

  const airhub = makeProviderRecord(ProviderId.AIRHUB, {
    externalId: 'ORD-1001',
    planLabel: 'eSIM, 1GB, 7 Days, Turkey, V2',
    activationStatus: ActivationStatus.ACTIVE,
    validityDays: 7,
    dataCapacity: { value: 1, unit: 'GB' },
    dataConsumed: { value: 0.2, unit: 'GB' },
    dataRemaining: { value: 0.8, unit: 'GB' },
    accessPointName: 'internet',
  });

  const esimcard = makeProviderRecord(ProviderId.ESIMCARD, {
    externalId: 'SIM-77',
    planLabel: 'Turkey 1GB 7 Days',
    activationStatus: ActivationStatus.INACTIVE,
    dataCapacity: { value: 1024, unit: 'MB' },
    dataConsumed: { value: 300, unit: 'MB' },
    dataRemaining: { value: 724, unit: 'MB' },
    activationCode: 'LPA:1$smdp.example$CODE',
  });

  const travelroam = makeProviderRecord(ProviderId.TRAVELROAM, {
    externalId: 'MATCH-9',
    activationStatus: ActivationStatus.ENABLED,
    dataCapacity: { value: 1, unit: 'GB' },
    dataConsumed: { value: 0.5, unit: 'GB' },
    dataRemaining: { value: 0.5, unit: 'GB' },
    accessPointName: 'Turkcell (Turkey)',
    bundleStartTime: new Date('2024-06-10T00:00:00Z'),
    bundleEndTime: new Date('2024-06-17T00:00:00Z'),
    validityDays: 7,
  });

  it('translates a single record field for field', () => {
    const merged = merger.merge({ [ProviderId.AIRHUB]: airhub }, ProviderId.AIRHUB, NOW);

    expect(merged).toEqual({
      externalId: 'ORD-1001',
      iccid: TEST_ICCID,
      planLabel: 'eSIM, 1GB, 7 Days, Turkey, V2',
      activationStatus: ActivationStatus.ACTIVE,
      purchasedAt: null,
      validityDays: 7,
      dataCapacity: { value: 1, unit: 'GB' },
      dataConsumed: { value: 0.2, unit: 'GB' },
      dataRemaining: { value: 0.8, unit: 'GB' },
      activationCode: null,
      accessPointName: 'internet',
      bundleStartTime: null,
      bundleEndTime: null,
      primaryProvider: ProviderId.AIRHUB,
      dataSources: [ProviderId.AIRHUB],
      dataSourcesLabel: 'AirHub',
      scores: { [ProviderId.AIRHUB]: 150 },
    });
  });

  it('lets eSIMCard override usage and status but only fill other fields', () => {
    const merged = merger.merge(
      { [ProviderId.AIRHUB]: airhub, [ProviderId.ESIMCARD]: esimcard },
      ProviderId.AIRHUB,
      NOW,
    );

    expect(merged.externalId).toBe('ORD-1001');
    expect(merged.planLabel).toBe('eSIM, 1GB, 7 Days, Turkey, V2');
    expect(merged.activationStatus).toBe(ActivationStatus.INACTIVE);
    expect(merged.dataCapacity).toEqual({ value: 1024, unit: 'MB' });
    expect(merged.dataConsumed).toEqual({ value: 300, unit: 'MB' });
    expect(merged.dataRemaining).toEqual({ value: 724, unit: 'MB' });
    expect(merged.activationCode).toBe('LPA:1$smdp.example$CODE');
    expect(merged.dataSources).toEqual([ProviderId.AIRHUB, ProviderId.ESIMCARD]);
    expect(merged.dataSourcesLabel).toBe('AirHub + eSIMCard');
  });

  it('keeps the existing status when eSIMCard reports Unknown', () => {
    const merged = merger.merge(
      {
        [ProviderId.AIRHUB]: airhub,
        [ProviderId.ESIMCARD]: {
          ...esimcard,
          activationStatus: ActivationStatus.UNKNOWN,
        },
      },
      ProviderId.AIRHUB,
      NOW,
    );

    expect(merged.activationStatus).toBe(ActivationStatus.ACTIVE);
  });

  it('uses TravelRoam usage only when merged usage is still empty', () => {
    const withUsage = merger.merge(
      { [ProviderId.ESIMCARD]: esimcard, [ProviderId.TRAVELROAM]: travelroam },
      ProviderId.ESIMCARD,
      NOW,
    );
    expect(withUsage.dataConsumed).toEqual({ value: 300, unit: 'MB' });

    const withoutUsage = merger.merge(
      {
        [ProviderId.ESIMCARD]: {
          ...esimcard,
          dataConsumed: null,
          dataRemaining: null,
        },
        [ProviderId.TRAVELROAM]: travelroam,
      },
      ProviderId.ESIMCARD,
      NOW,
    );
    expect(withoutUsage.dataCapacity).toEqual({ value: 1, unit: 'GB' });
    expect(withoutUsage.dataConsumed).toEqual({ value: 0.5, unit: 'GB' });
    expect(withoutUsage.dataRemaining).toEqual({ value: 0.5, unit: 'GB' });
  });

  it('only fills status from TravelRoam', () => {
    const merged = merger.merge(
      { [ProviderId.AIRHUB]: airhub, [ProviderId.TRAVELROAM]: travelroam },
      ProviderId.AIRHUB,
      NOW,
    );

    expect(merged.activationStatus).toBe(ActivationStatus.ACTIVE);
  });

  it('replaces a generic access point name with the network-derived one', () => {
    const merged = merger.merge(
      { [ProviderId.AIRHUB]: airhub, [ProviderId.TRAVELROAM]: travelroam },
      ProviderId.AIRHUB,
      NOW,
    );
    expect(merged.accessPointName).toBe('Turkcell (Turkey)');

    const specific = merger.merge(
      {
        [ProviderId.AIRHUB]: { ...airhub, accessPointName: 'mobile.operator' },
        [ProviderId.TRAVELROAM]: travelroam,
      },
      ProviderId.AIRHUB,
      NOW,
    );
    expect(specific.accessPointName).toBe('mobile.operator');
  });

  it('forces Expired once the TravelRoam bundle has ended', () => {
    const merged = merger.merge(
      {
        [ProviderId.AIRHUB]: airhub,
        [ProviderId.TRAVELROAM]: {
          ...travelroam,
          bundleEndTime: new Date('2024-06-15T11:59:59Z'),
        },
      },
      ProviderId.AIRHUB,
      NOW,
    );

    expect(merged.activationStatus).toBe(ActivationStatus.EXPIRED);
  });

  it('does not mark a running bundle as expired', () => {
    const merged = merger.merge(
      { [ProviderId.TRAVELROAM]: travelroam },
      ProviderId.TRAVELROAM,
      NOW,
    );

    expect(merged.activationStatus).toBe(ActivationStatus.ENABLED);
  });

  it('is deterministic', () => {
    const records = {
      [ProviderId.AIRHUB]: airhub,
      [ProviderId.ESIMCARD]: esimcard,
      [ProviderId.TRAVELROAM]: travelroam,
    };

    expect(merger.merge(records, ProviderId.ESIMCARD, NOW)).toEqual(
      merger.merge(records, ProviderId.ESIMCARD, NOW),
    );
  });

  it('leaves out providers that contributed nothing', () => {
    const merged = merger.merge(
      {
        [ProviderId.AIRHUB]: airhub,
        [ProviderId.TRAVELROAM]: makeProviderRecord(ProviderId.TRAVELROAM),
      },
      ProviderId.AIRHUB,
      NOW,
    );

    expect(merged.dataSources).toEqual([ProviderId.AIRHUB]);
    expect(merged.scores).toEqual({
      [ProviderId.AIRHUB]: 150,
      [ProviderId.TRAVELROAM]: 30,
    });
  });

  it('rejects a primary without a record', () => {
    expect(() => merger.merge({}, ProviderId.AIRHUB, NOW)).toThrow(
      'Primary provider AIRHUB has no record to merge',
    );
  });
});
