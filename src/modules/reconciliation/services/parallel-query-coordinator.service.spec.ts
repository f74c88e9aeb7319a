import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import {
  FakeProviderClient,
  never,
} from '../../../../test/fixtures/fake-provider-client';
import {
  makeProviderRecord,
  TEST_ICCID,
} from '../../../../test/fixtures/provider-record.factory';
import {
  AuthenticationFailure,
  ReconciliationCancelledError,
  ReconciliationTimeoutError,
  TransientProviderError,
} from '../../../core/errors/esim.errors';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { ProviderRegistry } from '../../../core/providers';
import { ActivationStatus, ProviderId } from '../../../domain/esim';
import { FieldMergerService } from './field-merger.service';
import { LookupStatsService } from './lookup-stats.service';
import { ParallelQueryCoordinatorService } from './parallel-query-coordinator.service';

interface Harness {
  coordinator: ParallelQueryCoordinatorService;
  stats: LookupStatsService;
  airhub: FakeProviderClient;
  esimcard: FakeProviderClient;
  travelroam: FakeProviderClient;
}

async function createHarness(
  limits: { lookup: number; aggregate: number } = { lookup: 200, aggregate: 1000 },
): Promise<Harness> {
  const moduleRef = await Test.createTestingModule({
    providers: [
      {
        provide: ConfigService,
        useValue: new ConfigService({
          ENABLED_PROVIDERS: 'AIRHUB,ESIMCARD,TRAVELROAM',
          ESIM_LOOKUP_TIMEOUT_MS: limits.lookup,
          ESIM_AGGREGATE_TIMEOUT_MS: limits.aggregate,
        }),
      },
      ProviderRegistry,
      ProcessingLimitsService,
      FieldMergerService,
      LookupStatsService,
      ParallelQueryCoordinatorService,
    ],
  }).compile();

  const registry = moduleRef.get(ProviderRegistry);
  const airhub = new FakeProviderClient(ProviderId.AIRHUB);
  const esimcard = new FakeProviderClient(ProviderId.ESIMCARD);
  const travelroam = new FakeProviderClient(ProviderId.TRAVELROAM);
  registry.registerProvider(travelroam);
  registry.registerProvider(airhub);
  registry.registerProvider(esimcard);

  return {
    coordinator: moduleRef.get(ParallelQueryCoordinatorService),
    stats: moduleRef.get(LookupStatsService),
    airhub,
    esimcard,
    travelroam,
  };
}

describe('ParallelQueryCoordinatorService', () => {
  it('keeps results from healthy providers when one rejects credentials', async () => {
    const { coordinator, airhub, esimcard, travelroam } = await createHarness();
    airhub.lookupByICCID.mockResolvedValue(
      makeProviderRecord(ProviderId.AIRHUB, {
        externalId: 'ORD-1',
        activationStatus: ActivationStatus.ACTIVE,
      }),
    );
    esimcard.lookupByICCID.mockRejectedValue(
      new AuthenticationFailure(ProviderId.ESIMCARD),
    );
    travelroam.lookupByICCID.mockResolvedValue(
      makeProviderRecord(ProviderId.TRAVELROAM, {
        dataConsumed: { value: 0.25, unit: 'GB' },
        dataRemaining: { value: 0.75, unit: 'GB' },
      }),
    );

    const result = await coordinator.reconcile(TEST_ICCID);

    if (!result.found) throw new Error('expected a merged record');
    expect(result.record.primaryProvider).toBe(ProviderId.TRAVELROAM);
    expect(result.record.dataSources).toEqual([
      ProviderId.AIRHUB,
      ProviderId.TRAVELROAM,
    ]);
    expect(result.record.externalId).toBe('ORD-1');
    expect(result.record.dataRemaining).toEqual({ value: 0.75, unit: 'GB' });
    expect(result.outcomes.map((o) => [o.providerId, o.status])).toEqual([
      [ProviderId.AIRHUB, 'found'],
      [ProviderId.ESIMCARD, 'failed'],
      [ProviderId.TRAVELROAM, 'found'],
    ]);
    expect(result.outcomes[1]).toMatchObject({ kind: 'authentication' });
  });

  it('queries providers in fixed order regardless of registration order', async () => {
    const { coordinator } = await createHarness();

    const result = await coordinator.reconcile(TEST_ICCID);

    expect(result.outcomes.map((o) => o.providerId)).toEqual([
      ProviderId.AIRHUB,
      ProviderId.ESIMCARD,
      ProviderId.TRAVELROAM,
    ]);
  });

  it('reports a miss when no provider knows the ICCID', async () => {
    const { coordinator, stats, travelroam } = await createHarness();
    travelroam.lookupByICCID.mockRejectedValue(
      new TransientProviderError(ProviderId.TRAVELROAM, 'HTTP 503'),
    );

    const result = await coordinator.reconcile(TEST_ICCID);

    expect(result.found).toBe(false);
    expect(result.outcomes[2]).toMatchObject({
      status: 'failed',
      kind: 'transient',
      message: 'HTTP 503',
    });
    expect(stats.getStats()).toMatchObject({
      totalQueries: 1,
      successfulQueries: 0,
      failedQueries: 1,
    });
  });

  it('breaks score ties in favour of the earlier provider', async () => {
    const { coordinator, airhub, esimcard } = await createHarness();
    airhub.lookupByICCID.mockResolvedValue(makeProviderRecord(ProviderId.AIRHUB));
    esimcard.lookupByICCID.mockResolvedValue(
      makeProviderRecord(ProviderId.ESIMCARD),
    );

    const result = await coordinator.reconcile(TEST_ICCID);

    if (!result.found) throw new Error('expected a merged record');
    expect(result.record.primaryProvider).toBe(ProviderId.AIRHUB);
    expect(result.record.scores).toEqual({
      [ProviderId.AIRHUB]: 30,
      [ProviderId.ESIMCARD]: 30,
    });
  });

  it('picks the provider with the most complete record as primary', async () => {
    const { coordinator, stats, airhub, esimcard } = await createHarness();
    airhub.lookupByICCID.mockResolvedValue(makeProviderRecord(ProviderId.AIRHUB));
    esimcard.lookupByICCID.mockResolvedValue(
      makeProviderRecord(ProviderId.ESIMCARD, {
        dataConsumed: { value: 100, unit: 'MB' },
      }),
    );

    const result = await coordinator.reconcile(TEST_ICCID);

    if (!result.found) throw new Error('expected a merged record');
    expect(result.record.primaryProvider).toBe(ProviderId.ESIMCARD);
    expect(stats.getStats().primaryProviderCounts).toEqual({
      [ProviderId.ESIMCARD]: 1,
    });
  });

  it('times out a slow provider without affecting the others', async () => {
    const { coordinator, airhub, travelroam } = await createHarness({
      lookup: 30,
      aggregate: 1000,
    });
    airhub.lookupByICCID.mockResolvedValue(makeProviderRecord(ProviderId.AIRHUB));
    travelroam.lookupByICCID.mockReturnValue(never());

    const result = await coordinator.reconcile(TEST_ICCID);

    expect(result.found).toBe(true);
    expect(result.outcomes[2]).toMatchObject({
      providerId: ProviderId.TRAVELROAM,
      status: 'failed',
      kind: 'timeout',
      message: 'Lookup timed out after 30ms',
    });
  });

  it('fails when the aggregate wait is exceeded', async () => {
    const { coordinator, esimcard } = await createHarness({
      lookup: 1000,
      aggregate: 30,
    });
    esimcard.lookupByICCID.mockReturnValue(never());

    await expect(coordinator.reconcile(TEST_ICCID)).rejects.toBeInstanceOf(
      ReconciliationTimeoutError,
    );
  });

  it('abandons the lookup when the caller aborts', async () => {
    const { coordinator, stats, airhub } = await createHarness();
    airhub.lookupByICCID.mockReturnValue(never());
    const controller = new AbortController();

    const pending = coordinator.reconcile(TEST_ICCID, {
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(ReconciliationCancelledError);
    expect(stats.getStats().failedQueries).toBe(1);
  });

  it('rejects an already aborted signal without querying', async () => {
    const { coordinator, airhub } = await createHarness();
    const controller = new AbortController();
    controller.abort();

    await expect(
      coordinator.reconcile(TEST_ICCID, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(ReconciliationCancelledError);
    expect(airhub.lookupByICCID).not.toHaveBeenCalled();
  });
});
