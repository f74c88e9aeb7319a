import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { EsimNotFoundError } from '../../../core/errors/esim.errors';
import { TEST_ICCID } from '../../../../test/fixtures/provider-record.factory';
import { LookupStatsService } from '../services/lookup-stats.service';
import {
  ParallelQueryCoordinatorService,
  ReconcileOptions,
  ReconciliationResult,
} from '../services/parallel-query-coordinator.service';
import { EsimLookupController } from './esim-lookup.controller';

describe('EsimLookupController', () => {
  async function createController() {
    const reconcile = jest.fn<
      Promise<ReconciliationResult>,
      [string, ReconcileOptions?]
    >();
    reconcile.mockResolvedValue({ found: false, outcomes: [] });

    const moduleRef = await Test.createTestingModule({
      controllers: [EsimLookupController],
      providers: [
        { provide: ParallelQueryCoordinatorService, useValue: { reconcile } },
        LookupStatsService,
      ],
    }).compile();

    return { controller: moduleRef.get(EsimLookupController), reconcile };
  }

  it('hands the request signal to the coordinator', async () => {
    const { controller, reconcile } = await createController();
    const signal = new AbortController().signal;

    await expect(
      controller.check({ iccid: ` ${TEST_ICCID} ` }, signal),
    ).rejects.toBeInstanceOf(EsimNotFoundError);
    expect(reconcile).toHaveBeenCalledWith(TEST_ICCID, { signal });
  });

  it('rejects a malformed ICCID before any lookup', async () => {
    const { controller, reconcile } = await createController();

    await expect(controller.check({ iccid: 'not-an-iccid' })).rejects.toBeInstanceOf(
      BadRequestException,
    );
    expect(reconcile).not.toHaveBeenCalled();
  });
});
