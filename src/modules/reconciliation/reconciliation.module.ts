import { Module } from '@nestjs/common';
import { CoreModule } from '../../core/core.module';
import { AirhubModule } from '../providers/airhub/airhub.module';
import { EsimcardModule } from '../providers/esimcard/esimcard.module';
import { TravelroamModule } from '../providers/travelroam/travelroam.module';
import { EsimLookupController } from './controllers/esim-lookup.controller';
import { FieldMergerService } from './services/field-merger.service';
import { LookupStatsService } from './services/lookup-stats.service';
import { ParallelQueryCoordinatorService } from './services/parallel-query-coordinator.service';

/**
 * Reconciliation Module - one eSIM view across all providers
 *
 * Provider modules register their clients in ProviderRegistry; the
 * coordinator queries whichever are enabled.
 *
 * Endpoints:
 * - POST /api/esim/check - Merged record for an ICCID
 * - GET /api/esim/stats - Lookup counters
 */
@Module({
  imports: [CoreModule, AirhubModule, EsimcardModule, TravelroamModule],
  providers: [
    FieldMergerService,
    LookupStatsService,
    ParallelQueryCoordinatorService,
  ],
  controllers: [EsimLookupController],
  exports: [ParallelQueryCoordinatorService],
})
export class ReconciliationModule {}
