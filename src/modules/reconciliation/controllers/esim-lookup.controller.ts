import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseInterceptors,
} from '@nestjs/common';
import { EsimNotFoundError } from '../../../core/errors/esim.errors';
import { RequestSignal } from '../../../core/timeout/request-signal.decorator';
import { Timeout } from '../../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import { sanitizeIccid } from '../../../core/utils/iccid.util';
import { EsimCheckRequestDto } from '../dto/esim-check-request.dto';
import {
  EsimRecordResponseDto,
  toEsimRecordResponse,
} from '../dto/esim-record-response.dto';
import { LookupStats, LookupStatsService } from '../services/lookup-stats.service';
import { ParallelQueryCoordinatorService } from '../services/parallel-query-coordinator.service';

@Controller('esim')
@UseInterceptors(TimeoutInterceptor)
export class EsimLookupController {
  constructor(
    private readonly coordinator: ParallelQueryCoordinatorService,
    private readonly lookupStats: LookupStatsService,
  ) {}

  /**
   * POST /api/esim/check
   *
   * Looks the ICCID up in every enabled provider and returns the merged view.
   * 404 when no provider knows it. Provider calls are abandoned once the
   * route deadline passes.
   */
  @Post('check')
  @HttpCode(HttpStatus.OK)
  @Timeout(120000)
  async check(
    @Body() body: EsimCheckRequestDto,
    @RequestSignal() signal?: AbortSignal,
  ): Promise<EsimRecordResponseDto> {
    const iccid = sanitizeIccid(body.iccid);
    if (!iccid) {
      throw new BadRequestException('Invalid ICCID format');
    }

    const result = await this.coordinator.reconcile(iccid, { signal });
    if (!result.found) {
      throw new EsimNotFoundError(iccid);
    }

    return toEsimRecordResponse(result.record, result.outcomes);
  }

  /**
   * GET /api/esim/stats
   */
  @Get('stats')
  getStats(): LookupStats {
    return this.lookupStats.getStats();
  }
}
