import { Injectable } from '@nestjs/common';
import {
  catchError,
  defer,
  firstValueFrom,
  forkJoin,
  map,
  Observable,
  of,
  takeUntil,
  tap,
  throwError,
  timeout,
  TimeoutError,
} from 'rxjs';
import {
  AuthenticationFailure,
  errorMessage,
  ReconciliationCancelledError,
  ReconciliationTimeoutError,
  TransientProviderError,
} from '../../../core/errors/esim.errors';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { logger } from '../../../core/logger/logger.config';
import { ProviderRegistry } from '../../../core/providers';
import {
  EsimProviderClient,
  MergedRecord,
  ProviderId,
  ProviderRecord,
} from '../../../domain/esim';
import { scoreRecord } from './completeness-scorer';
import { FieldMergerService, ProviderRecords } from './field-merger.service';
import { LookupStatsService } from './lookup-stats.service';

export type ProviderFailureKind =
  | 'authentication'
  | 'transient'
  | 'timeout'
  | 'unexpected';

export type ProviderLookupOutcome =
  | {
      providerId: ProviderId;
      status: 'found';
      record: ProviderRecord;
      durationMs: number;
    }
  | { providerId: ProviderId; status: 'not_found'; durationMs: number }
  | {
      providerId: ProviderId;
      status: 'failed';
      kind: ProviderFailureKind;
      message: string;
      durationMs: number;
    };

export type ReconciliationResult =
  | { found: true; record: MergedRecord; outcomes: ProviderLookupOutcome[] }
  | { found: false; outcomes: ProviderLookupOutcome[] };

export interface ReconcileOptions {
  /**
   * Abandons the lookup; provider calls still running are discarded
   */
  signal?: AbortSignal;
}

/**
 * Queries every enabled provider for an ICCID at once and merges whatever
 * they found. A provider that fails or times out only loses its own slot.
 */
@Injectable()
export class ParallelQueryCoordinatorService {
  private readonly logger = logger();

  constructor(
    private readonly providerRegistry: ProviderRegistry,
    private readonly limitsService: ProcessingLimitsService,
    private readonly fieldMerger: FieldMergerService,
    private readonly lookupStats: LookupStatsService,
  ) {}

  async reconcile(
    iccid: string,
    options: ReconcileOptions = {},
  ): Promise<ReconciliationResult> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new ReconciliationCancelledError(iccid);
    }

    const startTime = Date.now();
    const { lookupTimeoutMs, aggregateTimeoutMs } =
      this.limitsService.getReconciliationLimits();
    const clients = this.providerRegistry.getActiveProviderClients();

    this.logger.info(
      { iccid, providers: clients.map((c) => c.providerId) },
      'Starting eSIM reconciliation',
    );

    if (clients.length === 0) {
      this.logger.warn({ iccid }, 'No active providers to query');
      this.lookupStats.recordFailure();
      return { found: false, outcomes: [] };
    }

    let outcomes$ = forkJoin(
      clients.map((client) => this.lookup(client, iccid, lookupTimeoutMs)),
    ).pipe(
      timeout({
        first: aggregateTimeoutMs,
        with: () =>
          throwError(
            () => new ReconciliationTimeoutError(iccid, aggregateTimeoutMs),
          ),
      }),
    );

    if (signal) {
      outcomes$ = outcomes$.pipe(takeUntil(abortEvents(signal)));
    }

    let outcomes: ProviderLookupOutcome[] | null;
    try {
      outcomes = await firstValueFrom(outcomes$, { defaultValue: null });
    } catch (error) {
      this.lookupStats.recordFailure();
      throw error;
    }

    if (outcomes === null) {
      this.logger.warn({ iccid }, 'Reconciliation cancelled by caller');
      this.lookupStats.recordFailure();
      throw new ReconciliationCancelledError(iccid);
    }

    const records: ProviderRecords = {};
    let primary: ProviderId | null = null;
    let bestScore = -1;

    for (const outcome of outcomes) {
      if (outcome.status !== 'found') continue;

      records[outcome.providerId] = outcome.record;
      const score = scoreRecord(outcome.record);
      if (score > bestScore) {
        bestScore = score;
        primary = outcome.providerId;
      }
    }

    if (primary === null) {
      this.logger.info(
        { iccid, totalTime: Date.now() - startTime },
        'ICCID not found in any provider',
      );
      this.lookupStats.recordFailure();
      return { found: false, outcomes };
    }

    const record = this.fieldMerger.merge(records, primary);
    this.lookupStats.recordSuccess(primary);

    this.logger.info(
      {
        iccid,
        primaryProvider: primary,
        dataSources: record.dataSources,
        scores: record.scores,
        totalTime: Date.now() - startTime,
      },
      'eSIM reconciliation completed',
    );

    return { found: true, record, outcomes };
  }

  private lookup(
    client: EsimProviderClient,
    iccid: string,
    timeoutMs: number,
  ): Observable<ProviderLookupOutcome> {
    const providerId = client.providerId;
    const startedAt = Date.now();

    return defer(() => client.lookupByICCID(iccid)).pipe(
      timeout(timeoutMs),
      map((record): ProviderLookupOutcome =>
        record
          ? {
              providerId,
              status: 'found',
              record,
              durationMs: Date.now() - startedAt,
            }
          : { providerId, status: 'not_found', durationMs: Date.now() - startedAt },
      ),
      catchError((error: unknown) =>
        of<ProviderLookupOutcome>({
          providerId,
          status: 'failed',
          kind: failureKind(error),
          message:
            error instanceof TimeoutError
              ? `Lookup timed out after ${timeoutMs}ms`
              : errorMessage(error),
          durationMs: Date.now() - startedAt,
        }),
      ),
      tap((outcome) => this.logOutcome(iccid, outcome)),
    );
  }

  private logOutcome(iccid: string, outcome: ProviderLookupOutcome): void {
    const context = {
      iccid,
      provider: outcome.providerId,
      durationMs: outcome.durationMs,
    };

    switch (outcome.status) {
      case 'found':
        this.logger.debug(
          { ...context, score: scoreRecord(outcome.record) },
          'Provider found ICCID',
        );
        return;
      case 'not_found':
        this.logger.info(context, 'ICCID not found in provider');
        return;
      case 'failed': {
        const failure = { ...context, kind: outcome.kind, error: outcome.message };
        if (outcome.kind === 'authentication' || outcome.kind === 'unexpected') {
          this.logger.error(failure, 'Provider lookup failed');
        } else {
          this.logger.warn(failure, 'Provider lookup failed');
        }
      }
    }
  }
}

function failureKind(error: unknown): ProviderFailureKind {
  if (error instanceof AuthenticationFailure) return 'authentication';
  if (error instanceof TransientProviderError) return 'transient';
  if (error instanceof TimeoutError) return 'timeout';
  return 'unexpected';
}

function abortEvents(signal: AbortSignal): Observable<void> {
  return new Observable<void>((subscriber) => {
    const onAbort = () => subscriber.next();
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  });
}
