import { Injectable } from '@nestjs/common';
import { ProviderId } from '../../../domain/esim';

export interface LookupStats {
  totalQueries: number;
  successfulQueries: number;
  failedQueries: number;
  primaryProviderCounts: Partial<Record<ProviderId, number>>;
  lastQueryAt: string | null;
}

/**
 * In-memory counters for ICCID lookups since process start
 */
@Injectable()
export class LookupStatsService {
  private totalQueries = 0;
  private successfulQueries = 0;
  private failedQueries = 0;
  private readonly primaryProviderCounts: Partial<Record<ProviderId, number>> = {};
  private lastQueryAt: Date | null = null;

  recordSuccess(primaryProvider: ProviderId): void {
    this.totalQueries++;
    this.successfulQueries++;
    this.primaryProviderCounts[primaryProvider] =
      (this.primaryProviderCounts[primaryProvider] ?? 0) + 1;
    this.lastQueryAt = new Date();
  }

  /**
   * Not found in any provider, or the lookup itself failed
   */
  recordFailure(): void {
    this.totalQueries++;
    this.failedQueries++;
    this.lastQueryAt = new Date();
  }

  getStats(): LookupStats {
    return {
      totalQueries: this.totalQueries,
      successfulQueries: this.successfulQueries,
      failedQueries: this.failedQueries,
      primaryProviderCounts: { ...this.primaryProviderCounts },
      lastQueryAt: this.lastQueryAt?.toISOString() ?? null,
    };
  }
}
