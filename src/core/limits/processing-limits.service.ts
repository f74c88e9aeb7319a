import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface ReconciliationLimits {
  lookupTimeoutMs: number;
  aggregateTimeoutMs: number;
}

@Injectable()
export class ProcessingLimitsService {
  constructor(private readonly configService: ConfigService) {}

  getReconciliationLimits(): ReconciliationLimits {
    return {
      lookupTimeoutMs: this.getNumber('ESIM_LOOKUP_TIMEOUT_MS', 30000),
      aggregateTimeoutMs: this.getNumber('ESIM_AGGREGATE_TIMEOUT_MS', 90000), // 1.5min
    };
  }

  getApiCallTimeout(): number {
    return this.getNumber('API_CALL_TIMEOUT', 30000);
  }

  getStalePaidOrderMinutes(): number {
    return this.getNumber('RENEWAL_STALE_PAID_MINUTES', 30);
  }

  // env values arrive as strings
  private getNumber(key: string, defaultValue: number): number {
    const value = Number(this.configService.get<number | string>(key, defaultValue));
    return Number.isFinite(value) && value > 0 ? value : defaultValue;
  }
}
