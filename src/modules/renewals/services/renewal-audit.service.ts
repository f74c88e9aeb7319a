import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { errorMessage } from '../../../core/errors/esim.errors';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { logger } from '../../../core/logger/logger.config';
import { RenewalOrderStatus } from '../../../domain/esim';
import { RenewalOrderRepository } from '../repositories/renewal-order.repository';

export interface RenewalAuditResult {
  providerFailed: string[];
  stalePaid: string[];
}

/**
 * Reports orders that took money without delivering the renewal.
 * Never retries or refunds.
 */
@Injectable()
export class RenewalAuditService {
  private readonly logger = logger();
  private readonly enabled: boolean;

  constructor(
    private readonly repository: RenewalOrderRepository,
    private readonly limitsService: ProcessingLimitsService,
    private readonly configService: ConfigService,
  ) {
    this.enabled =
      String(this.configService.get<string | boolean>('RENEWAL_AUDIT_ENABLED', 'true')) ===
      'true';
  }

  @Cron(CronExpression.EVERY_HOUR)
  async scheduledAudit(): Promise<void> {
    if (!this.enabled) return;

    try {
      await this.audit();
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error) },
        'Scheduled renewal audit failed',
      );
    }
  }

  async audit(now: Date = new Date()): Promise<RenewalAuditResult> {
    const staleAfterMs = this.limitsService.getStalePaidOrderMinutes() * 60_000;
    const orders = await this.repository.findOrdersByStatus([
      RenewalOrderStatus.PROVIDER_FAILED,
      RenewalOrderStatus.PAID,
    ]);

    const result: RenewalAuditResult = { providerFailed: [], stalePaid: [] };

    for (const order of orders) {
      if (order.status === RenewalOrderStatus.PROVIDER_FAILED) {
        result.providerFailed.push(order.orderId);
        this.logger.warn(
          {
            orderId: order.orderId,
            iccid: order.iccid,
            provider: order.provider,
            amount: order.amount,
            currency: order.currency,
            failureReason: order.providerContext.failureReason ?? null,
            failureStep: order.providerContext.failureStep ?? null,
          },
          'Renewal paid but not fulfilled',
        );
        continue;
      }

      const ageMs = now.getTime() - order.updatedAt.getTime();
      if (ageMs > staleAfterMs) {
        result.stalePaid.push(order.orderId);
        this.logger.warn(
          {
            orderId: order.orderId,
            iccid: order.iccid,
            provider: order.provider,
            paidMinutesAgo: Math.floor(ageMs / 60_000),
          },
          'Renewal stuck in PAID',
        );
      }
    }

    this.logger.info(
      {
        providerFailed: result.providerFailed.length,
        stalePaid: result.stalePaid.length,
      },
      'Renewal audit completed',
    );

    return result;
  }
}
