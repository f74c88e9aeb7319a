import { Injectable } from '@nestjs/common';
import { errorMessage } from '../../../../core/errors/esim.errors';
import { logger } from '../../../../core/logger/logger.config';
import { iccidsMatch } from '../../../../core/utils/iccid.util';
import {
  EsimProviderClient,
  ProviderContext,
  ProviderFulfillmentResult,
  ProviderId,
  ProviderRecord,
} from '../../../../domain/esim';
import { AirhubMapper } from '../mappers/airhub.mapper';
import { AirhubApiClientService } from './airhub-api-client.service';

@Injectable()
export class AirhubAdapter implements EsimProviderClient {
  private readonly logger = logger();
  readonly providerId = ProviderId.AIRHUB;
  readonly requiredContextKeys = [
    'orderReference',
    'renewalDays',
    'chargedAmount',
  ] as const;

  constructor(private readonly airhubApiClient: AirhubApiClientService) {}

  async lookupByICCID(iccid: string): Promise<ProviderRecord | null> {
    const orders = await this.airhubApiClient.getOrders();
    const order = orders.find((candidate) =>
      iccidsMatch(AirhubMapper.orderIccid(candidate), iccid),
    );

    if (!order) {
      return null;
    }

    const activation = order.orderId
      ? await this.fetchActivation(order.orderId)
      : null;

    return AirhubMapper.toProviderRecord(order, activation, iccid);
  }

  async fulfillRenewal(
    context: ProviderContext,
  ): Promise<ProviderFulfillmentResult> {
    const renewalDays = Number(context.renewalDays);
    if (!Number.isInteger(renewalDays) || renewalDays <= 0) {
      throw new TypeError(`Invalid renewalDays: ${context.renewalDays}`);
    }

    const raw = await this.airhubApiClient.renewPlan({
      orderId: context.orderReference,
      renewalDays,
      userAmount: context.chargedAmount,
    });

    return {
      providerId: this.providerId,
      reference: context.orderReference,
      raw,
    };
  }

  async isHealthy(): Promise<boolean> {
    return (
      this.airhubApiClient.hasCredentials() &&
      !this.airhubApiClient.isCircuitOpen()
    );
  }

  // activation details are optional enrichment
  private async fetchActivation(orderId: string) {
    try {
      return await this.airhubApiClient.getActivationDetails(orderId);
    } catch (error) {
      this.logger.warn(
        { provider: this.providerId, orderId, error: errorMessage(error) },
        'Activation details unavailable',
      );
      return null;
    }
  }
}
