import { Injectable } from '@nestjs/common';
import { errorMessage } from '../../../../core/errors/esim.errors';
import { logger } from '../../../../core/logger/logger.config';
import {
  EsimProviderClient,
  ProviderContext,
  ProviderFulfillmentResult,
  ProviderId,
  ProviderRecord,
} from '../../../../domain/esim';
import { TravelroamMapper } from '../mappers/travelroam.mapper';
import { TravelroamApiClientService } from './travelroam-api-client.service';

@Injectable()
export class TravelroamAdapter implements EsimProviderClient {
  private readonly logger = logger();
  readonly providerId = ProviderId.TRAVELROAM;
  readonly requiredContextKeys = ['bundleId'] as const;

  constructor(private readonly travelroamApiClient: TravelroamApiClientService) {}

  async lookupByICCID(iccid: string): Promise<ProviderRecord | null> {
    const details = await this.travelroamApiClient.getEsimDetails(iccid);
    if (!details) {
      return null;
    }

    const [bundles, location] = await Promise.all([
      this.optional('bundles', iccid, () =>
        this.travelroamApiClient.getAppliedBundles(iccid),
      ),
      this.optional('location', iccid, () =>
        this.travelroamApiClient.getLocation(iccid),
      ),
    ]);

    return TravelroamMapper.toProviderRecord(
      details,
      bundles ?? [],
      location,
      iccid,
    );
  }

  async fulfillRenewal(
    context: ProviderContext,
  ): Promise<ProviderFulfillmentResult> {
    const result = await this.travelroamApiClient.processOrder(
      context.bundleId,
      context.iccid || undefined,
    );

    return {
      providerId: this.providerId,
      reference: result.orderReference,
      raw: result.raw,
    };
  }

  async isHealthy(): Promise<boolean> {
    return (
      this.travelroamApiClient.hasCredentials() &&
      !this.travelroamApiClient.isCircuitOpen()
    );
  }

  private async optional<T>(
    what: string,
    iccid: string,
    fetch: () => Promise<T>,
  ): Promise<T | null> {
    try {
      return await fetch();
    } catch (error) {
      this.logger.warn(
        { provider: this.providerId, iccid, what, error: errorMessage(error) },
        'TravelRoam enrichment unavailable',
      );
      return null;
    }
  }
}
