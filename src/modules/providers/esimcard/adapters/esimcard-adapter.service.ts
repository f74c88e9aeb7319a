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
import {
  EsimcardPackageUsageDto,
  EsimcardSimDetailsDto,
} from '../dto/esimcard-responses.dto';
import { EsimcardMapper } from '../mappers/esimcard.mapper';
import { EsimcardApiClientService } from './esimcard-api-client.service';

@Injectable()
export class EsimcardAdapter implements EsimProviderClient {
  private readonly logger = logger();
  readonly providerId = ProviderId.ESIMCARD;
  readonly requiredContextKeys = ['deviceIdentifier', 'packageId'] as const;

  constructor(private readonly esimcardApiClient: EsimcardApiClientService) {}

  async lookupByICCID(iccid: string): Promise<ProviderRecord | null> {
    const esims = await this.esimcardApiClient.listEsims();
    const summary = esims.find((candidate) =>
      iccidsMatch(EsimcardMapper.simIccid(candidate), iccid),
    );

    if (!summary) {
      return null;
    }

    let details: EsimcardSimDetailsDto | null = null;
    let usage: EsimcardPackageUsageDto | null = null;

    const esimId = summary.id;
    if (esimId) {
      details = await this.optional('details', esimId, () =>
        this.esimcardApiClient.getEsimDetails(esimId),
      );
      if (!details?.in_use_packages?.length && !details?.assigned_packages?.length) {
        usage = await this.optional('usage', esimId, () =>
          this.esimcardApiClient.getUsage(esimId),
        );
      }
    }

    return EsimcardMapper.toProviderRecord(summary, details, usage, iccid);
  }

  async fulfillRenewal(
    context: ProviderContext,
  ): Promise<ProviderFulfillmentResult> {
    const raw = await this.esimcardApiClient.purchasePackage(
      context.deviceIdentifier,
      context.packageId,
    );

    return {
      providerId: this.providerId,
      reference: context.packageId,
      raw,
    };
  }

  async isHealthy(): Promise<boolean> {
    return (
      this.esimcardApiClient.hasCredentials() &&
      !this.esimcardApiClient.isCircuitOpen()
    );
  }

  // the SIM listing already proves the match; details and usage only enrich it
  private async optional<T>(
    what: string,
    esimId: string,
    fetch: () => Promise<T | null>,
  ): Promise<T | null> {
    try {
      return await fetch();
    } catch (error) {
      this.logger.warn(
        { provider: this.providerId, esimId, what, error: errorMessage(error) },
        'eSIMCard enrichment unavailable',
      );
      return null;
    }
  }
}
