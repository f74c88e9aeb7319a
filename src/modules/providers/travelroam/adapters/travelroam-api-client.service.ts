import { HttpService } from '@nestjs/axios';
import { HttpStatus, Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { providersConfig } from '../../../../config/providers.config';
import { CircuitBreakerService } from '../../../../core/circuit-breaker/circuit-breaker.service';
import { ProviderApiClient } from '../../../../core/http/provider-api-client';
import { ProcessingLimitsService } from '../../../../core/limits/processing-limits.service';
import { PayloadValidatorService } from '../../../../core/validation/payload-validator.service';
import { CatalogQuery, ProviderId } from '../../../../domain/esim';
import {
  TravelroamAppliedBundleDto,
  TravelroamAppliedBundlesResponseDto,
  TravelroamCatalogBundleDto,
  TravelroamCatalogResponseDto,
  TravelroamEsimDetailsDto,
  TravelroamLocationDto,
} from '../dto/travelroam-responses.dto';

export interface TravelroamOrderResult {
  orderReference: string | null;
  raw: unknown;
}

@Injectable()
export class TravelroamApiClientService extends ProviderApiClient {
  constructor(
    @Inject(providersConfig.KEY)
    private readonly config: ConfigType<typeof providersConfig>,
    httpService: HttpService,
    circuitBreakerService: CircuitBreakerService,
    limitsService: ProcessingLimitsService,
    validator: PayloadValidatorService,
  ) {
    super(
      ProviderId.TRAVELROAM,
      config.travelroam.baseUrl,
      httpService,
      circuitBreakerService,
      limitsService,
      validator,
    );
  }

  hasCredentials(): boolean {
    return Boolean(
      this.config.travelroam.apiKey && this.config.travelroam.clientSecret,
    );
  }

  /**
   * Null when TravelRoam does not know the ICCID
   */
  async getEsimDetails(iccid: string): Promise<TravelroamEsimDetailsDto | null> {
    const response = await this.post('/esims/details', { iccid });
    if (response.status === HttpStatus.NOT_FOUND) {
      return null;
    }

    const details = await this.parse(response.data, TravelroamEsimDetailsDto);
    return details.iccid ? details : null;
  }

  async getAppliedBundles(iccid: string): Promise<TravelroamAppliedBundleDto[]> {
    const body = await this.postExpectingBody('/esims/applied/bundles', { iccid });
    const response = await this.parse(body, TravelroamAppliedBundlesResponseDto);
    return response.bundles ?? [];
  }

  async getLocation(iccid: string): Promise<TravelroamLocationDto> {
    const body = await this.postExpectingBody('/esims/location', { iccid });
    return this.parse(body, TravelroamLocationDto);
  }

  async getCatalog(query: CatalogQuery): Promise<TravelroamCatalogBundleDto[]> {
    const payload: Record<string, string> = {};
    if (query.countries) payload.countries = query.countries;
    if (query.description) payload.description = query.description;

    const body = await this.postExpectingBody('/catalogue', payload);
    const response = await this.parse(body, TravelroamCatalogResponseDto);
    const bundles = response.bundles ?? [];

    this.logger.info(
      { query, bundles: bundles.length },
      'TravelRoam catalog retrieved',
    );
    return bundles;
  }

  /**
   * Orders a bundle. With an ICCID this tops up that eSIM; without one a new eSIM is issued.
   */
  async processOrder(
    bundleName: string,
    iccid?: string,
  ): Promise<TravelroamOrderResult> {
    const payload: Record<string, string> = {
      bundleName,
      orderType: 'COUNTRY',
    };
    if (iccid) payload.iccid = iccid;

    this.logger.info(
      { bundleName, topUp: Boolean(iccid) },
      'Processing TravelRoam order',
    );

    const raw = await this.postExpectingBody('/processorders', payload);
    const orderReference =
      typeof raw === 'object' &&
      raw !== null &&
      'orderReference' in raw &&
      typeof raw.orderReference === 'string'
        ? raw.orderReference
        : null;

    return { orderReference, raw };
  }

  private post(path: string, data: object) {
    return this.send({
      method: 'POST',
      path,
      data,
      headers: this.apiKeyHeaders(),
    });
  }

  private postExpectingBody(path: string, data: object): Promise<unknown> {
    return this.sendExpectingBody({
      method: 'POST',
      path,
      data,
      headers: this.apiKeyHeaders(),
    });
  }

  private apiKeyHeaders(): Record<string, string> {
    return {
      'x-api-key': this.config.travelroam.apiKey,
      clientSecret: this.config.travelroam.clientSecret,
    };
  }
}
