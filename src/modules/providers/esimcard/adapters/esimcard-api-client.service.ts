import { HttpService } from '@nestjs/axios';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { providersConfig } from '../../../../config/providers.config';
import { CircuitBreakerService } from '../../../../core/circuit-breaker/circuit-breaker.service';
import {
  AuthenticationFailure,
  TransientProviderError,
} from '../../../../core/errors/esim.errors';
import { ProviderApiClient } from '../../../../core/http/provider-api-client';
import { ProcessingLimitsService } from '../../../../core/limits/processing-limits.service';
import { PayloadValidatorService } from '../../../../core/validation/payload-validator.service';
import { ProviderId } from '../../../../domain/esim';
import {
  EsimcardLoginResponseDto,
  EsimcardPackageUsageDto,
  EsimcardSimDetailsDto,
  EsimcardSimDetailsResponseDto,
  EsimcardSimListResponseDto,
  EsimcardSimSummaryDto,
  EsimcardUsageResponseDto,
} from '../dto/esimcard-responses.dto';

@Injectable()
export class EsimcardApiClientService extends ProviderApiClient {
  private accessToken: Promise<string> | null = null;

  constructor(
    @Inject(providersConfig.KEY)
    private readonly config: ConfigType<typeof providersConfig>,
    httpService: HttpService,
    circuitBreakerService: CircuitBreakerService,
    limitsService: ProcessingLimitsService,
    validator: PayloadValidatorService,
  ) {
    super(
      ProviderId.ESIMCARD,
      config.esimcard.baseUrl,
      httpService,
      circuitBreakerService,
      limitsService,
      validator,
    );
  }

  hasCredentials(): boolean {
    return Boolean(this.config.esimcard.email && this.config.esimcard.password);
  }

  async listEsims(): Promise<EsimcardSimSummaryDto[]> {
    const response = await this.authorizedGet(
      '/my-esims',
      EsimcardSimListResponseDto,
    );
    return response.data ?? [];
  }

  async getEsimDetails(esimId: string): Promise<EsimcardSimDetailsDto | null> {
    const response = await this.authorizedGet(
      `/my-esims/${encodeURIComponent(esimId)}`,
      EsimcardSimDetailsResponseDto,
    );
    return response.data ?? null;
  }

  async getUsage(esimId: string): Promise<EsimcardPackageUsageDto | null> {
    const response = await this.authorizedGet(
      `/my-sim/${encodeURIComponent(esimId)}/usage`,
      EsimcardUsageResponseDto,
    );
    return response.data ?? null;
  }

  async purchasePackage(
    deviceIdentifier: string,
    packageId: string,
  ): Promise<unknown> {
    this.logger.info({ packageId }, 'Purchasing eSIMCard package');
    return this.authorizedPost('/purchase-package', {
      imei: deviceIdentifier,
      package_type_id: packageId,
    });
  }

  protected onAuthenticationRejected(): void {
    this.accessToken = null;
  }

  private async authorizedGet<T extends { status?: boolean; message?: string }>(
    path: string,
    dtoClass: new () => T,
  ): Promise<T> {
    const token = await this.getAccessToken();
    const body = await this.sendExpectingBody({
      path,
      headers: { Authorization: `Bearer ${token}` },
    });
    const response = await this.parse(body, dtoClass);

    if (response.status === false) {
      throw new TransientProviderError(
        this.providerId,
        response.message || 'eSIMCard request unsuccessful',
        { endpoint: path },
      );
    }
    return response;
  }

  private async authorizedPost(path: string, data: object): Promise<unknown> {
    const token = await this.getAccessToken();
    return this.sendExpectingBody({
      method: 'POST',
      path,
      data,
      headers: { Authorization: `Bearer ${token}` },
    });
  }

  private getAccessToken(): Promise<string> {
    if (!this.accessToken) {
      const pending = this.login();
      this.accessToken = pending;
      pending.catch(() => {
        if (this.accessToken === pending) this.accessToken = null;
      });
    }
    return this.accessToken;
  }

  private async login(): Promise<string> {
    if (!this.hasCredentials()) {
      throw new AuthenticationFailure(
        ProviderId.ESIMCARD,
        'eSIMCard credentials are not configured',
      );
    }

    const body = await this.sendExpectingBody({
      method: 'POST',
      path: '/login',
      data: {
        email: this.config.esimcard.email,
        password: this.config.esimcard.password,
      },
    });

    const response = await this.parse(body, EsimcardLoginResponseDto);
    if (!response.status || !response.access_token) {
      throw new AuthenticationFailure(
        ProviderId.ESIMCARD,
        response.message || 'eSIMCard login rejected',
      );
    }

    this.logger.debug('eSIMCard session established');
    return response.access_token;
  }
}
