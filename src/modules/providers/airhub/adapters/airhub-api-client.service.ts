import { HttpService } from '@nestjs/axios';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { CircuitBreakerService } from '../../../../core/circuit-breaker/circuit-breaker.service';
import { AuthenticationFailure } from '../../../../core/errors/esim.errors';
import { ProviderApiClient } from '../../../../core/http/provider-api-client';
import { ProcessingLimitsService } from '../../../../core/limits/processing-limits.service';
import { PayloadValidatorService } from '../../../../core/validation/payload-validator.service';
import { ProviderId } from '../../../../domain/esim';
import { providersConfig } from '../../../../config/providers.config';
import {
  AirhubActivationDto,
  AirhubActivationResponseDto,
  AirhubLoginResponseDto,
  AirhubOrderDto,
  AirhubOrderListResponseDto,
} from '../dto/airhub-responses.dto';

interface AirhubSession {
  token: string;
  partnerCode: string;
}

export interface AirhubRenewRequest {
  orderId: string;
  renewalDays: number;
  userAmount: string;
}

@Injectable()
export class AirhubApiClientService extends ProviderApiClient {
  private session: Promise<AirhubSession> | null = null;

  constructor(
    @Inject(providersConfig.KEY)
    private readonly config: ConfigType<typeof providersConfig>,
    httpService: HttpService,
    circuitBreakerService: CircuitBreakerService,
    limitsService: ProcessingLimitsService,
    validator: PayloadValidatorService,
  ) {
    super(
      ProviderId.AIRHUB,
      config.airhub.baseUrl,
      httpService,
      circuitBreakerService,
      limitsService,
      validator,
    );
  }

  hasCredentials(): boolean {
    return Boolean(this.config.airhub.username && this.config.airhub.password);
  }

  /**
   * Orders of the partner account, most recent first (flag "1")
   */
  async getOrders(): Promise<AirhubOrderDto[]> {
    const session = await this.getSession();
    const body = await this.sendExpectingBody({
      method: 'POST',
      path: '/api/ESIM/GetOrderDetail',
      headers: this.authHeaders(session),
      data: {
        partnerCode: session.partnerCode,
        flag: '1',
        fromDate: '',
        toDate: '',
      },
    });

    const response = await this.parse(body, AirhubOrderListResponseDto);
    return response.getOrderdetails ?? [];
  }

  async getActivationDetails(orderId: string): Promise<AirhubActivationDto | null> {
    const session = await this.getSession();
    const body = await this.sendExpectingBody({
      method: 'POST',
      path: '/api/ESIM/GetActivationCode',
      headers: this.authHeaders(session),
      data: {
        partnerCode: session.partnerCode,
        orderid: [orderId],
      },
    });

    const response = await this.parse(body, AirhubActivationResponseDto);
    return response.getOrderdetails?.[0] ?? null;
  }

  async renewPlan(request: AirhubRenewRequest): Promise<unknown> {
    const session = await this.getSession();

    this.logger.info(
      { orderId: request.orderId, renewalDays: request.renewalDays },
      'Renewing AirHub plan',
    );

    return this.sendExpectingBody({
      method: 'POST',
      path: '/api/Renew/InsertRenew',
      headers: this.authHeaders(session),
      data: {
        userAmount: request.userAmount,
        orderID: request.orderId,
        renewalDays: request.renewalDays,
      },
    });
  }

  protected onAuthenticationRejected(): void {
    this.session = null;
  }

  private authHeaders(session: AirhubSession): Record<string, string> {
    return { Authorization: `Bearer ${session.token}` };
  }

  private getSession(): Promise<AirhubSession> {
    if (!this.session) {
      const pending = this.login();
      this.session = pending;
      pending.catch(() => {
        if (this.session === pending) this.session = null;
      });
    }
    return this.session;
  }

  private async login(): Promise<AirhubSession> {
    if (!this.hasCredentials()) {
      throw new AuthenticationFailure(
        ProviderId.AIRHUB,
        'AirHub credentials are not configured',
      );
    }

    const body = await this.sendExpectingBody({
      method: 'POST',
      path: '/api/Authentication/UserLogin',
      data: {
        userName: this.config.airhub.username,
        password: this.config.airhub.password,
      },
    });

    const response = await this.parse(body, AirhubLoginResponseDto);
    const partnerCode = response.data?.partnerCode;

    if (!response.isSuccess || !response.token || !partnerCode) {
      throw new AuthenticationFailure(
        ProviderId.AIRHUB,
        response.message || 'AirHub login rejected',
      );
    }

    this.logger.debug('AirHub session established');
    return { token: response.token, partnerCode };
  }
}
