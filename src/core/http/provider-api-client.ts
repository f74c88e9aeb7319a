import { HttpService } from '@nestjs/axios';
import { HttpStatus } from '@nestjs/common';
import { AxiosRequestConfig, isAxiosError } from 'axios';
import { ClassConstructor } from 'class-transformer';
import CircuitBreaker from 'opossum';
import { firstValueFrom } from 'rxjs';
import { ProviderId } from '../../domain/esim';
import { CircuitBreakerService } from '../circuit-breaker/circuit-breaker.service';
import {
  AuthenticationFailure,
  errorMessage,
  InvalidPayloadError,
  TransientProviderError,
} from '../errors/esim.errors';
import { ProcessingLimitsService } from '../limits/processing-limits.service';
import { logger } from '../logger/logger.config';
import { PayloadValidatorService } from '../validation/payload-validator.service';

export interface ProviderHttpResponse {
  status: number;
  data: unknown;
}

export type ProviderRequest = Pick<
  AxiosRequestConfig,
  'method' | 'params' | 'data' | 'headers'
> & {
  path: string;
};

const NON_FAILURE_STATUSES = new Set<number>([
  HttpStatus.BAD_REQUEST,
  HttpStatus.UNAUTHORIZED,
  HttpStatus.FORBIDDEN,
  HttpStatus.NOT_FOUND,
  HttpStatus.UNPROCESSABLE_ENTITY,
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * HTTP plumbing shared by the provider API clients.
 *
 * Every call goes through the provider's circuit breaker, is attempted once,
 * and fails with AuthenticationFailure (401/403) or TransientProviderError.
 * 404 is returned to the caller as a response so lookups can treat it as
 * absence.
 */
export abstract class ProviderApiClient {
  protected readonly logger = logger();
  private circuitBreaker?: CircuitBreaker<[AxiosRequestConfig], ProviderHttpResponse>;

  protected constructor(
    readonly providerId: ProviderId,
    protected readonly baseUrl: string,
    protected readonly httpService: HttpService,
    protected readonly circuitBreakerService: CircuitBreakerService,
    protected readonly limitsService: ProcessingLimitsService,
    protected readonly validator: PayloadValidatorService,
  ) {}

  isCircuitOpen(): boolean {
    return this.circuitBreakerService.isProviderCircuitBreakerOpen(
      this.providerId,
    );
  }

  protected async send(request: ProviderRequest): Promise<ProviderHttpResponse> {
    const { path, ...rest } = request;
    const url = `${this.baseUrl.replace(/\/+$/, '')}${path}`;

    const requestConfig: AxiosRequestConfig = {
      ...rest,
      method: rest.method || 'GET',
      url,
      timeout: this.limitsService.getApiCallTimeout(),
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        ...rest.headers,
      },
    };

    this.logger.debug(
      { provider: this.providerId, method: requestConfig.method, url },
      'Making HTTP request',
    );

    try {
      return await this.getCircuitBreaker().fire(requestConfig);
    } catch (error) {
      throw this.toProviderError(error, path);
    }
  }

  /**
   * Like `send`, but a 404 is an error
   */
  protected async sendExpectingBody(request: ProviderRequest): Promise<unknown> {
    const response = await this.send(request);
    if (response.status === HttpStatus.NOT_FOUND) {
      throw new TransientProviderError(this.providerId, 'Resource not found', {
        endpoint: request.path,
        statusCode: response.status,
      });
    }
    return response.data;
  }

  /**
   * Validates a response body against a DTO class
   */
  protected async parse<T extends object>(
    payload: unknown,
    dtoClass: ClassConstructor<T>,
  ): Promise<T> {
    try {
      return await this.validator.validateWithDto(payload, dtoClass);
    } catch (error) {
      if (error instanceof InvalidPayloadError) {
        throw new TransientProviderError(
          this.providerId,
          'Malformed provider response',
          { errors: error.errors },
        );
      }
      throw error;
    }
  }

  private getCircuitBreaker(): CircuitBreaker<[AxiosRequestConfig], ProviderHttpResponse> {
    if (!this.circuitBreaker) {
      this.circuitBreaker =
        this.circuitBreakerService.createProviderCircuitBreaker(
          this.providerId,
          (config: AxiosRequestConfig) => this.execute(config),
          {
            timeout: this.limitsService.getApiCallTimeout(),
            errorFilter: (error) => {
              const status = isAxiosError(error) ? error.response?.status : undefined;
              return status !== undefined && NON_FAILURE_STATUSES.has(status);
            },
          },
        );
    }
    return this.circuitBreaker;
  }

  private async execute(config: AxiosRequestConfig): Promise<ProviderHttpResponse> {
    try {
      const response = await firstValueFrom(this.httpService.request(config));
      return { status: response.status, data: response.data };
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === HttpStatus.NOT_FOUND) {
        return { status: HttpStatus.NOT_FOUND, data: error.response.data };
      }
      throw error;
    }
  }

  private toProviderError(
    error: unknown,
    endpoint: string,
  ): AuthenticationFailure | TransientProviderError {
    if (
      error instanceof AuthenticationFailure ||
      error instanceof TransientProviderError
    ) {
      return error;
    }

    const code = errorCode(error);
    if (code === 'EOPENBREAKER') {
      return new TransientProviderError(this.providerId, 'Circuit breaker open', {
        endpoint,
      });
    }

    if (isAxiosError(error) && error.response) {
      const statusCode = error.response.status;
      if (
        statusCode === HttpStatus.UNAUTHORIZED ||
        statusCode === HttpStatus.FORBIDDEN
      ) {
        this.logger.error(
          { provider: this.providerId, endpoint, statusCode },
          'Provider rejected credentials',
        );
        this.onAuthenticationRejected();
        return new AuthenticationFailure(this.providerId, undefined, {
          endpoint,
          statusCode,
        });
      }

      this.logger.warn(
        { provider: this.providerId, endpoint, statusCode },
        'Provider request failed',
      );
      return new TransientProviderError(
        this.providerId,
        `Provider responded with HTTP ${statusCode}`,
        { endpoint, statusCode },
      );
    }

    this.logger.warn(
      { provider: this.providerId, endpoint, code, error: errorMessage(error) },
      'Provider request failed',
    );
    return new TransientProviderError(this.providerId, errorMessage(error), {
      endpoint,
      code,
    });
  }

  /**
   * Called when the provider answers 401/403; token-based clients drop their session here
   */
  protected onAuthenticationRejected(): void {}
}
