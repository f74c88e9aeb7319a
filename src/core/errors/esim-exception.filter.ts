import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { logger } from '../logger/logger.config';
import { EsimError } from './esim.errors';

const STATUS_BY_CODE: Record<string, HttpStatus> = {
  ESIM_NOT_FOUND: HttpStatus.NOT_FOUND,
  RENEWAL_ORDER_NOT_FOUND: HttpStatus.NOT_FOUND,
  MISSING_PROVIDER_CONTEXT: HttpStatus.BAD_REQUEST,
  INVALID_PAYLOAD: HttpStatus.BAD_REQUEST,
  PAYMENT_NOT_CONFIRMED: HttpStatus.PAYMENT_REQUIRED,
  INVALID_ORDER_TRANSITION: HttpStatus.CONFLICT,
  FULFILLMENT_IN_PROGRESS: HttpStatus.CONFLICT,
  BUNDLE_NOT_MATCHED: HttpStatus.UNPROCESSABLE_ENTITY,
  PARTIAL_FULFILLMENT_FAILURE: HttpStatus.BAD_GATEWAY,
  PROVIDER_AUTHENTICATION_FAILED: HttpStatus.BAD_GATEWAY,
  PAYMENT_GATEWAY_ERROR: HttpStatus.BAD_GATEWAY,
  PROVIDER_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  RECONCILIATION_CANCELLED: HttpStatus.SERVICE_UNAVAILABLE,
  RECONCILIATION_TIMEOUT: HttpStatus.GATEWAY_TIMEOUT,
};

export function httpStatusFor(error: EsimError): HttpStatus {
  return STATUS_BY_CODE[error.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;
}

export interface EsimErrorResponse {
  statusCode: HttpStatus;
  error: string;
  message: string;
}

/**
 * Client-facing body. Error context (upstream causes, payload errors) is
 * logged, never returned.
 */
export function toErrorResponse(error: EsimError): EsimErrorResponse {
  return {
    statusCode: httpStatusFor(error),
    error: error.code,
    message: error.message,
  };
}

@Catch(EsimError)
export class EsimExceptionFilter implements ExceptionFilter {
  private readonly logger = logger();

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: EsimError, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const body = toErrorResponse(exception);
    const logContext = {
      code: exception.code,
      error: exception.message,
      context: exception.context,
    };

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(logContext, 'Request failed');
    } else {
      this.logger.info(logContext, 'Request rejected');
    }

    httpAdapter.reply(ctx.getResponse(), body, body.statusCode);
  }
}
