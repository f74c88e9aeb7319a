import { HttpStatus } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ExpressAdapter } from '@nestjs/platform-express';
import { ProviderId, RenewalOrderStatus } from '../../domain/esim';
import {
  EsimExceptionFilter,
  httpStatusFor,
  toErrorResponse,
} from './esim-exception.filter';
import {
  BundleNotMatchedError,
  EsimNotFoundError,
  InvalidOrderTransitionError,
  PartialFulfillmentFailure,
  PaymentNotConfirmedError,
  ReconciliationTimeoutError,
  TransientProviderError,
} from './esim.errors';

describe('httpStatusFor', () => {
  it.each([
    [new EsimNotFoundError('8944500000001234567'), HttpStatus.NOT_FOUND],
    [new PaymentNotConfirmedError('REN-1', 'unpaid'), HttpStatus.PAYMENT_REQUIRED],
    [
      new InvalidOrderTransitionError('REN-1', RenewalOrderStatus.COMPLETED, 'fulfill'),
      HttpStatus.CONFLICT,
    ],
    [new BundleNotMatchedError('Turkey 1GB', 'TR'), HttpStatus.UNPROCESSABLE_ENTITY],
    [new PartialFulfillmentFailure('REN-1', 'fulfill', 'boom'), HttpStatus.BAD_GATEWAY],
    [
      new TransientProviderError(ProviderId.AIRHUB, 'socket hang up'),
      HttpStatus.SERVICE_UNAVAILABLE,
    ],
    [new ReconciliationTimeoutError('8944500000001234567', 90000), HttpStatus.GATEWAY_TIMEOUT],
  ])('maps %s', (error, status) => {
    expect(httpStatusFor(error)).toBe(status);
  });

  it('carries the error context', () => {
    const error = new InvalidOrderTransitionError(
      'REN-1',
      RenewalOrderStatus.PENDING,
      'fulfill',
    );

    expect(error.message).toBe('Cannot fulfill order in status PENDING');
    expect(error.context).toEqual({
      orderId: 'REN-1',
      status: RenewalOrderStatus.PENDING,
      operation: 'fulfill',
    });
  });
});

describe('EsimExceptionFilter', () => {
  function createFilter() {
    const adapter = new ExpressAdapter();
    const reply = jest.spyOn(adapter, 'reply').mockImplementation(() => undefined);
    const adapterHost = new HttpAdapterHost();
    adapterHost.httpAdapter = adapter;
    return { filter: new EsimExceptionFilter(adapterHost), reply };
  }

  it('replies with the code and message only', () => {
    const { filter, reply } = createFilter();
    const response = {};
    const error = new TransientProviderError(
      ProviderId.AIRHUB,
      'Malformed provider response',
      { errors: ['getOrderdetails.0.capacity: capacity must be a number'] },
    );

    filter.catch(error, new ExecutionContextHost([{}, response]));

    expect(reply).toHaveBeenCalledWith(
      response,
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: 'PROVIDER_UNAVAILABLE',
        message: 'Malformed provider response',
      },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  });

  it('keeps request context out of client errors', () => {
    expect(toErrorResponse(new EsimNotFoundError('8944500000001234567'))).toEqual({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'ESIM_NOT_FOUND',
      message: 'eSIM not found in any provider',
    });
  });
});
