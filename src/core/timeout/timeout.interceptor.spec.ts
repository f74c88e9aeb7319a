import { RequestTimeoutException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, NEVER, of } from 'rxjs';
import { requestSignal } from './request-signal.decorator';
import { Timeout } from './timeout.decorator';
import { TimeoutInterceptor } from './timeout.interceptor';

class LookupController {
  @Timeout(20)
  check(): void {}
}

function contextFor(request: object) {
  return new ExecutionContextHost(
    [request, {}],
    LookupController,
    LookupController.prototype.check,
  );
}

describe('TimeoutInterceptor', () => {
  const interceptor = new TimeoutInterceptor(new Reflector());

  it('aborts the request signal when the route deadline passes', async () => {
    const request = { url: '/api/esim/check' };

    const result = lastValueFrom(
      interceptor.intercept(contextFor(request), { handle: () => NEVER }),
    );
    const signal = requestSignal(request);

    expect(signal?.aborted).toBe(false);
    await expect(result).rejects.toBeInstanceOf(RequestTimeoutException);
    expect(signal?.aborted).toBe(true);
  });

  it('passes the handler result through', async () => {
    const request = { url: '/api/esim/stats' };

    await expect(
      lastValueFrom(
        interceptor.intercept(contextFor(request), { handle: () => of('done') }),
      ),
    ).resolves.toBe('done');
  });
});
