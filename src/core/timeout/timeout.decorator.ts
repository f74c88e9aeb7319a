import { SetMetadata } from '@nestjs/common';

export const REQUEST_TIMEOUT_KEY = 'esim:request-timeout-ms';

/**
 * Route deadline in milliseconds, enforced by TimeoutInterceptor.
 * Handler metadata wins over controller metadata.
 */
export const Timeout = (timeoutMs: number) =>
  SetMetadata(REQUEST_TIMEOUT_KEY, timeoutMs);
