import { createParamDecorator, ExecutionContext } from '@nestjs/common';

const requestSignals = new WeakMap<object, AbortSignal>();

export function bindRequestSignal(request: object, signal: AbortSignal): void {
  requestSignals.set(request, signal);
}

export function requestSignal(request: object): AbortSignal | undefined {
  return requestSignals.get(request);
}

/**
 * Aborts when TimeoutInterceptor gives up on the request or the response
 * stream is torn down. Undefined on routes without the interceptor.
 */
export const RequestSignal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AbortSignal | undefined =>
    requestSignal(ctx.switchToHttp().getRequest<object>()),
);
