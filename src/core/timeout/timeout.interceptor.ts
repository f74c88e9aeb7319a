import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  RequestTimeoutException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Observable, throwError, TimeoutError } from 'rxjs';
import { catchError, finalize, timeout } from 'rxjs/operators';
import { logger } from '../logger/logger.config';
import { bindRequestSignal } from './request-signal.decorator';
import { REQUEST_TIMEOUT_KEY } from './timeout.decorator';

const DEFAULT_TIMEOUT_MS = 120000;

@Injectable()
export class TimeoutInterceptor implements NestInterceptor {
  private readonly logger = logger();

  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const timeoutMs =
      this.reflector.getAllAndOverride<number | undefined>(REQUEST_TIMEOUT_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? DEFAULT_TIMEOUT_MS;

    const request = context.switchToHttp().getRequest<{ url?: string }>();
    const abortController = new AbortController();
    bindRequestSignal(request, abortController.signal);

    return next.handle().pipe(
      timeout(timeoutMs),
      catchError((err: unknown) => {
        if (err instanceof TimeoutError) {
          abortController.abort();
          this.logger.error(
            { timeoutMs, path: request.url },
            'TimeoutInterceptor: Request timed out',
          );
          return throwError(
            () =>
              new RequestTimeoutException(
                `Operation timed out after ${timeoutMs}ms`,
              ),
          );
        }
        return throwError(() => err);
      }),
      finalize(() => abortController.abort()),
    );
  }
}
