import { ProviderId, RenewalOrderStatus } from '../../domain/esim';

export type ErrorContext = Record<string, unknown>;

export abstract class EsimError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class EsimNotFoundError extends EsimError {
  readonly code = 'ESIM_NOT_FOUND';

  constructor(readonly iccid: string) {
    super('eSIM not found in any provider', { iccid });
  }
}

/**
 * Provider rejected our credentials
 */
export class AuthenticationFailure extends EsimError {
  readonly code = 'PROVIDER_AUTHENTICATION_FAILED';

  constructor(
    readonly providerId: ProviderId,
    message = 'Provider rejected credentials',
    context: ErrorContext = {},
  ) {
    super(message, { provider: providerId, ...context });
  }
}

/**
 * Network fault, timeout, open circuit or unusable upstream response
 */
export class TransientProviderError extends EsimError {
  readonly code = 'PROVIDER_UNAVAILABLE';

  constructor(
    readonly providerId: ProviderId,
    message: string,
    context: ErrorContext = {},
  ) {
    super(message, { provider: providerId, ...context });
  }
}

export class ReconciliationTimeoutError extends EsimError {
  readonly code = 'RECONCILIATION_TIMEOUT';

  constructor(iccid: string, timeoutMs: number) {
    super(`Reconciliation did not finish within ${timeoutMs}ms`, {
      iccid,
      timeoutMs,
    });
  }
}

export class ReconciliationCancelledError extends EsimError {
  readonly code = 'RECONCILIATION_CANCELLED';

  constructor(iccid: string) {
    super('Reconciliation cancelled by caller', { iccid });
  }
}

export class InvalidPayloadError extends EsimError {
  readonly code = 'INVALID_PAYLOAD';

  constructor(readonly errors: string[]) {
    super('Payload validation failed', { errors });
  }
}

export class MissingProviderContextError extends EsimError {
  readonly code = 'MISSING_PROVIDER_CONTEXT';

  constructor(
    readonly providerId: ProviderId,
    readonly missingKeys: string[],
  ) {
    super(
      `Missing renewal context for ${providerId}: ${missingKeys.join(', ')}`,
      { provider: providerId, missingKeys },
    );
  }
}

export class BundleNotMatchedError extends EsimError {
  readonly code = 'BUNDLE_NOT_MATCHED';

  constructor(planLabel: string, countryCode: string | null) {
    super(`No catalog bundle matches plan "${planLabel}"`, {
      planLabel,
      countryCode,
    });
  }
}

export class PaymentNotConfirmedError extends EsimError {
  readonly code = 'PAYMENT_NOT_CONFIRMED';

  constructor(
    readonly orderId: string,
    readonly paymentStatus: string,
  ) {
    super(`Payment not completed (status: ${paymentStatus})`, {
      orderId,
      paymentStatus,
    });
  }
}

/**
 * Payment captured, provider fulfillment failed. Requires manual reconciliation.
 */
export class PartialFulfillmentFailure extends EsimError {
  readonly code = 'PARTIAL_FULFILLMENT_FAILURE';

  constructor(
    readonly orderId: string,
    readonly step: string,
    readonly causeMessage: string,
  ) {
    super(`Payment captured but provider fulfillment failed: ${causeMessage}`, {
      orderId,
      step,
      paymentCaptured: true,
    });
  }
}

export class RenewalOrderNotFoundError extends EsimError {
  readonly code = 'RENEWAL_ORDER_NOT_FOUND';

  constructor(key: string) {
    super(`Renewal order not found: ${key}`, { key });
  }
}

export class InvalidOrderTransitionError extends EsimError {
  readonly code = 'INVALID_ORDER_TRANSITION';

  constructor(
    orderId: string,
    from: RenewalOrderStatus,
    operation: string,
  ) {
    super(`Cannot ${operation} order in status ${from}`, {
      orderId,
      status: from,
      operation,
    });
  }
}

export class FulfillmentInProgressError extends EsimError {
  readonly code = 'FULFILLMENT_IN_PROGRESS';

  constructor(orderId: string) {
    super('Fulfillment already running for this order', { orderId });
  }
}

export class PaymentGatewayError extends EsimError {
  readonly code = 'PAYMENT_GATEWAY_ERROR';

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
