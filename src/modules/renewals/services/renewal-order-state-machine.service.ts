import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  BundleNotMatchedError,
  errorMessage,
  EsimError,
  FulfillmentInProgressError,
  InvalidOrderTransitionError,
  MissingProviderContextError,
  PartialFulfillmentFailure,
  PaymentNotConfirmedError,
  RenewalOrderNotFoundError,
} from '../../../core/errors/esim.errors';
import { logger } from '../../../core/logger/logger.config';
import { ProviderRegistry } from '../../../core/providers';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import {
  PAYMENT_GATEWAY,
  PaymentGateway,
  PaymentTransaction,
  PaymentTransactionStatus,
  ProviderContext,
  ProviderId,
  RenewalOrder,
  RenewalOrderStatus,
} from '../../../domain/esim';
import { BundleMatcherService } from '../../providers/travelroam/services/bundle-matcher.service';
import { RenewalOrderRepository } from '../repositories/renewal-order.repository';
import {
  prepareRenewalContext,
  withoutFailureDetails,
} from './renewal-context';

export interface CreateRenewalOrderInput {
  iccid: string;
  provider: ProviderId;
  amount: number;
  currency: string;
  context: Record<string, string | undefined>;
  customerEmail?: string | null;
}

export interface PaymentInitiation {
  checkoutHandle: string;
  redirectUrl: string | null;
}

export type FulfillmentOutcome =
  | { status: 'completed'; order: RenewalOrder }
  | {
      status: 'provider_failed';
      order: RenewalOrder;
      failure: PartialFulfillmentFailure;

      /**
       * Error code of the underlying failure, e.g. "BUNDLE_NOT_MATCHED"
       */
      causeCode: string | null;
    };

export type ConfirmAndFulfillOutcome =
  | FulfillmentOutcome
  | { status: 'unchanged'; order: RenewalOrder };

type FulfillmentStep = 'resolve_bundle' | 'validate_context' | 'fulfill';

class FulfillmentStepError extends Error {
  constructor(
    readonly step: FulfillmentStep,
    readonly original: unknown,
  ) {
    super(errorMessage(original));
  }
}

/**
 * Renewal order lifecycle
 *
 *   PENDING -> PAID -> COMPLETED
 *   PENDING -> FAILED            payment not captured
 *   PAID -> PROVIDER_FAILED      payment captured, fulfillment failed
 *
 * Payment confirmation and fulfillment commit separately, so an order whose
 * fulfillment crashed stays PAID. A PROVIDER_FAILED order is only retried by
 * an operator and is never refunded from here.
 */
@Injectable()
export class RenewalOrderStateMachineService {
  private readonly logger = logger();
  private readonly fulfillmentsInFlight = new Set<string>();

  constructor(
    private readonly repository: RenewalOrderRepository,
    @Inject(PAYMENT_GATEWAY) private readonly paymentGateway: PaymentGateway,
    private readonly providerRegistry: ProviderRegistry,
    private readonly bundleMatcher: BundleMatcherService,
    private readonly validator: PayloadValidatorService,
  ) {}

  async create(input: CreateRenewalOrderInput): Promise<RenewalOrder> {
    const { providerContext, providerOrderReference } = prepareRenewalContext({
      iccid: input.iccid,
      provider: input.provider,
      amount: input.amount,
      context: input.context,
    });

    const now = new Date();
    const order: RenewalOrder = {
      orderId: generateOrderId(),
      iccid: input.iccid,
      provider: input.provider,
      amount: Math.round(input.amount * 100) / 100,
      currency: input.currency.toUpperCase(),
      status: RenewalOrderStatus.PENDING,
      providerOrderReference,
      providerContext,
      providerResponse: null,
      customerEmail: input.customerEmail ?? null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    };

    await this.repository.insert(order);

    this.logger.info(
      {
        orderId: order.orderId,
        iccid: order.iccid,
        provider: order.provider,
        amount: order.amount,
        currency: order.currency,
      },
      'Renewal order created',
    );

    return order;
  }

  async initiatePayment(
    orderId: string,
    displayPackageName?: string,
  ): Promise<PaymentInitiation> {
    const order = await this.requireOrder(orderId);
    assertStatus(order, [RenewalOrderStatus.PENDING], 'initiate payment for');

    const packageName =
      displayPackageName ||
      order.providerContext.planLabel ||
      `eSIM renewal (${order.provider})`;

    const checkout = await this.paymentGateway.createCheckout(
      order.amount,
      order.currency,
      {
        orderId: order.orderId,
        iccid: order.iccid,
        provider: order.provider,
        packageName,
        customerEmail: order.customerEmail,
      },
    );

    await this.repository.runInTransaction(orderId, (unit) => {
      assertStatus(unit.order, [RenewalOrderStatus.PENDING], 'initiate payment for');

      const now = new Date();
      unit.payment = {
        orderId,
        checkoutHandle: checkout.handle,
        externalPaymentReference: null,
        amount: unit.order.amount,
        currency: unit.order.currency,
        status: PaymentTransactionStatus.PENDING,
        rawProviderResponse: checkout.raw,
        createdAt: now,
        updatedAt: now,
        completedAt: null,
      };
      unit.order.updatedAt = now;
    });

    this.logger.info(
      { orderId, checkoutHandle: checkout.handle },
      'Payment initiated for renewal order',
    );

    return { checkoutHandle: checkout.handle, redirectUrl: checkout.redirectUrl };
  }

  /**
   * Records the gateway's verdict on the checkout. Orders past PENDING are
   * returned unchanged.
   *
   * @throws PaymentNotConfirmedError after committing FAILED
   */
  async confirmPayment(checkoutHandle: string): Promise<RenewalOrder> {
    const payment =
      await this.repository.findPaymentByCheckoutHandle(checkoutHandle);
    if (!payment) {
      throw new RenewalOrderNotFoundError(checkoutHandle);
    }

    const existing = await this.requireOrder(payment.orderId);
    if (existing.status !== RenewalOrderStatus.PENDING) {
      this.logger.info(
        { orderId: existing.orderId, status: existing.status },
        'Payment already processed',
      );
      return existing;
    }

    const checkout = await this.paymentGateway.retrieveCheckout(checkoutHandle);

    const order = await this.repository.runInTransaction(
      payment.orderId,
      (unit) => {
        if (unit.order.status !== RenewalOrderStatus.PENDING) {
          return unit.order;
        }

        const now = new Date();
        const transaction = requirePayment(unit.payment, unit.order.orderId);
        transaction.rawProviderResponse = checkout.raw;
        transaction.updatedAt = now;
        unit.order.updatedAt = now;

        if (checkout.paid) {
          transaction.status = PaymentTransactionStatus.SUCCEEDED;
          transaction.externalPaymentReference = checkout.externalPaymentReference;
          unit.order.status = RenewalOrderStatus.PAID;
        } else {
          transaction.status = PaymentTransactionStatus.FAILED;
          unit.order.status = RenewalOrderStatus.FAILED;
        }

        return unit.order;
      },
    );

    if (order.status === RenewalOrderStatus.FAILED && !checkout.paid) {
      this.logger.warn(
        { orderId: order.orderId, paymentStatus: checkout.paymentStatus },
        'Payment not completed, order failed',
      );
      throw new PaymentNotConfirmedError(order.orderId, checkout.paymentStatus);
    }

    this.logger.info(
      {
        orderId: order.orderId,
        paymentReference: checkout.externalPaymentReference,
      },
      'Payment confirmed',
    );

    return order;
  }

  /**
   * Runs the provider renewal for a PAID order
   */
  async fulfill(orderId: string): Promise<FulfillmentOutcome> {
    return this.runFulfillment(orderId, [RenewalOrderStatus.PAID], 'fulfill');
  }

  async confirmAndFulfill(
    checkoutHandle: string,
  ): Promise<ConfirmAndFulfillOutcome> {
    const order = await this.confirmPayment(checkoutHandle);
    if (order.status !== RenewalOrderStatus.PAID) {
      return { status: 'unchanged', order };
    }
    return this.fulfill(order.orderId);
  }

  /**
   * Operator retry of a PAID or PROVIDER_FAILED order
   */
  async retryFulfillment(orderId: string): Promise<FulfillmentOutcome> {
    this.logger.info({ orderId }, 'Manual fulfillment retry requested');
    return this.runFulfillment(
      orderId,
      [RenewalOrderStatus.PAID, RenewalOrderStatus.PROVIDER_FAILED],
      'retry fulfillment for',
    );
  }

  async getOrder(
    orderId: string,
  ): Promise<{ order: RenewalOrder; payment: PaymentTransaction | null }> {
    const order = await this.requireOrder(orderId);
    const payment = await this.repository.findPayment(orderId);
    return { order, payment };
  }

  private async runFulfillment(
    orderId: string,
    allowed: readonly RenewalOrderStatus[],
    operation: string,
  ): Promise<FulfillmentOutcome> {
    if (this.fulfillmentsInFlight.has(orderId)) {
      throw new FulfillmentInProgressError(orderId);
    }
    this.fulfillmentsInFlight.add(orderId);

    try {
      const order = await this.requireOrder(orderId);
      assertStatus(order, allowed, operation);

      this.logger.info(
        { orderId, provider: order.provider, status: order.status },
        'Starting provider fulfillment',
      );

      try {
        const result = await this.executeFulfillment(order);

        const completed = await this.repository.runInTransaction(
          orderId,
          (unit) => {
            const now = new Date();
            unit.order.status = RenewalOrderStatus.COMPLETED;
            unit.order.providerContext = withoutFailureDetails(result.context);
            unit.order.providerResponse = result.raw;
            unit.order.providerOrderReference =
              result.reference ?? unit.order.providerOrderReference;
            unit.order.completedAt = now;
            unit.order.updatedAt = now;

            if (unit.payment) {
              unit.payment.completedAt = now;
              unit.payment.updatedAt = now;
            }
            return unit.order;
          },
        );

        this.logger.info(
          {
            orderId,
            provider: completed.provider,
            reference: completed.providerOrderReference,
          },
          'Renewal order completed',
        );

        return { status: 'completed', order: completed };
      } catch (error) {
        return await this.recordProviderFailure(order, error);
      }
    } finally {
      this.fulfillmentsInFlight.delete(orderId);
    }
  }

  private async executeFulfillment(
    order: RenewalOrder,
  ): Promise<{ context: ProviderContext; reference: string | null; raw: unknown }> {
    const context = await this.step('resolve_bundle', () =>
      this.buildFulfillmentContext(order),
    );

    const client = await this.step('validate_context', async () => {
      const providerClient = this.providerRegistry.getProviderClient(
        order.provider,
      );
      if (!providerClient) {
        throw new Error(`Provider ${order.provider} is not enabled`);
      }

      const missing = this.validator.findMissingFields(
        context,
        providerClient.requiredContextKeys,
      );
      if (missing.length > 0) {
        throw new MissingProviderContextError(order.provider, missing);
      }
      return providerClient;
    });

    const result = await this.step('fulfill', () =>
      client.fulfillRenewal(context),
    );

    return { context, reference: result.reference, raw: result.raw };
  }

  private async buildFulfillmentContext(
    order: RenewalOrder,
  ): Promise<ProviderContext> {
    const context = withoutFailureDetails(order.providerContext);
    if (order.provider !== ProviderId.TRAVELROAM) {
      return context;
    }

    const iccid = context.iccid || order.iccid;
    if (context.bundleId) {
      return { ...context, iccid };
    }

    const planLabel = context.planLabel ?? '';
    const countryCode = context.countryCode || null;
    const bundleId = await this.bundleMatcher.findBundle(planLabel, countryCode);
    if (!bundleId) {
      throw new BundleNotMatchedError(planLabel, countryCode);
    }

    this.logger.info(
      { orderId: order.orderId, planLabel, bundleId },
      'Resolved bundle for renewal',
    );
    return { ...context, bundleId, iccid };
  }

  private async recordProviderFailure(
    order: RenewalOrder,
    error: unknown,
  ): Promise<FulfillmentOutcome> {
    const step: FulfillmentStep =
      error instanceof FulfillmentStepError ? error.step : 'fulfill';
    const cause = error instanceof FulfillmentStepError ? error.original : error;
    const failure = new PartialFulfillmentFailure(
      order.orderId,
      step,
      errorMessage(cause),
    );

    this.logger.error(
      {
        orderId: order.orderId,
        iccid: order.iccid,
        provider: order.provider,
        step,
        error: errorMessage(cause),
        errorCode: cause instanceof EsimError ? cause.code : null,
        paymentCaptured: true,
      },
      'Provider fulfillment failed after payment, manual reconciliation required',
    );

    const failed = await this.repository.runInTransaction(
      order.orderId,
      (unit) => {
        unit.order.status = RenewalOrderStatus.PROVIDER_FAILED;
        unit.order.providerContext = {
          ...unit.order.providerContext,
          failureReason: errorMessage(cause),
          failureStep: step,
          paymentCaptured: 'true',
        };
        unit.order.updatedAt = new Date();
        return unit.order;
      },
    );

    return {
      status: 'provider_failed',
      order: failed,
      failure,
      causeCode: cause instanceof EsimError ? cause.code : null,
    };
  }

  private async step<T>(
    step: FulfillmentStep,
    work: () => Promise<T>,
  ): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw new FulfillmentStepError(step, error);
    }
  }

  private async requireOrder(orderId: string): Promise<RenewalOrder> {
    const order = await this.repository.findOrder(orderId);
    if (!order) {
      throw new RenewalOrderNotFoundError(orderId);
    }
    return order;
  }
}

/**
 * "REN-" followed by 12 upper-case hex characters
 */
export function generateOrderId(): string {
  return `REN-${randomUUID().replace(/-/g, '').slice(0, 12).toUpperCase()}`;
}

function assertStatus(
  order: RenewalOrder,
  allowed: readonly RenewalOrderStatus[],
  operation: string,
): void {
  if (!allowed.includes(order.status)) {
    throw new InvalidOrderTransitionError(order.orderId, order.status, operation);
  }
}

function requirePayment(
  payment: PaymentTransaction | null,
  orderId: string,
): PaymentTransaction {
  if (!payment) {
    throw new RenewalOrderNotFoundError(orderId);
  }
  return payment;
}
