import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import Stripe from 'stripe';
import { paymentsConfig } from '../../../config/payments.config';
import {
  errorMessage,
  PaymentGatewayError,
} from '../../../core/errors/esim.errors';
import { logger } from '../../../core/logger/logger.config';
import {
  CheckoutMetadata,
  CheckoutSession,
  CheckoutStatus,
  PaymentGateway,
} from '../../../domain/esim';

/**
 * Payment gateway on Stripe Checkout Sessions (one-off payments)
 */
@Injectable()
export class StripePaymentGateway implements PaymentGateway {
  private readonly logger = logger();
  private stripe: Stripe | null = null;

  constructor(
    @Inject(paymentsConfig.KEY)
    private readonly config: ConfigType<typeof paymentsConfig>,
  ) {}

  async createCheckout(
    amount: number,
    currency: string,
    metadata: CheckoutMetadata,
  ): Promise<CheckoutSession> {
    const stripe = this.getClient();
    const { successUrl, cancelUrl, productName } = this.config.stripe;

    try {
      const session = await stripe.checkout.sessions.create({
        mode: 'payment',
        line_items: [
          {
            price_data: {
              currency: currency.toLowerCase(),
              unit_amount: Math.round(amount * 100),
              product_data: {
                name: productName,
                description: metadata.packageName,
              },
            },
            quantity: 1,
          },
        ],
        success_url: successUrl,
        cancel_url: cancelUrl,
        customer_email: metadata.customerEmail || undefined,
        metadata: {
          order_id: metadata.orderId,
          iccid: metadata.iccid,
          provider: metadata.provider,
          package_name: metadata.packageName,
        },
      });

      this.logger.info(
        { orderId: metadata.orderId, sessionId: session.id },
        'Created Stripe Checkout session',
      );

      return {
        handle: session.id,
        redirectUrl: session.url,
        raw: session,
      };
    } catch (error) {
      this.logger.error(
        { orderId: metadata.orderId, error: errorMessage(error) },
        'Failed to create Stripe Checkout session',
      );
      throw new PaymentGatewayError('Failed to create checkout session', {
        orderId: metadata.orderId,
        cause: errorMessage(error),
      });
    }
  }

  async retrieveCheckout(handle: string): Promise<CheckoutStatus> {
    const stripe = this.getClient();

    try {
      const session = await stripe.checkout.sessions.retrieve(handle);
      const paymentIntent = session.payment_intent;

      return {
        handle: session.id,
        paid: session.payment_status === 'paid',
        paymentStatus: session.payment_status,
        externalPaymentReference:
          typeof paymentIntent === 'string'
            ? paymentIntent
            : paymentIntent?.id ?? null,
        raw: session,
      };
    } catch (error) {
      this.logger.error(
        { sessionId: handle, error: errorMessage(error) },
        'Failed to retrieve Stripe Checkout session',
      );
      throw new PaymentGatewayError('Failed to retrieve checkout session', {
        sessionId: handle,
        cause: errorMessage(error),
      });
    }
  }

  private getClient(): Stripe {
    if (!this.stripe) {
      if (!this.config.stripe.secretKey) {
        throw new PaymentGatewayError('Stripe secret key not configured');
      }
      this.stripe = new Stripe(this.config.stripe.secretKey);
    }
    return this.stripe;
  }
}
