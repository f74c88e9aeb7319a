import { registerAs } from '@nestjs/config';

export interface StripeConfig {
  secretKey: string;
  successUrl: string;
  cancelUrl: string;
  productName: string;
}

export interface PaymentsConfig {
  stripe: StripeConfig;
}

export const PAYMENTS_CONFIG_KEY = 'payments';

export const paymentsConfig = registerAs(
  PAYMENTS_CONFIG_KEY,
  (): PaymentsConfig => ({
    stripe: {
      secretKey: process.env.STRIPE_SECRET_KEY || '',
      successUrl:
        process.env.STRIPE_SUCCESS_URL ||
        'http://localhost:3000/renewal/success?session_id={CHECKOUT_SESSION_ID}',
      cancelUrl:
        process.env.STRIPE_CANCEL_URL ||
        'http://localhost:3000/renewal/cancelled',
      productName: process.env.STRIPE_PRODUCT_NAME || 'eSIM Bundle Renewal',
    },
  }),
);
