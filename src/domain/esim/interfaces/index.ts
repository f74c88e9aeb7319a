/**
 * Barrel export for eSIM domain interfaces
 */

export * from './bundle-catalog.interface';
export * from './esim-provider-client.interface';
export * from './payment-gateway.interface';
