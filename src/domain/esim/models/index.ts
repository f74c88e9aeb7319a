/**
 * Barrel export for eSIM domain models
 */

export * from './data-quantity.model';
export * from './merged-record.model';
export * from './payment-transaction.model';
export * from './provider-record.model';
export * from './provider.model';
export * from './renewal-order.model';
