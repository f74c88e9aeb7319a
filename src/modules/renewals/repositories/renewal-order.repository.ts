import {
  PaymentTransaction,
  RenewalOrder,
  RenewalOrderStatus,
} from '../../../domain/esim';

/**
 * Working copies of one order and its payment inside a transaction.
 * Mutations are committed together when the unit of work resolves.
 */
export interface RenewalOrderUnitOfWork {
  order: RenewalOrder;
  payment: PaymentTransaction | null;
}

/**
 * Persistence for renewal orders and their payment transactions
 *
 * Writes go through `runInTransaction`, serialized per order: each
 * transaction commits as a whole or not at all.
 */
export abstract class RenewalOrderRepository {
  abstract insert(order: RenewalOrder): Promise<void>;

  abstract findOrder(orderId: string): Promise<RenewalOrder | null>;

  abstract findPayment(orderId: string): Promise<PaymentTransaction | null>;

  abstract findPaymentByCheckoutHandle(
    checkoutHandle: string,
  ): Promise<PaymentTransaction | null>;

  abstract findOrdersByStatus(
    statuses: readonly RenewalOrderStatus[],
  ): Promise<RenewalOrder[]>;

  abstract runInTransaction<T>(
    orderId: string,
    work: (unit: RenewalOrderUnitOfWork) => Promise<T> | T,
  ): Promise<T>;
}
