import { Injectable } from '@nestjs/common';
import { RenewalOrderNotFoundError } from '../../../core/errors/esim.errors';
import {
  PaymentTransaction,
  RenewalOrder,
  RenewalOrderStatus,
} from '../../../domain/esim';
import {
  RenewalOrderRepository,
  RenewalOrderUnitOfWork,
} from './renewal-order.repository';

/**
 * Process-local store. Orders are lost on restart.
 */
@Injectable()
export class InMemoryRenewalOrderRepository extends RenewalOrderRepository {
  private readonly orders = new Map<string, RenewalOrder>();
  private readonly payments = new Map<string, PaymentTransaction>();
  private readonly orderIdByCheckoutHandle = new Map<string, string>();
  private readonly locks = new Map<string, Promise<void>>();

  async insert(order: RenewalOrder): Promise<void> {
    if (this.orders.has(order.orderId)) {
      throw new Error(`Renewal order ${order.orderId} already exists`);
    }
    this.orders.set(order.orderId, copyOrder(order));
  }

  async findOrder(orderId: string): Promise<RenewalOrder | null> {
    const order = this.orders.get(orderId);
    return order ? copyOrder(order) : null;
  }

  async findPayment(orderId: string): Promise<PaymentTransaction | null> {
    const payment = this.payments.get(orderId);
    return payment ? { ...payment } : null;
  }

  async findPaymentByCheckoutHandle(
    checkoutHandle: string,
  ): Promise<PaymentTransaction | null> {
    const orderId = this.orderIdByCheckoutHandle.get(checkoutHandle);
    return orderId ? this.findPayment(orderId) : null;
  }

  async findOrdersByStatus(
    statuses: readonly RenewalOrderStatus[],
  ): Promise<RenewalOrder[]> {
    return [...this.orders.values()]
      .filter((order) => statuses.includes(order.status))
      .map(copyOrder);
  }

  async runInTransaction<T>(
    orderId: string,
    work: (unit: RenewalOrderUnitOfWork) => Promise<T> | T,
  ): Promise<T> {
    const previous = this.locks.get(orderId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(orderId, tail);

    await previous;
    try {
      const order = this.orders.get(orderId);
      if (!order) {
        throw new RenewalOrderNotFoundError(orderId);
      }

      const stored = this.payments.get(orderId);
      const unit: RenewalOrderUnitOfWork = {
        order: copyOrder(order),
        payment: stored ? { ...stored } : null,
      };

      const result = await work(unit);
      this.commit(orderId, unit);
      return result;
    } finally {
      release();
      if (this.locks.get(orderId) === tail) {
        this.locks.delete(orderId);
      }
    }
  }

  private commit(orderId: string, unit: RenewalOrderUnitOfWork): void {
    if (unit.order.orderId !== orderId) {
      throw new Error('Order id cannot change inside a transaction');
    }

    if (unit.payment) {
      const owner = this.orderIdByCheckoutHandle.get(unit.payment.checkoutHandle);
      if (owner && owner !== orderId) {
        throw new Error(
          `Checkout handle ${unit.payment.checkoutHandle} belongs to another order`,
        );
      }

      const previous = this.payments.get(orderId);
      if (previous && previous.checkoutHandle !== unit.payment.checkoutHandle) {
        this.orderIdByCheckoutHandle.delete(previous.checkoutHandle);
      }
      this.payments.set(orderId, { ...unit.payment });
      this.orderIdByCheckoutHandle.set(unit.payment.checkoutHandle, orderId);
    }

    this.orders.set(orderId, copyOrder(unit.order));
  }
}

function copyOrder(order: RenewalOrder): RenewalOrder {
  return { ...order, providerContext: { ...order.providerContext } };
}
