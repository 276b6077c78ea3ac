/**
 * Pending Queue
 * FIFO of orders deferred by the throttle, indexed by order id for modify and cancel.
 *
 * Every method runs to completion on the event loop, so a modify or cancel racing the
 * dispatcher's drain sees the queue either before or after the drain, never part-way.
 */

import type { Order } from '../models/Order';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import type { Admitter } from './ThrottleGate';

export class PendingQueue {
  // Map iteration follows insertion order, which is arrival order
  private orders: Map<number, Order> = new Map();

  get size(): number {
    return this.orders.size;
  }

  has(orderId: number): boolean {
    return this.orders.has(orderId);
  }

  /**
   * Copy of a queued order; the queue stays the only owner of the live entry
   */
  peek(orderId: number): Order | undefined {
    const order = this.orders.get(orderId);
    return order ? { ...order } : undefined;
  }

  enqueue(order: Order): void {
    if (this.orders.has(order.orderId)) {
      throw new ApplicationError(
        `Order ${order.orderId} is already queued`,
        'DUPLICATE_ORDER_ID',
        ErrorCategory.BUSINESS_LOGIC,
        ErrorSeverity.MEDIUM,
        {
          operation: 'enqueue',
          component: 'PendingQueue',
          orderId: order.orderId,
          timestamp: new Date()
        }
      );
    }

    order.status = 'queued';
    this.orders.set(order.orderId, order);
  }

  /**
   * Replaces price and quantity of a queued order in place and marks it modified.
   * Identifier and queue position are unchanged.
   */
  modify(orderId: number, price: number, quantity: number): boolean {
    const order = this.orders.get(orderId);
    if (!order) {
      return false;
    }

    order.price = price;
    order.quantity = quantity;
    order.status = 'modified';
    return true;
  }

  cancel(orderId: number): Order | undefined {
    const order = this.orders.get(orderId);
    if (!order) {
      return undefined;
    }

    this.orders.delete(orderId);
    order.status = 'cancelled';
    return order;
  }

  /**
   * Pulls orders from the head of the queue while the gate admits them.
   * Stops at the first denial so a later order never overtakes an earlier one.
   */
  drainAdmissible(gate: Admitter): Order[] {
    const drained: Order[] = [];

    for (const [orderId, order] of this.orders) {
      if (!gate.tryAdmit()) {
        break;
      }
      this.orders.delete(orderId);
      drained.push(order);
    }

    return drained;
  }

  snapshot(): Order[] {
    return Array.from(this.orders.values(), order => ({ ...order }));
  }
}
