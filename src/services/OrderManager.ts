/**
 * Order Manager
 * Entry point for new, modify and cancel requests. New orders are admitted only while the
 * session is open; modify and cancel act on the pending queue.
 */

import type { Logger } from 'pino';
import type { NewOrderInput, Order, OrderRequest, RequestResult } from '../models/Order';
import { type Clock, systemClock } from '../utils/clock';
import { createSilentLogger } from '../utils/logger';
import type { AuditService } from './AuditService';
import type { Dispatcher } from './Dispatcher';
import type { PendingQueue } from './PendingQueue';
import type { SessionController } from './SessionController';

export const OUTSIDE_WINDOW_REASON = 'Not in allowed time window';
export const DUPLICATE_ORDER_REASON = 'Duplicate order id';

export interface OrderManagerDeps {
  session: SessionController;
  dispatcher: Dispatcher;
  queue: PendingQueue;
  auditService: AuditService;
  clock?: Clock;
  logger?: Logger;
}

export class OrderManager {
  private readonly session: SessionController;
  private readonly dispatcher: Dispatcher;
  private readonly queue: PendingQueue;
  private readonly auditService: AuditService;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private lastOrderId = 0;

  constructor(deps: OrderManagerDeps) {
    this.session = deps.session;
    this.dispatcher = deps.dispatcher;
    this.queue = deps.queue;
    this.auditService = deps.auditService;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createSilentLogger();
  }

  /**
   * Routes an upstream request to the matching operation
   */
  onData(request: OrderRequest): RequestResult {
    switch (request.type) {
      case 'new':
        return this.newOrder(request);
      case 'modify':
        return this.modifyOrder(request.orderId, request.price, request.quantity);
      case 'cancel':
        return this.cancelOrder(request.orderId);
    }
  }

  newOrder(input: NewOrderInput): RequestResult {
    const orderId = input.orderId ?? this.lastOrderId + 1;

    // Checked before the id seeds auto-assignment, so a bad id never leaks into later orders
    const invalidId = validateOrderId(orderId);
    if (invalidId) {
      return this.reject(this.createOrder(orderId, input), `Invalid order: ${invalidId}`);
    }
    this.lastOrderId = Math.max(this.lastOrderId, orderId);
    const order = this.createOrder(orderId, input);

    const invalid = validateOrderValues(order.price, order.quantity) ?? validateSymbol(order.symbol);
    if (invalid) {
      return this.reject(order, `Invalid order: ${invalid}`);
    }

    if (this.session.currentPhase() !== 'open') {
      return this.reject(order, OUTSIDE_WINDOW_REASON);
    }

    if (this.queue.has(order.orderId)) {
      return this.reject(order, DUPLICATE_ORDER_REASON);
    }

    const outcome = this.dispatcher.submit(order);

    if (outcome === 'queued') {
      this.auditService.logEvent({
        eventType: 'ORDER_QUEUED',
        orderId: order.orderId,
        details: { symbol: order.symbol, side: order.side, price: order.price, quantity: order.quantity }
      });
      return { orderId: order.orderId, outcome, message: `Order ${order.orderId} queued due to throttle.`, order: { ...order } };
    }

    this.auditService.logEvent({
      eventType: 'ORDER_SENT',
      orderId: order.orderId,
      details: { symbol: order.symbol, side: order.side, price: order.price, quantity: order.quantity }
    });
    return { orderId: order.orderId, outcome, message: `Order ${order.orderId} sent to exchange.`, order: { ...order } };
  }

  modifyOrder(orderId: number, price: number, quantity: number): RequestResult {
    const invalid = validateOrderId(orderId) ?? validateOrderValues(price, quantity);
    if (invalid) {
      const reason = `Invalid modify: ${invalid}`;
      this.logger.warn({ orderId, price, quantity }, reason);
      return { orderId, outcome: 'rejected', reason, message: `Modify request for ${orderId} rejected: ${reason}.` };
    }

    if (!this.queue.modify(orderId, price, quantity)) {
      const message = `Modify request for ${orderId} ignored: not in queue.`;
      this.logger.info({ orderId }, message);
      this.auditService.logEvent({ eventType: 'MODIFY_IGNORED', orderId, details: { price, quantity } });
      return { orderId, outcome: 'ignored', message };
    }

    const message = `Order ${orderId} modified in queue.`;
    this.logger.info({ orderId, price, quantity }, message);
    this.auditService.logEvent({ eventType: 'ORDER_MODIFIED', orderId, details: { price, quantity } });
    return { orderId, outcome: 'modified', message, order: this.queue.peek(orderId) };
  }

  cancelOrder(orderId: number): RequestResult {
    const invalidId = validateOrderId(orderId);
    if (invalidId) {
      const reason = `Invalid cancel: ${invalidId}`;
      this.logger.warn({ orderId }, reason);
      return { orderId, outcome: 'rejected', reason, message: `Cancel request for ${orderId} rejected: ${reason}.` };
    }

    const cancelled = this.queue.cancel(orderId);

    if (!cancelled) {
      const message = `Cancel request for ${orderId} ignored: not in queue.`;
      this.logger.info({ orderId }, message);
      this.auditService.logEvent({ eventType: 'CANCEL_IGNORED', orderId });
      return { orderId, outcome: 'ignored', message };
    }

    const message = `Order ${orderId} cancelled from queue.`;
    this.logger.info({ orderId }, message);
    this.auditService.logEvent({ eventType: 'ORDER_CANCELLED', orderId, details: { symbol: cancelled.symbol } });
    return { orderId, outcome: 'cancelled', message, order: cancelled };
  }

  private createOrder(orderId: number, input: NewOrderInput): Order {
    return {
      orderId,
      symbol: input.symbol,
      side: input.side,
      price: input.price,
      quantity: input.quantity,
      status: 'new',
      submittedAt: new Date(this.clock.now())
    };
  }

  private reject(order: Order, reason: string): RequestResult {
    order.status = 'rejected';
    const message = `Order ${order.orderId} rejected: ${reason}.`;

    this.logger.warn({ orderId: order.orderId, reason }, 'Order rejected');
    this.auditService.logEvent({
      eventType: 'ORDER_REJECTED',
      orderId: order.orderId,
      details: { reason, phase: this.session.currentPhase() }
    });

    return { orderId: order.orderId, outcome: 'rejected', reason, message, order };
  }
}

export function validateOrderId(orderId: number): string | null {
  return Number.isSafeInteger(orderId) && orderId > 0 ? null : 'order id must be a positive safe integer';
}

/**
 * Returns a description of the first problem, or null when price and quantity are usable
 */
export function validateOrderValues(price: number, quantity: number): string | null {
  if (!Number.isFinite(price) || price <= 0) {
    return 'price must be a positive number';
  }
  if (!Number.isInteger(quantity) || quantity <= 0) {
    return 'quantity must be a positive integer';
  }
  return null;
}

function validateSymbol(symbol: string): string | null {
  return symbol.trim().length === 0 ? 'symbol is required' : null;
}
