/**
 * Sender capability and a simulated exchange implementation
 * The gateway hands every throttle-admitted order to a Sender exactly once
 */

import type { ExchangeVerdict, Order } from '../models/Order';
import { type Clock, systemClock } from '../utils/clock';

export interface SendAcknowledgement {
  verdict: ExchangeVerdict;
  /** Epoch ms at which the order left the gateway */
  sentAt: number;
}

/**
 * Standardized interface for order transmission to an exchange
 */
export interface Sender {
  send(order: Readonly<Order>): Promise<SendAcknowledgement>;
}

export interface SimulatedExchangeOptions {
  roundTripMs: number;
  decide: (order: Readonly<Order>) => ExchangeVerdict;
}

export interface TransmittedOrder {
  orderId: number;
  symbol: string;
  side: Order['side'];
  price: number;
  quantity: number;
  sentAt: number;
}

const DEFAULT_OPTIONS: SimulatedExchangeOptions = {
  roundTripMs: 50,
  decide: () => 'accept'
};

/**
 * Exchange stand-in: waits a fixed round trip and answers with a verdict
 */
export class SimulatedExchangeSender implements Sender {
  private readonly options: SimulatedExchangeOptions;
  private readonly clock: Clock;
  private transmitted: TransmittedOrder[] = [];

  constructor(options: Partial<SimulatedExchangeOptions> = {}, clock: Clock = systemClock) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.clock = clock;
  }

  async send(order: Readonly<Order>): Promise<SendAcknowledgement> {
    const sentAt = this.clock.now();

    // Copy the order as it leaves: later mutation must not rewrite what the exchange saw
    this.transmitted.push({
      orderId: order.orderId,
      symbol: order.symbol,
      side: order.side,
      price: order.price,
      quantity: order.quantity,
      sentAt
    });

    if (this.options.roundTripMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.options.roundTripMs));
    }

    return { verdict: this.options.decide(order), sentAt };
  }

  getTransmittedOrders(): TransmittedOrder[] {
    return [...this.transmitted];
  }
}
