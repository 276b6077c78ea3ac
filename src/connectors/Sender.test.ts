/**
 * Tests for SimulatedExchangeSender
 */

import { describe, it, expect } from 'vitest';
import { SimulatedExchangeSender } from './Sender';
import type { Order } from '../models/Order';
import { createManualClock } from '../utils/clock';

function createOrder(orderId: number, price: number): Order {
  return {
    orderId,
    symbol: 'INFY',
    side: 'sell',
    price,
    quantity: 10,
    status: 'sent',
    submittedAt: new Date('2026-01-05T04:00:00.000Z')
  };
}

describe('SimulatedExchangeSender', () => {
  it('should acknowledge with the configured verdict and the send time', async () => {
    const clock = createManualClock(5000);
    const sender = new SimulatedExchangeSender(
      { roundTripMs: 0, decide: order => (order.price > 100 ? 'reject' : 'accept') },
      clock
    );

    await expect(sender.send(createOrder(1, 99))).resolves.toEqual({ verdict: 'accept', sentAt: 5000 });
    await expect(sender.send(createOrder(2, 101))).resolves.toEqual({ verdict: 'reject', sentAt: 5000 });
  });

  it('should keep the order as transmitted even if it changes afterwards', async () => {
    const sender = new SimulatedExchangeSender({ roundTripMs: 0 }, createManualClock(0));
    const order = createOrder(1, 100);

    await sender.send(order);
    order.price = 150;

    expect(sender.getTransmittedOrders()).toEqual([
      { orderId: 1, symbol: 'INFY', side: 'sell', price: 100, quantity: 10, sentAt: 0 }
    ]);
  });

  it('should wait the round trip before answering', async () => {
    const sender = new SimulatedExchangeSender({ roundTripMs: 20 });
    const started = Date.now();

    await sender.send(createOrder(1, 100));

    expect(Date.now() - started).toBeGreaterThanOrEqual(19);
  });
});
