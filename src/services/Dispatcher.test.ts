/**
 * Tests for Dispatcher
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Dispatcher } from './Dispatcher';
import { PendingQueue } from './PendingQueue';
import { InMemoryResponseRecorder, type ResponseRecorder } from './ResponseRecorder';
import { ThrottleGate } from './ThrottleGate';
import { type SendAcknowledgement, type Sender, SimulatedExchangeSender } from '../connectors/Sender';
import type { ExchangeVerdict, Order } from '../models/Order';
import type { ResponseRecord } from '../models/ResponseRecord';
import { type Clock, createManualClock, type ManualClock } from '../utils/clock';
import { ErrorHandler, RecoveryStrategy } from '../utils/ErrorHandler';

const BASE_MS = 1_767_000_000_000;

function createOrder(orderId: number, price = 100, quantity = 10): Order {
  return {
    orderId,
    symbol: 'INFY',
    side: 'buy',
    price,
    quantity,
    status: 'new',
    submittedAt: new Date(BASE_MS)
  };
}

/**
 * Sender whose acknowledgements are released by the test
 */
class DeferredSender implements Sender {
  public pending: Array<{ orderId: number; respond: (verdict: ExchangeVerdict) => void }> = [];

  constructor(private clock: Clock) {}

  send(order: Readonly<Order>): Promise<SendAcknowledgement> {
    const sentAt = this.clock.now();
    return new Promise(resolve => {
      this.pending.push({ orderId: order.orderId, respond: verdict => resolve({ verdict, sentAt }) });
    });
  }
}

class FailingSender implements Sender {
  public calls = 0;

  async send(): Promise<SendAcknowledgement> {
    this.calls++;
    throw new Error('boom');
  }
}

/**
 * Recorder that fails a set number of times before it starts accepting records
 */
class FlakyRecorder implements ResponseRecorder {
  public attempts = 0;
  public records: ResponseRecord[] = [];

  constructor(private failures: number, private failureMessage: string) {}

  async record(record: ResponseRecord): Promise<void> {
    this.attempts++;
    if (this.attempts <= this.failures) {
      throw new Error(this.failureMessage);
    }
    this.records.push(record);
  }
}

describe('Dispatcher', () => {
  let clock: ManualClock;
  let gate: ThrottleGate;
  let queue: PendingQueue;
  let sender: SimulatedExchangeSender;
  let recorder: InMemoryResponseRecorder;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    clock = createManualClock(BASE_MS);
    gate = new ThrottleGate({ maxPerInterval: 2, intervalMs: 1000 }, clock);
    queue = new PendingQueue();
    sender = new SimulatedExchangeSender({ roundTripMs: 0 }, clock);
    recorder = new InMemoryResponseRecorder();
    dispatcher = new Dispatcher({ gate, queue, sender, recorder, clock });
  });

  afterEach(() => {
    dispatcher.stop();
    vi.useRealTimers();
  });

  describe('submit', () => {
    it('should send while the gate has room and queue afterwards', () => {
      const orders = [createOrder(1), createOrder(2), createOrder(3)];

      expect(orders.map(order => dispatcher.submit(order))).toEqual(['sent', 'sent', 'queued']);
      expect(orders.map(order => order.status)).toEqual(['sent', 'sent', 'queued']);
      expect(orders[0].sentAt).toEqual(new Date(BASE_MS));
      expect(orders[2].sentAt).toBeUndefined();
      expect(dispatcher.pendingCount).toBe(1);
      expect(sender.getTransmittedOrders().map(order => order.orderId)).toEqual([1, 2]);
    });
  });

  describe('tick', () => {
    it('should drain nothing until the next interval opens', () => {
      [1, 2, 3, 4, 5].forEach(id => dispatcher.submit(createOrder(id)));

      expect(dispatcher.tick()).toEqual([]);

      clock.advance(1000);
      expect(dispatcher.tick().map(order => order.orderId)).toEqual([3, 4]);
      expect(dispatcher.pendingCount).toBe(1);

      clock.advance(1000);
      expect(dispatcher.tick().map(order => order.orderId)).toEqual([5]);
      expect(sender.getTransmittedOrders().map(order => order.orderId)).toEqual([1, 2, 3, 4, 5]);
    });

    it('should transmit the modified values of a queued order', () => {
      [1, 2, 3].forEach(id => dispatcher.submit(createOrder(id)));
      queue.modify(3, 101.5, 7);

      clock.advance(1000);
      dispatcher.tick();

      expect(sender.getTransmittedOrders()[2]).toMatchObject({ orderId: 3, price: 101.5, quantity: 7 });
    });

    it('should drain on its own timer once started', () => {
      vi.useFakeTimers();
      [1, 2, 3].forEach(id => dispatcher.submit(createOrder(id)));
      dispatcher.start();

      clock.advance(1000);
      vi.advanceTimersByTime(10);

      expect(dispatcher.pendingCount).toBe(0);
      expect(sender.getTransmittedOrders()).toHaveLength(3);
    });
  });

  describe('Response recording', () => {
    it('should record one response per sent order', async () => {
      [1, 2, 3].forEach(id => dispatcher.submit(createOrder(id)));
      clock.advance(1000);
      dispatcher.tick();

      await dispatcher.flush();

      expect(dispatcher.inFlightCount).toBe(0);
      expect(recorder.getRecords().map(record => record.orderId).sort((a, b) => a - b)).toEqual([1, 2, 3]);
      expect(recorder.getRecords().every(record => record.verdict === 'accept')).toBe(true);
    });

    it('should measure latency from send to acknowledgement', async () => {
      const deferred = new DeferredSender(clock);
      const timed = new Dispatcher({ gate, queue, sender: deferred, recorder, clock });

      timed.submit(createOrder(1));
      clock.advance(42);
      deferred.pending[0].respond('reject');
      await timed.flush();

      expect(recorder.getRecords()).toEqual([
        { orderId: 1, verdict: 'reject', latencyMs: 42, timestamp: new Date(BASE_MS + 42) }
      ]);
    });

    it('should record a failed send as a reject without resending', async () => {
      const failing = new FailingSender();
      const errorHandler = new ErrorHandler();
      const guarded = new Dispatcher({ gate, queue, sender: failing, recorder, clock, errorHandler });

      guarded.submit(createOrder(9));
      await guarded.flush();

      expect(failing.calls).toBe(1);
      expect(recorder.getRecords()).toEqual([
        { orderId: 9, verdict: 'reject', latencyMs: 0, timestamp: new Date(BASE_MS) }
      ]);
      expect(errorHandler.getErrorMetrics().get('system:UNKNOWN_ERROR')?.count).toBe(1);
    });

    it('should retry a busy response log', async () => {
      const flaky = new FlakyRecorder(2, 'EBUSY: resource busy or locked');
      const retrying = new Dispatcher(
        { gate, queue, sender, recorder: flaky, clock },
        { recordRecovery: { strategy: RecoveryStrategy.RETRY, maxAttempts: 3, backoffMs: 0 } }
      );

      retrying.submit(createOrder(1));
      await retrying.flush();

      expect(flaky.attempts).toBe(3);
      expect(flaky.records.map(record => record.orderId)).toEqual([1]);
    });

    it('should absorb a response log failure that cannot be retried', async () => {
      const broken = new FlakyRecorder(Number.POSITIVE_INFINITY, 'disk full');
      const errorHandler = new ErrorHandler();
      const guarded = new Dispatcher({ gate, queue, sender, recorder: broken, clock, errorHandler });

      guarded.submit(createOrder(1));
      await expect(guarded.flush()).resolves.toBeUndefined();

      expect(broken.attempts).toBe(1);
      expect(errorHandler.getErrorMetrics().get('system:UNKNOWN_ERROR')?.count).toBe(1);
    });
  });
});
