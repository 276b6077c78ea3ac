/**
 * Tests for PendingQueue
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { PendingQueue } from './PendingQueue';
import type { Admitter } from './ThrottleGate';
import type { Order } from '../models/Order';
import { ApplicationError } from '../utils/ErrorHandler';

function createOrder(orderId: number, price = 100, quantity = 10): Order {
  return {
    orderId,
    symbol: 'INFY',
    side: 'buy',
    price,
    quantity,
    status: 'new',
    submittedAt: new Date('2026-01-05T04:00:00.000Z')
  };
}

class CountingAdmitter implements Admitter {
  public calls = 0;

  constructor(private slots: number) {}

  tryAdmit(): boolean {
    this.calls++;
    if (this.slots <= 0) {
      return false;
    }
    this.slots--;
    return true;
  }
}

describe('PendingQueue', () => {
  let queue: PendingQueue;

  beforeEach(() => {
    queue = new PendingQueue();
  });

  describe('enqueue', () => {
    it('should mark orders as queued and keep them findable by id', () => {
      const order = createOrder(1);
      queue.enqueue(order);

      expect(order.status).toBe('queued');
      expect(queue.size).toBe(1);
      expect(queue.has(1)).toBe(true);
      expect(queue.peek(1)).toEqual(order);
    });

    it('should refuse a second order with the same id', () => {
      queue.enqueue(createOrder(7));

      let caught: unknown;
      try {
        queue.enqueue(createOrder(7));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ApplicationError);
      expect(caught).toMatchObject({ code: 'DUPLICATE_ORDER_ID', message: 'Order 7 is already queued' });
      expect(queue.size).toBe(1);
    });
  });

  describe('modify', () => {
    it('should update price and quantity in place without moving the order', () => {
      queue.enqueue(createOrder(1));
      queue.enqueue(createOrder(2));
      queue.enqueue(createOrder(3));

      expect(queue.modify(2, 101.5, 25)).toBe(true);

      const drained = queue.drainAdmissible(new CountingAdmitter(10));
      expect(drained.map(order => order.orderId)).toEqual([1, 2, 3]);
      expect(drained[1]).toMatchObject({ orderId: 2, price: 101.5, quantity: 25, status: 'modified' });
      expect(drained[0].status).toBe('queued');
    });

    it('should report an unknown id', () => {
      expect(queue.modify(42, 100, 1)).toBe(false);
    });
  });

  describe('cancel', () => {
    it('should remove the order and mark it cancelled', () => {
      queue.enqueue(createOrder(1));
      queue.enqueue(createOrder(2));

      const cancelled = queue.cancel(1);

      expect(cancelled?.orderId).toBe(1);
      expect(cancelled?.status).toBe('cancelled');
      expect(queue.has(1)).toBe(false);
      expect(queue.size).toBe(1);
    });

    it('should return undefined when the order is no longer queued', () => {
      queue.enqueue(createOrder(1));
      queue.cancel(1);

      expect(queue.cancel(1)).toBeUndefined();
      expect(queue.modify(1, 100, 1)).toBe(false);
    });
  });

  describe('drainAdmissible', () => {
    it('should stop at the first denial and leave the rest in order', () => {
      [1, 2, 3, 4].forEach(id => queue.enqueue(createOrder(id)));
      const admitter = new CountingAdmitter(2);

      const drained = queue.drainAdmissible(admitter);

      expect(drained.map(order => order.orderId)).toEqual([1, 2]);
      expect(admitter.calls).toBe(3);
      expect(queue.snapshot().map(order => order.orderId)).toEqual([3, 4]);
    });

    it('should not consult the gate when empty', () => {
      const admitter = new CountingAdmitter(5);

      expect(queue.drainAdmissible(admitter)).toEqual([]);
      expect(admitter.calls).toBe(0);
    });
  });

  describe('peek', () => {
    it('should return a copy that cannot rewrite the queued entry', () => {
      queue.enqueue(createOrder(2, 100, 10));

      const copy = queue.peek(2);
      if (copy) {
        copy.orderId = 99;
        copy.price = -50;
      }

      expect(queue.peek(2)).toMatchObject({ orderId: 2, price: 100 });
      expect(queue.has(99)).toBe(false);
    });
  });

  describe('snapshot', () => {
    it('should return copies that do not alias queued orders', () => {
      queue.enqueue(createOrder(1, 100, 10));

      const [copy] = queue.snapshot();
      copy.price = 1;

      expect(queue.peek(1)?.price).toBe(100);
    });
  });

  describe('Property-based tests', () => {
    /**
     * Draining after any mix of enqueues and cancels yields the survivors in arrival order
     */
    it('should drain surviving orders in arrival order', () => {
      fc.assert(fc.property(
        fc.uniqueArray(fc.integer({ min: 1, max: 100000 }), { maxLength: 50 }),
        fc.array(fc.boolean(), { minLength: 50, maxLength: 50 }),
        fc.integer({ min: 0, max: 60 }),
        (ids, cancelMask, slots) => {
          const testQueue = new PendingQueue();
          ids.forEach(id => testQueue.enqueue(createOrder(id)));
          ids.forEach((id, i) => {
            if (cancelMask[i]) {
              testQueue.cancel(id);
            }
          });

          const survivors = ids.filter((_, i) => !cancelMask[i]);
          const drained = testQueue.drainAdmissible(new CountingAdmitter(slots));

          expect(drained.map(order => order.orderId)).toEqual(survivors.slice(0, slots));
          expect(testQueue.snapshot().map(order => order.orderId)).toEqual(survivors.slice(slots));
        }
      ), { numRuns: 100 });
    });
  });
});
