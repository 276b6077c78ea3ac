/**
 * Dispatcher
 * Sends admitted orders to the exchange and drains the pending queue once per tick.
 * Every order that reaches the Sender produces exactly one response record.
 */

import type { Logger } from 'pino';
import type { SendAcknowledgement, Sender } from '../connectors/Sender';
import type { Order } from '../models/Order';
import type { ResponseRecord } from '../models/ResponseRecord';
import { type Clock, systemClock } from '../utils/clock';
import { ErrorHandler, type RecoveryAction } from '../utils/ErrorHandler';
import { createSilentLogger } from '../utils/logger';
import type { PendingQueue } from './PendingQueue';
import type { ResponseRecorder } from './ResponseRecorder';
import type { ThrottleGate } from './ThrottleGate';

export interface DispatcherOptions {
  tickMs: number;
  /** Overrides the error handler's default strategy for response log writes */
  recordRecovery?: RecoveryAction;
}

export interface DispatcherDeps {
  gate: ThrottleGate;
  queue: PendingQueue;
  sender: Sender;
  recorder: ResponseRecorder;
  clock?: Clock;
  logger?: Logger;
  errorHandler?: ErrorHandler;
}

export type SubmitOutcome = 'sent' | 'queued';

const DEFAULT_OPTIONS: DispatcherOptions = {
  tickMs: 10
};

export class Dispatcher {
  private readonly gate: ThrottleGate;
  private readonly queue: PendingQueue;
  private readonly sender: Sender;
  private readonly recorder: ResponseRecorder;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler;
  private readonly options: DispatcherOptions;
  private inFlight: Set<Promise<void>> = new Set();
  private tickTimer?: NodeJS.Timeout;

  constructor(deps: DispatcherDeps, options: Partial<DispatcherOptions> = {}) {
    this.gate = deps.gate;
    this.queue = deps.queue;
    this.sender = deps.sender;
    this.recorder = deps.recorder;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createSilentLogger();
    this.errorHandler = deps.errorHandler ?? new ErrorHandler();
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Immediate path for a freshly admitted order: send now if the gate has room, queue otherwise
   */
  submit(order: Order): SubmitOutcome {
    if (this.gate.tryAdmit()) {
      this.dispatch(order);
      return 'sent';
    }

    this.queue.enqueue(order);
    this.logger.info({ orderId: order.orderId, backlog: this.queue.size }, 'Order queued due to throttle');
    return 'queued';
  }

  /**
   * Drains the backlog through the gate in FIFO order
   */
  tick(): Order[] {
    const drained = this.queue.drainAdmissible(this.gate);
    for (const order of drained) {
      this.dispatch(order);
    }
    return drained;
  }

  start(): void {
    if (this.tickTimer) {
      return;
    }
    this.tickTimer = setInterval(() => this.tick(), this.options.tickMs);
  }

  stop(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = undefined;
    }
  }

  /**
   * Resolves once every transmission started so far has been recorded
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private dispatch(order: Order): void {
    order.status = 'sent';
    order.sentAt = new Date(this.clock.now());
    this.logger.info({ orderId: order.orderId, price: order.price, quantity: order.quantity }, 'Order sent to exchange');

    const transmission = this.transmit(order).finally(() => {
      this.inFlight.delete(transmission);
    });
    this.inFlight.add(transmission);
  }

  /**
   * Never rejects: sender and recorder failures are logged and absorbed here
   */
  private async transmit(order: Order): Promise<void> {
    const dispatchedAt = this.clock.now();
    const acknowledgement = await this.sendOrder(order, dispatchedAt);
    const respondedAt = this.clock.now();

    const record: ResponseRecord = {
      orderId: order.orderId,
      verdict: acknowledgement.verdict,
      latencyMs: Math.max(0, respondedAt - acknowledgement.sentAt),
      timestamp: new Date(respondedAt)
    };

    this.logger.info(
      { orderId: record.orderId, verdict: record.verdict, latencyMs: record.latencyMs },
      'Exchange response received'
    );

    const result = await this.errorHandler.handleError(
      () => this.recorder.record(record),
      {
        operation: 'record_response',
        component: 'Dispatcher',
        orderId: order.orderId,
        timestamp: new Date(respondedAt)
      },
      this.options.recordRecovery
    );

    if (!result.success) {
      this.logger.error(
        { orderId: order.orderId, code: result.error.code, attempts: result.recoveryAttempts, err: result.error },
        'Failed to record exchange response'
      );
    }
  }

  private async sendOrder(order: Order, dispatchedAt: number): Promise<SendAcknowledgement> {
    const result = await this.errorHandler.handleError(
      () => this.sender.send(order),
      {
        operation: 'send_order',
        component: 'Dispatcher',
        orderId: order.orderId,
        timestamp: new Date(dispatchedAt)
      }
    );

    if (result.success) {
      return result.result;
    }

    this.logger.error(
      { orderId: order.orderId, code: result.error.code, err: result.error },
      'Sender failed; recording order as rejected'
    );
    return { verdict: 'reject', sentAt: dispatchedAt };
  }
}
