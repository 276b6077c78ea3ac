/**
 * Order Gateway
 * Builds the session controller, throttle gate, pending queue, dispatcher and order manager
 * from one validated configuration and runs them together.
 */

import type { Logger } from 'pino';
import { ConfigurationManager, type GatewayConfig } from '../config/ConfigurationManager';
import type { Sender } from '../connectors/Sender';
import type { SessionTransition } from '../models/SessionPhase';
import { type Clock, systemClock } from '../utils/clock';
import { ErrorHandler } from '../utils/ErrorHandler';
import { createLogger } from '../utils/logger';
import { AuditService } from './AuditService';
import { Dispatcher } from './Dispatcher';
import { OrderManager } from './OrderManager';
import { PendingQueue } from './PendingQueue';
import type { ResponseRecorder } from './ResponseRecorder';
import { SessionController } from './SessionController';
import { ThrottleGate } from './ThrottleGate';

export interface OrderGatewayDeps {
  sender: Sender;
  recorder: ResponseRecorder;
  clock?: Clock;
  logger?: Logger;
  auditService?: AuditService;
  errorHandler?: ErrorHandler;
}

export class OrderGateway {
  readonly session: SessionController;
  readonly gate: ThrottleGate;
  readonly queue: PendingQueue;
  readonly dispatcher: Dispatcher;
  readonly orders: OrderManager;
  readonly auditService: AuditService;
  private readonly config: GatewayConfig;
  private readonly logger: Logger;
  private running = false;

  constructor(config: GatewayConfig, deps: OrderGatewayDeps) {
    new ConfigurationManager().assertValidConfiguration(config);
    const window = ConfigurationManager.toSessionWindow(config.session);

    this.config = config;
    const clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger({ level: config.logLevel });
    this.auditService = deps.auditService ?? new AuditService();
    const errorHandler = deps.errorHandler ?? new ErrorHandler();

    this.session = new SessionController(
      window,
      { username: config.session.username, password: config.session.password },
      { pollIntervalMs: config.session.pollIntervalMs },
      clock,
      this.logger.child({ component: 'SessionController' })
    );

    this.gate = new ThrottleGate(
      { maxPerInterval: config.throttle.maxOrdersPerSecond, intervalMs: config.throttle.intervalMs },
      clock,
      this.logger.child({ component: 'ThrottleGate' })
    );

    this.queue = new PendingQueue();

    this.dispatcher = new Dispatcher(
      {
        gate: this.gate,
        queue: this.queue,
        sender: deps.sender,
        recorder: deps.recorder,
        clock,
        logger: this.logger.child({ component: 'Dispatcher' }),
        errorHandler
      },
      { tickMs: config.dispatcher.tickMs }
    );

    this.orders = new OrderManager({
      session: this.session,
      dispatcher: this.dispatcher,
      queue: this.queue,
      auditService: this.auditService,
      clock,
      logger: this.logger.child({ component: 'OrderManager' })
    });

    this.session.onTransition(transition => this.auditTransition(transition));
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;

    this.auditService.logEvent({
      eventType: 'GATEWAY_STARTED',
      username: this.config.session.username,
      details: {
        openTime: this.config.session.openTime,
        closeTime: this.config.session.closeTime,
        maxOrdersPerSecond: this.config.throttle.maxOrdersPerSecond
      }
    });

    this.gate.start();
    this.dispatcher.start();
    this.session.start();
  }

  /**
   * Stops every timer and waits for in-flight sends to be recorded
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    this.session.stop();
    this.dispatcher.stop();
    this.gate.stop();
    await this.dispatcher.flush();

    this.auditService.logEvent({
      eventType: 'GATEWAY_STOPPED',
      username: this.config.session.username,
      details: { queuedOrders: this.queue.size }
    });
    this.logger.info({ queuedOrders: this.queue.size }, 'Gateway stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  private auditTransition(transition: SessionTransition): void {
    this.auditService.logEvent({
      eventType: transition.type === 'logon' ? 'LOGON' : 'LOGOUT',
      username: transition.username,
      details: {
        from: transition.from,
        to: transition.to,
        at: transition.timestamp.toISOString(),
        // redacted by the audit trail
        credentials: { username: transition.username, password: this.config.session.password }
      }
    });
  }
}
