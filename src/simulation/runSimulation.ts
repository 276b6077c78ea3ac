/**
 * Sample order traffic against a live gateway.
 * Opens the session two seconds from now, closes it twelve seconds from now, sends five
 * orders at once into a cap of three per second, then modifies and cancels the two it queued.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { ConfigurationManager, type GatewayConfig } from '../config/ConfigurationManager';
import { SimulatedExchangeSender } from '../connectors/Sender';
import type { OrderRequest } from '../models/Order';
import { OrderGateway } from '../services/OrderGateway';
import { FileResponseRecorder } from '../services/ResponseRecorder';
import { formatTimeOfDay, timeOfDayAt } from '../utils/clock';
import { createLogger } from '../utils/logger';

export interface SimulationOptions {
  openInMs: number;
  sessionLengthMs: number;
  drainWaitMs: number;
}

const DEFAULT_SIMULATION: SimulationOptions = {
  openInMs: 2000,
  sessionLengthMs: 10000,
  drainWaitMs: 2000
};

export async function runSimulation(
  baseConfig: GatewayConfig,
  options: SimulationOptions = DEFAULT_SIMULATION,
  signal?: AbortSignal
): Promise<void> {
  const now = Date.now();
  const closeAt = now + options.openInMs + options.sessionLengthMs;
  const config: GatewayConfig = {
    ...baseConfig,
    session: {
      ...baseConfig.session,
      openTime: formatTimeOfDay(Math.ceil(timeOfDayAt(now + options.openInMs))),
      closeTime: formatTimeOfDay(Math.ceil(timeOfDayAt(closeAt)))
    },
    throttle: { ...baseConfig.throttle, maxOrdersPerSecond: 3 }
  };

  const logger = createLogger({ name: 'simulation', level: config.logLevel });
  const gateway = new OrderGateway(config, {
    sender: new SimulatedExchangeSender({ roundTripMs: 50 }),
    recorder: new FileResponseRecorder(config.recorder.responseLogPath),
    logger
  });

  gateway.start();
  try {
    logger.info({ openTime: config.session.openTime }, 'Waiting for logon window');
    const opened = await gateway.session.waitUntilOpen(signal);
    if (!opened) {
      logger.warn('Session closed before opening; no orders sent');
      return;
    }

    // One synchronous burst: the cap admits three and queues 1003 and 1004, and no tick can
    // drain them before the modify and cancel below run
    for (let i = 0; i < 5; i++) {
      const result = gateway.orders.onData({
        type: 'new',
        orderId: 1000 + i,
        symbol: 'INFY',
        side: 'buy',
        price: 100 + i,
        quantity: 10 + i
      });
      logger.info({ orderId: result.orderId, outcome: result.outcome }, result.message);
    }

    const followUps: OrderRequest[] = [
      { type: 'modify', orderId: 1003, price: 105.5, quantity: 20 },
      { type: 'cancel', orderId: 1004 }
    ];
    for (const request of followUps) {
      const result = gateway.orders.onData(request);
      logger.info({ orderId: result.orderId, outcome: result.outcome }, result.message);
    }

    await delay(options.drainWaitMs, undefined, { signal });
    await gateway.dispatcher.flush();
    logger.info({ pending: gateway.queue.size }, 'Burst drained');

    // Past the close (rounded up to the second) plus one poll, the next order is rejected
    await delay(Math.max(0, closeAt - Date.now()) + 1000 + config.session.pollIntervalMs, undefined, { signal });
    const late = gateway.orders.onData({ type: 'new', orderId: 2000, symbol: 'INFY', side: 'sell', price: 99, quantity: 5 });
    logger.info({ outcome: late.outcome, phase: gateway.session.currentPhase() }, late.message);
  } finally {
    await gateway.stop();
  }
}

if (require.main === module) {
  dotenv.config();

  const controller = new AbortController();
  process.on('SIGINT', () => {
    controller.abort();
  });

  const manager = new ConfigurationManager(path.resolve(process.cwd(), 'config', 'gateway.json'));
  manager
    .loadConfiguration()
    .then(config => runSimulation(config, DEFAULT_SIMULATION, controller.signal))
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      if (controller.signal.aborted) {
        process.exit(0);
      }
      console.error('Simulation failed:', error);
      process.exit(1);
    });
}
