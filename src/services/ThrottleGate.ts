/**
 * Throttle Gate
 * Admits at most `maxPerInterval` sends per wall-clock aligned interval
 */

import type { Logger } from 'pino';
import { type Clock, systemClock } from '../utils/clock';
import { createSilentLogger } from '../utils/logger';

export interface ThrottleConfig {
  maxPerInterval: number;
  intervalMs: number;
}

export interface Admitter {
  tryAdmit(): boolean;
}

export class ThrottleGate implements Admitter {
  private readonly config: Readonly<ThrottleConfig>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private sentInInterval = 0;
  private intervalIndex: number;
  private resetTimer?: NodeJS.Timeout;

  constructor(config: ThrottleConfig, clock: Clock = systemClock, logger: Logger = createSilentLogger()) {
    this.config = Object.freeze({ ...config });
    this.clock = clock;
    this.logger = logger;
    this.intervalIndex = this.indexAt(this.clock.now());
  }

  /**
   * Takes one slot from the current interval if any is left
   */
  tryAdmit(): boolean {
    this.rollover();

    if (this.sentInInterval >= this.config.maxPerInterval) {
      return false;
    }

    this.sentInInterval++;
    return true;
  }

  /**
   * Resets the counter if the clock has moved into a later interval.
   * Each interval index is reset once, whichever of the timer or an admit sees it first.
   */
  rollover(): boolean {
    const index = this.indexAt(this.clock.now());
    if (index === this.intervalIndex) {
      return false;
    }

    if (this.sentInInterval > 0) {
      this.logger.debug({ sent: this.sentInInterval, cap: this.config.maxPerInterval }, 'Throttle interval reset');
    }

    this.intervalIndex = index;
    this.sentInInterval = 0;
    return true;
  }

  remainingCapacity(): number {
    this.rollover();
    return this.config.maxPerInterval - this.sentInInterval;
  }

  msUntilNextInterval(): number {
    const now = this.clock.now();
    return (this.indexAt(now) + 1) * this.config.intervalMs - now;
  }

  /**
   * Schedules a reset on every interval boundary
   */
  start(): void {
    if (this.resetTimer) {
      return;
    }
    this.scheduleReset();
  }

  stop(): void {
    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
      this.resetTimer = undefined;
    }
  }

  getConfig(): Readonly<ThrottleConfig> {
    return this.config;
  }

  private scheduleReset(): void {
    this.resetTimer = setTimeout(() => {
      this.rollover();
      this.scheduleReset();
    }, Math.max(1, this.msUntilNextInterval()));
  }

  private indexAt(epochMs: number): number {
    return Math.floor(epochMs / this.config.intervalMs);
  }
}
