/**
 * Session Controller
 * Polls the clock against the configured window and drives the single-session phase machine:
 * before_open -> open -> closed, with a logon on open and a logout on close.
 */

import type { Logger } from 'pino';
import type {
  SessionCredentials,
  SessionPhase,
  SessionTransition,
  SessionWindow
} from '../models/SessionPhase';
import { type Clock, formatTimeOfDay, systemClock, timeOfDayAt } from '../utils/clock';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { createSilentLogger } from '../utils/logger';

export type SessionTransitionHandler = (transition: SessionTransition) => void;

export interface SessionControllerOptions {
  pollIntervalMs: number;
}

const DEFAULT_OPTIONS: SessionControllerOptions = {
  pollIntervalMs: 500
};

export class SessionController {
  private readonly window: SessionWindow;
  private readonly credentials: SessionCredentials;
  private readonly options: SessionControllerOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private phase: SessionPhase = 'before_open';
  private transitionHandlers: SessionTransitionHandler[] = [];
  private phaseWaiters: Set<(phase: SessionPhase) => void> = new Set();
  private pollTimer?: NodeJS.Timeout;

  constructor(
    window: SessionWindow,
    credentials: SessionCredentials,
    options: Partial<SessionControllerOptions> = {},
    clock: Clock = systemClock,
    logger: Logger = createSilentLogger()
  ) {
    this.window = Object.freeze({ ...window });
    this.credentials = credentials;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.clock = clock;
    this.logger = logger;
  }

  currentPhase(): SessionPhase {
    return this.phase;
  }

  isOpen(): boolean {
    return this.phase === 'open';
  }

  getWindow(): SessionWindow {
    return this.window;
  }

  onTransition(handler: SessionTransitionHandler): () => void {
    this.transitionHandlers.push(handler);
    return () => {
      this.transitionHandlers = this.transitionHandlers.filter(h => h !== handler);
    };
  }

  /**
   * Evaluates the phase once and then on every poll interval
   */
  start(): void {
    if (this.pollTimer) {
      return;
    }

    this.logger.info(
      {
        openTime: formatTimeOfDay(this.window.openTime),
        closeTime: formatTimeOfDay(this.window.closeTime),
        pollIntervalMs: this.options.pollIntervalMs
      },
      'Session controller started'
    );

    this.poll();
    this.pollTimer = setInterval(() => this.poll(), this.options.pollIntervalMs);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
  }

  /**
   * One evaluation step of the phase machine. Returns the phase after the step.
   */
  poll(): SessionPhase {
    const now = this.clock.now();
    const timeOfDay = timeOfDayAt(now);
    const previous = this.phase;

    if (previous === 'closed') {
      return previous;
    }

    if (timeOfDay >= this.window.closeTime) {
      this.phase = 'closed';
    } else if (previous === 'before_open' && timeOfDay >= this.window.openTime) {
      this.phase = 'open';
    }

    if (this.phase === previous) {
      return previous;
    }

    for (const waiter of [...this.phaseWaiters]) {
      waiter(this.phase);
    }

    if (this.phase === 'open') {
      this.emit({ type: 'logon', from: previous, to: 'open', username: this.credentials.username, timestamp: new Date(now) });
    } else if (previous === 'open') {
      this.emit({ type: 'logout', from: previous, to: 'closed', username: this.credentials.username, timestamp: new Date(now) });
    } else {
      this.logger.warn({ closeTime: formatTimeOfDay(this.window.closeTime) }, 'Session closed before it opened');
    }

    return this.phase;
  }

  /**
   * Resolves true once the session opens, false if it closes without opening.
   * Rejects when the signal aborts.
   */
  waitUntilOpen(signal?: AbortSignal): Promise<boolean> {
    if (this.phase !== 'before_open') {
      return Promise.resolve(this.phase === 'open');
    }

    return new Promise<boolean>((resolve, reject) => {
      const onAbort = (): void => {
        this.phaseWaiters.delete(waiter);
        reject(new ApplicationError(
          'Wait for session open was aborted',
          'SESSION_WAIT_ABORTED',
          ErrorCategory.BUSINESS_LOGIC,
          ErrorSeverity.LOW,
          {
            operation: 'waitUntilOpen',
            component: 'SessionController',
            timestamp: new Date(this.clock.now())
          }
        ));
      };

      const waiter = (phase: SessionPhase): void => {
        this.phaseWaiters.delete(waiter);
        signal?.removeEventListener('abort', onAbort);
        resolve(phase === 'open');
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }

      this.phaseWaiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private emit(transition: SessionTransition): void {
    this.logger.info(
      { username: transition.username, at: transition.timestamp.toISOString() },
      transition.type === 'logon' ? 'Logon' : 'Logout'
    );

    for (const handler of this.transitionHandlers) {
      try {
        handler(transition);
      } catch (error) {
        this.logger.error(
          { err: error, transition: transition.type },
          'Session transition handler failed'
        );
      }
    }
  }
}
