/**
 * Error handling and recovery for the order gateway
 * Normalizes raw failures into categorized application errors and retries the retryable ones
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  NETWORK = 'network',
  VALIDATION = 'validation',
  BUSINESS_LOGIC = 'business_logic',
  CONFIGURATION = 'configuration',
  SYSTEM = 'system',
  EXTERNAL_SERVICE = 'external_service'
}

export enum RecoveryStrategy {
  RETRY = 'retry',
  FAIL_FAST = 'fail_fast'
}

export interface ErrorContext {
  operation: string;
  component: string;
  orderId?: number;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface RecoveryAction {
  strategy: RecoveryStrategy;
  maxAttempts?: number;
  backoffMs?: number;
}

export type ErrorHandlingResult<T> =
  | { success: true; result: T; recoveryAttempts: number; strategyUsed: RecoveryStrategy }
  | { success: false; error: ApplicationError; recoveryAttempts: number; strategyUsed: RecoveryStrategy };

export interface ErrorMetric {
  count: number;
  lastOccurrence: Date;
}

/**
 * Application error with recovery context
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
      userMessage?: string;
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.determineRetryability();
    this.userMessage = options.userMessage ?? this.generateUserMessage();
  }

  private determineRetryability(): boolean {
    if (this.category === ErrorCategory.NETWORK || this.category === ErrorCategory.EXTERNAL_SERVICE) {
      return true;
    }

    if (this.category === ErrorCategory.SYSTEM && this.severity !== ErrorSeverity.CRITICAL) {
      return true;
    }

    return false;
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.NETWORK:
        return 'Connection to the exchange failed. The request may be retried.';
      case ErrorCategory.VALIDATION:
        return 'Invalid order request. Please check price, quantity and symbol.';
      case ErrorCategory.BUSINESS_LOGIC:
        return 'Request could not be completed in the current gateway state.';
      case ErrorCategory.CONFIGURATION:
        return 'Gateway configuration is invalid. Fix the configuration and restart.';
      case ErrorCategory.EXTERNAL_SERVICE:
        return 'Exchange is temporarily unavailable.';
      case ErrorCategory.SYSTEM:
        return 'Internal gateway error.';
      default:
        return 'An unexpected error occurred.';
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      userMessage: this.userMessage
    };
  }
}

/**
 * Error handler with bounded retry and per-code error metrics
 */
export class ErrorHandler {
  private recoveryStrategies: Map<string, RecoveryAction> = new Map();
  private errorMetrics: Map<string, ErrorMetric> = new Map();

  constructor() {
    this.initializeDefaultStrategies();
  }

  /**
   * Runs an operation, retrying retryable failures according to the recovery strategy
   */
  async handleError<T>(
    operation: () => Promise<T>,
    context: ErrorContext,
    recoveryAction?: RecoveryAction
  ): Promise<ErrorHandlingResult<T>> {
    const strategy = recoveryAction ?? this.getRecoveryStrategy(context.operation);
    const maxAttempts = strategy.maxAttempts ?? 3;
    let recoveryAttempts = 0;

    for (;;) {
      try {
        const result = await operation();
        return { success: true, result, recoveryAttempts, strategyUsed: strategy.strategy };
      } catch (error) {
        recoveryAttempts++;
        const wrapped = this.wrapError(error, context);
        this.recordErrorMetrics(wrapped);

        const canRetry = strategy.strategy === RecoveryStrategy.RETRY
          && wrapped.isRetryable
          && recoveryAttempts < maxAttempts;

        if (!canRetry) {
          return { success: false, error: wrapped, recoveryAttempts, strategyUsed: strategy.strategy };
        }

        await this.sleep(this.calculateBackoffDelay(recoveryAttempts, strategy.backoffMs ?? 1000));
      }
    }
  }

  /**
   * Wraps raw errors into ApplicationError with context
   */
  wrapError(error: unknown, context: ErrorContext): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }

    let category = ErrorCategory.SYSTEM;
    let severity = ErrorSeverity.MEDIUM;
    let code = 'UNKNOWN_ERROR';
    let isRetryable = false;

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (message.includes('network') || message.includes('timeout') || message.includes('connection')) {
        category = ErrorCategory.NETWORK;
        code = 'NETWORK_ERROR';
        isRetryable = true;
      } else if (message.includes('invalid') || message.includes('validation')) {
        category = ErrorCategory.VALIDATION;
        code = 'VALIDATION_ERROR';
        severity = ErrorSeverity.LOW;
      } else if (message.includes('exchange') || message.includes('unavailable')) {
        category = ErrorCategory.EXTERNAL_SERVICE;
        code = 'EXTERNAL_SERVICE_ERROR';
        isRetryable = true;
      } else if (message.includes('ebusy') || message.includes('eagain')) {
        code = 'RESOURCE_BUSY';
        isRetryable = true;
      }
    }

    return new ApplicationError(
      error instanceof Error ? error.message : String(error),
      code,
      category,
      severity,
      context,
      {
        originalError: error instanceof Error ? error : undefined,
        isRetryable
      }
    );
  }

  /**
   * Registers a custom recovery strategy for an operation
   */
  registerRecoveryStrategy(operation: string, action: RecoveryAction): void {
    this.recoveryStrategies.set(operation, action);
  }

  getErrorMetrics(): Map<string, ErrorMetric> {
    return new Map(this.errorMetrics);
  }

  private calculateBackoffDelay(attempt: number, baseDelay: number): number {
    const maxDelay = 5000;
    const jitter = Math.random() * 0.1;
    const delay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
    return delay * (1 + jitter);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private getRecoveryStrategy(operation: string): RecoveryAction {
    return this.recoveryStrategies.get(operation) ?? {
      strategy: RecoveryStrategy.FAIL_FAST,
      maxAttempts: 1
    };
  }

  private recordErrorMetrics(error: ApplicationError): void {
    const key = `${error.category}:${error.code}`;
    const existing = this.errorMetrics.get(key);

    this.errorMetrics.set(key, {
      count: (existing?.count ?? 0) + 1,
      lastOccurrence: new Date()
    });
  }

  private initializeDefaultStrategies(): void {
    // Response log writes - short bounded retry so the dispatcher is never held up for long
    this.recoveryStrategies.set('record_response', {
      strategy: RecoveryStrategy.RETRY,
      maxAttempts: 3,
      backoffMs: 50
    });

    // Sends are never retried: a resend would bypass the throttle gate
    this.recoveryStrategies.set('send_order', {
      strategy: RecoveryStrategy.FAIL_FAST,
      maxAttempts: 1
    });
  }
}
