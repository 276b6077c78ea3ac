/**
 * Configuration Manager for gateway settings
 * Defaults, then an optional JSON file, then environment variables
 */

import { promises as fs } from 'fs';
import type { SessionWindow } from '../models/SessionPhase';
import { parseTimeOfDay } from '../utils/clock';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { LOG_LEVELS, type LogLevel } from '../utils/logger';

export interface SessionConfig {
  openTime: string;
  closeTime: string;
  username: string;
  password: string;
  pollIntervalMs: number;
}

export interface ThrottleSettings {
  maxOrdersPerSecond: number;
  intervalMs: number;
}

export interface DispatcherSettings {
  tickMs: number;
}

export interface RecorderSettings {
  responseLogPath: string;
}

export interface GatewayConfig {
  logLevel: LogLevel;
  session: SessionConfig;
  throttle: ThrottleSettings;
  dispatcher: DispatcherSettings;
  recorder: RecorderSettings;
}

export type PartialGatewayConfig = {
  [K in keyof GatewayConfig]?: GatewayConfig[K] extends object ? Partial<GatewayConfig[K]> : GatewayConfig[K];
};

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export interface EnvironmentVariables {
  GATEWAY_OPEN_TIME?: string;
  GATEWAY_CLOSE_TIME?: string;
  GATEWAY_MAX_ORDERS_PER_SECOND?: string;
  GATEWAY_USERNAME?: string;
  GATEWAY_PASSWORD?: string;
  GATEWAY_POLL_INTERVAL_MS?: string;
  GATEWAY_TICK_MS?: string;
  GATEWAY_RESPONSE_LOG?: string;
  LOG_LEVEL?: string;
  [key: string]: string | undefined;
}

export class ConfigurationManager {
  private config: GatewayConfig;
  private readonly configFilePath?: string;

  constructor(configFilePath?: string) {
    this.configFilePath = configFilePath;
    this.config = ConfigurationManager.getDefaultConfiguration();
  }

  static getDefaultConfiguration(): GatewayConfig {
    return {
      logLevel: 'info',
      session: {
        openTime: '09:15',
        closeTime: '15:30',
        username: 'gateway',
        password: '',
        pollIntervalMs: 500
      },
      throttle: {
        maxOrdersPerSecond: 100,
        intervalMs: 1000
      },
      dispatcher: {
        tickMs: 10
      },
      recorder: {
        responseLogPath: 'responses.log'
      }
    };
  }

  /**
   * Loads configuration from file and environment variables, then validates it
   */
  async loadConfiguration(env: EnvironmentVariables = process.env): Promise<GatewayConfig> {
    const fileConfig = this.configFilePath ? await this.loadConfigurationFromFile(this.configFilePath) : {};
    const envConfig = this.loadConfigurationFromEnvironment(env);

    const merged = this.mergeConfigurations(this.mergeConfigurations(this.config, fileConfig), envConfig);
    this.assertValidConfiguration(merged);
    this.config = merged;

    return this.getConfiguration();
  }

  getConfiguration(): GatewayConfig {
    return {
      logLevel: this.config.logLevel,
      session: { ...this.config.session },
      throttle: { ...this.config.throttle },
      dispatcher: { ...this.config.dispatcher },
      recorder: { ...this.config.recorder }
    };
  }

  /**
   * Applies overrides on top of the current configuration; rejects the update if the result is invalid
   */
  applyOverrides(overrides: PartialGatewayConfig): GatewayConfig {
    const merged = this.mergeConfigurations(this.config, overrides);
    this.assertValidConfiguration(merged);
    this.config = merged;
    return this.getConfiguration();
  }

  validateConfiguration(config: GatewayConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    if (!LOG_LEVELS.includes(config.logLevel)) {
      errors.push({ path: 'logLevel', message: `Log level must be one of ${LOG_LEVELS.join(', ')}`, value: config.logLevel });
    }

    errors.push(...this.validateSessionConfig(config.session));

    const { maxOrdersPerSecond, intervalMs } = config.throttle;
    if (!Number.isInteger(maxOrdersPerSecond) || maxOrdersPerSecond <= 0) {
      errors.push({ path: 'throttle.maxOrdersPerSecond', message: 'Throttle cap must be a positive integer', value: maxOrdersPerSecond });
    }
    if (!isPositiveInteger(intervalMs)) {
      errors.push({ path: 'throttle.intervalMs', message: 'Throttle interval must be a positive integer', value: intervalMs });
    }

    if (!isPositiveInteger(config.dispatcher.tickMs)) {
      errors.push({ path: 'dispatcher.tickMs', message: 'Dispatcher tick must be a positive integer', value: config.dispatcher.tickMs });
    }

    if (config.recorder.responseLogPath.trim().length === 0) {
      errors.push({ path: 'recorder.responseLogPath', message: 'Response log path is required' });
    }

    return { isValid: errors.length === 0, errors };
  }

  /**
   * Resolves the configured window into seconds since midnight
   */
  static toSessionWindow(session: SessionConfig): SessionWindow {
    const openTime = parseTimeOfDay(session.openTime);
    const closeTime = parseTimeOfDay(session.closeTime);

    if (openTime === null || closeTime === null || closeTime <= openTime) {
      throw configurationError(`Invalid session window ${session.openTime}-${session.closeTime}`);
    }

    return { openTime, closeTime };
  }

  private validateSessionConfig(session: SessionConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];
    const openTime = parseTimeOfDay(session.openTime);
    const closeTime = parseTimeOfDay(session.closeTime);

    if (openTime === null) {
      errors.push({ path: 'session.openTime', message: 'Open time must be HH:MM or HH:MM:SS', value: session.openTime });
    }
    if (closeTime === null) {
      errors.push({ path: 'session.closeTime', message: 'Close time must be HH:MM or HH:MM:SS', value: session.closeTime });
    }
    // Windows wrapping midnight are not supported
    if (openTime !== null && closeTime !== null && closeTime <= openTime) {
      errors.push({ path: 'session.closeTime', message: 'Close time must be after open time', value: session.closeTime });
    }

    if (session.username.trim().length === 0) {
      errors.push({ path: 'session.username', message: 'Username is required' });
    }
    if (!isPositiveInteger(session.pollIntervalMs)) {
      errors.push({ path: 'session.pollIntervalMs', message: 'Poll interval must be a positive integer', value: session.pollIntervalMs });
    }

    return errors;
  }

  private async loadConfigurationFromFile(filePath: string): Promise<PartialGatewayConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw configurationError(`Failed to read configuration file ${filePath}: ${errorMessage}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw configurationError(`Configuration file ${filePath} is not valid JSON: ${errorMessage}`);
    }

    if (!isRecord(parsed)) {
      throw configurationError(`Configuration file ${filePath} must contain a JSON object`);
    }

    return parseConfigObject(parsed, filePath);
  }

  private loadConfigurationFromEnvironment(env: EnvironmentVariables): PartialGatewayConfig {
    const session: Partial<SessionConfig> = {};
    const throttle: Partial<ThrottleSettings> = {};
    const dispatcher: Partial<DispatcherSettings> = {};
    const recorder: Partial<RecorderSettings> = {};
    const config: PartialGatewayConfig = { session, throttle, dispatcher, recorder };

    if (env.GATEWAY_OPEN_TIME) session.openTime = env.GATEWAY_OPEN_TIME;
    if (env.GATEWAY_CLOSE_TIME) session.closeTime = env.GATEWAY_CLOSE_TIME;
    if (env.GATEWAY_USERNAME) session.username = env.GATEWAY_USERNAME;
    if (env.GATEWAY_PASSWORD) session.password = env.GATEWAY_PASSWORD;
    if (env.GATEWAY_POLL_INTERVAL_MS) session.pollIntervalMs = Number(env.GATEWAY_POLL_INTERVAL_MS);
    if (env.GATEWAY_MAX_ORDERS_PER_SECOND) throttle.maxOrdersPerSecond = Number(env.GATEWAY_MAX_ORDERS_PER_SECOND);
    if (env.GATEWAY_TICK_MS) dispatcher.tickMs = Number(env.GATEWAY_TICK_MS);
    if (env.GATEWAY_RESPONSE_LOG) recorder.responseLogPath = env.GATEWAY_RESPONSE_LOG;
    if (env.LOG_LEVEL) {
      const level = env.LOG_LEVEL.toLowerCase();
      if (!isLogLevel(level)) {
        throw configurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
      }
      config.logLevel = level;
    }

    return config;
  }

  private mergeConfigurations(base: GatewayConfig, override: PartialGatewayConfig): GatewayConfig {
    return {
      logLevel: override.logLevel ?? base.logLevel,
      session: { ...base.session, ...(override.session ? defined(override.session) : {}) },
      throttle: { ...base.throttle, ...(override.throttle ? defined(override.throttle) : {}) },
      dispatcher: { ...base.dispatcher, ...(override.dispatcher ? defined(override.dispatcher) : {}) },
      recorder: { ...base.recorder, ...(override.recorder ? defined(override.recorder) : {}) }
    };
  }

  /**
   * Throws a CONFIGURATION_INVALID application error listing every problem
   */
  assertValidConfiguration(config: GatewayConfig): void {
    const validation = this.validateConfiguration(config);
    if (!validation.isValid) {
      throw configurationError(
        `Configuration validation failed: ${validation.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`,
        validation.errors
      );
    }
  }
}

/**
 * Copies the known fields of a parsed JSON document, checking each one's type
 */
function parseConfigObject(raw: Record<string, unknown>, source: string): PartialGatewayConfig {
  const config: PartialGatewayConfig = {};

  const logLevel = readString(raw, 'logLevel', source);
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw configurationError(`${source}: logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }
    config.logLevel = logLevel;
  }

  const session = readObject(raw, 'session', source);
  config.session = defined({
    openTime: readString(session, 'openTime', source),
    closeTime: readString(session, 'closeTime', source),
    username: readString(session, 'username', source),
    password: readString(session, 'password', source),
    pollIntervalMs: readNumber(session, 'pollIntervalMs', source)
  });

  const throttle = readObject(raw, 'throttle', source);
  config.throttle = defined({
    maxOrdersPerSecond: readNumber(throttle, 'maxOrdersPerSecond', source),
    intervalMs: readNumber(throttle, 'intervalMs', source)
  });

  const dispatcher = readObject(raw, 'dispatcher', source);
  config.dispatcher = defined({ tickMs: readNumber(dispatcher, 'tickMs', source) });

  const recorder = readObject(raw, 'recorder', source);
  config.recorder = defined({ responseLogPath: readString(recorder, 'responseLogPath', source) });

  return config;
}

function readObject(raw: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw configurationError(`${source}: ${key} must be an object`);
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = raw[key];
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw configurationError(`${source}: ${key} must be a string`);
}

function readNumber(raw: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = raw[key];
  if (value === undefined || typeof value === 'number') {
    return value;
  }
  throw configurationError(`${source}: ${key} must be a number`);
}

/**
 * Drops undefined fields so they never overwrite a value during a merge
 */
function defined<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    if (values[key] !== undefined) {
      result[key] = values[key];
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function configurationError(message: string, errors?: ConfigValidationError[]): ApplicationError {
  return new ApplicationError(
    message,
    'CONFIGURATION_INVALID',
    ErrorCategory.CONFIGURATION,
    ErrorSeverity.CRITICAL,
    {
      operation: 'loadConfiguration',
      component: 'ConfigurationManager',
      timestamp: new Date(),
      metadata: errors ? { errors } : undefined
    }
  );
}
