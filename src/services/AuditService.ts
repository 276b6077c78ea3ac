import { createHmac, randomBytes } from 'crypto';
import type { AuditEvent, AuditEventType } from '../models/AuditEvent';

export interface AuditEventInput {
  eventType: AuditEventType;
  details?: Record<string, unknown>;
  username?: string;
  orderId?: number;
}

export interface AuditServiceOptions {
  /** Oldest events are evicted beyond this many */
  maxEvents: number;
}

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'apikey'];

const DEFAULT_OPTIONS: AuditServiceOptions = {
  maxEvents: 10000
};

/**
 * Audit Service provides tamper-evident logging of gateway events
 * (logon/logout, admission rejections, queue modifications) with HMAC signatures
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;
  private readonly options: AuditServiceOptions;
  private evictedEvents = 0;

  constructor(signingKey?: Buffer, options: Partial<AuditServiceOptions> = {}) {
    this.signingKey = signingKey ?? randomBytes(32);
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Appends a signed event and returns its id
   */
  logEvent(input: AuditEventInput): string {
    const eventId = randomBytes(16).toString('hex');
    const timestamp = new Date();
    const details = this.redactSensitiveData(input.details ?? {});

    const unsigned: Omit<AuditEvent, 'signature'> = {
      eventId,
      timestamp,
      eventType: input.eventType,
      username: input.username,
      orderId: input.orderId,
      details
    };

    this.auditLog.push({ ...unsigned, signature: this.generateSignature(unsigned) });

    const overflow = this.auditLog.length - this.options.maxEvents;
    if (overflow > 0) {
      this.auditLog.splice(0, overflow);
      this.evictedEvents += overflow;
    }

    return eventId;
  }

  /**
   * Number of events dropped from the head of the log to stay within `maxEvents`
   */
  getEvictedEventCount(): number {
    return this.evictedEvents;
  }

  /**
   * Exports events, optionally restricted to a date range
   */
  exportAuditLog(startDate?: Date, endDate?: Date): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (startDate && event.timestamp < startDate) return false;
        if (endDate && event.timestamp > endDate) return false;
        return true;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  eventsOfType(eventType: AuditEventType): AuditEvent[] {
    return this.auditLog.filter(event => event.eventType === eventType);
  }

  /**
   * Verifies the integrity of audit log entries
   */
  verifyLogIntegrity(): boolean {
    return this.auditLog.every(({ signature, ...unsigned }) => signature === this.generateSignature(unsigned));
  }

  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  private generateSignature(event: Omit<AuditEvent, 'signature'>): string {
    const signingData = {
      details: JSON.stringify(canonicalize(event.details)),
      eventId: event.eventId,
      eventType: event.eventType,
      orderId: event.orderId ?? null,
      timestamp: event.timestamp.toISOString(),
      username: event.username ?? null
    };

    return createHmac('sha256', this.signingKey)
      .update(JSON.stringify(signingData))
      .digest('hex');
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

/**
 * Rebuilds records with sorted keys at every depth so equal details always serialize alike
 */
function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (!isPlainRecord(value)) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = canonicalize(value[key]);
  }
  return sorted;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
