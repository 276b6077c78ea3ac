/**
 * Audit event and logging models
 */

export type AuditEventType =
  | 'LOGON'
  | 'LOGOUT'
  | 'ORDER_REJECTED'
  | 'ORDER_SENT'
  | 'ORDER_QUEUED'
  | 'ORDER_MODIFIED'
  | 'ORDER_CANCELLED'
  | 'MODIFY_IGNORED'
  | 'CANCEL_IGNORED'
  | 'GATEWAY_STARTED'
  | 'GATEWAY_STOPPED';

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  eventType: AuditEventType;
  username?: string;
  orderId?: number;
  details: Record<string, unknown>;
  signature: string;
}
