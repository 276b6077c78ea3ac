export * from './Order';
export * from './ResponseRecord';
export * from './SessionPhase';
export * from './AuditEvent';
