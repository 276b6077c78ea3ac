export * from './AuditService';
export * from './Dispatcher';
export * from './OrderGateway';
export * from './OrderManager';
export * from './PendingQueue';
export * from './ResponseRecorder';
export * from './SessionController';
export * from './ThrottleGate';
