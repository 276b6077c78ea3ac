export * from './clock';
export * from './ErrorHandler';
export * from './logger';
