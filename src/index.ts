/**
 * Order Gateway - Main Entry Point
 * Session-window admission, per-second throttling and a modifiable pending queue in front of an exchange
 */

export * from './models';
export * from './services';
export * from './connectors';
export * from './config';
export * from './utils';

export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Order Gateway';
