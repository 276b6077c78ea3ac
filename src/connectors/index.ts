export * from './Sender';
