export * from './in-memory-transaction.store';
