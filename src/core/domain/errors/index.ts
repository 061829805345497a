export * from './transaction.errors';
