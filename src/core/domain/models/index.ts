export * from './transaction.model';
