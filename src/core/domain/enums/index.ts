export * from './transaction-status.enum';
export * from './lifecycle-action.enum';
export * from './transaction-event-type.enum';
