// Interface and type exports
export * from './common.types';
export * from './transaction-store';
export * from './event-dispatcher.interface';
