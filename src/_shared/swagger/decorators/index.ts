/**
 * Centralized Swagger decorators for the lifecycle API
 */

export * from './transaction.decorators';
export * from './health.decorators';
