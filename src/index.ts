/**
 * Transaction Lifecycle
 *
 * A storage agnostic business-rule engine for the payment transaction
 * lifecycle: create, authorize, capture, and partial or full refund.
 */

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/storage/memory';

// Export NestJS modules
export * from './modules';

// Export shared DTOs and Swagger decorators
export * from './_shared';
