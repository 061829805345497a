/**
 * Lifecycle Core - pure business logic with no framework dependencies
 * Storage agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/errors';
export * from './domain/value-objects/amount.vo';

// Interfaces and contracts
export * from './interfaces';

// State machine
export * from './state-machine';

// Core services
export * from './services';

// Event system
export * from './events';

// Rate limiting
export * from './rate-limit';
