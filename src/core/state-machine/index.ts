/**
 * Lifecycle State Machine
 * Pure TypeScript implementation with no external dependencies
 */

// Main state machine
export * from './transaction-state-machine';

// Types and interfaces
export * from './types';

// Transition rules and conditions
export * from './transition-rules';
