/**
 * Injection tokens for the lifecycle module
 */

export const TRANSACTION_STORE = Symbol('TRANSACTION_STORE');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const LIFECYCLE_CONFIG = Symbol('LIFECYCLE_CONFIG');
export const TRANSACTION_STATE_MACHINE = Symbol('TRANSACTION_STATE_MACHINE');
export const RATE_LIMITER = Symbol('RATE_LIMITER');
