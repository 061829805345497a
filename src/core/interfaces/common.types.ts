/**
 * Common types used across the core and its adapters
 */

/**
 * Minimal logger accepted by core classes.
 * Nest's `Logger` and `console` both satisfy it.
 */
export interface LifecycleLogger {
  log(message: string, ...optionalParams: unknown[]): void;
  warn(message: string, ...optionalParams: unknown[]): void;
  error(message: string, ...optionalParams: unknown[]): void;
}

/**
 * Source of fresh transaction ids
 */
export type IdGenerator = () => string;

/**
 * Source of the current time
 */
export type Clock = () => Date;
