/**
 * Lifecycle Event System
 * Event dispatching and handling for persisted lifecycle changes
 */

// Event dispatcher implementation
export { EventDispatcherImpl } from './event-dispatcher.impl';

// Built-in event handlers
export { LoggingEventHandler } from './handlers/logging.handler';
export type { EventLogLevel } from './handlers/logging.handler';
