/**
 * Commands that move a transaction between states
 * Recorded on state errors and lifecycle events
 */
export enum LifecycleAction {
  AUTHORIZE = 'authorize',
  CAPTURE = 'capture',
  REFUND = 'refund',
}
