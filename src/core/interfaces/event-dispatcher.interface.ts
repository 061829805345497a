import { TransactionEventType, TransactionStatus } from '../domain/enums';
import { TransactionSnapshot } from '../domain/models';

/**
 * Event payload sent to handlers
 */
export interface TransactionEvent {
  eventType: TransactionEventType;
  transactionId: string;
  transaction: TransactionSnapshot;
  fromStatus: TransactionStatus | null;
  toStatus: TransactionStatus;
  /**
   * Amount of the command (creation amount or refund amount)
   */
  amount?: number;
  /**
   * Set on refund events; true when the refund completed the transaction
   */
  fullyRefunded?: boolean;
  timestamp: Date;
}

/**
 * Event handler function signature
 */
export type EventHandler = (
  eventType: TransactionEventType,
  event: TransactionEvent,
) => void;

/**
 * Handle returned on registration
 */
export interface EventSubscription {
  id: string;
  unsubscribe: () => void;
}

/**
 * Event dispatcher interface - fans lifecycle events out to handlers
 */
export interface EventDispatcher {
  /**
   * Register a handler for one event type
   */
  on(eventType: TransactionEventType, handler: EventHandler): EventSubscription;

  /**
   * Register a handler for every event type
   */
  onAll(handler: EventHandler): EventSubscription;

  /**
   * Remove a handler registered with `on`
   */
  off(eventType: TransactionEventType, handler: EventHandler): void;

  /**
   * Deliver an event to its handlers. Handler failures never propagate.
   */
  dispatch(event: TransactionEvent): void;
}
