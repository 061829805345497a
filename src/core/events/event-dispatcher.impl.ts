import { TransactionEventType } from '../domain/enums';
import {
  EventDispatcher,
  EventHandler,
  EventSubscription,
  LifecycleLogger,
  TransactionEvent,
} from '../interfaces';

/**
 * Default implementation of the EventDispatcher
 *
 * Handles registration and synchronous dispatch of lifecycle events.
 * Supports multiple handlers per event type with error isolation.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private handlers: Map<TransactionEventType, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;
  private subscriptions: Map<
    string,
    { eventType: TransactionEventType | '*'; handler: EventHandler }
  > = new Map();

  constructor(private readonly logger: LifecycleLogger = console) {}

  /**
   * Register an event handler for a specific event type
   */
  on(eventType: TransactionEventType, handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    const handlers = this.handlers.get(eventType) ?? new Set<EventHandler>();
    handlers.add(handler);
    this.handlers.set(eventType, handlers);

    this.subscriptions.set(subscriptionId, { eventType, handler });

    return {
      id: subscriptionId,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  /**
   * Register a handler for all event types
   */
  onAll(handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    this.globalHandlers.add(handler);
    this.subscriptions.set(subscriptionId, { eventType: '*', handler });

    return {
      id: subscriptionId,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
        this.subscriptions.delete(subscriptionId);
      },
    };
  }

  /**
   * Remove an event handler
   */
  off(eventType: TransactionEventType, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }

    for (const [id, sub] of this.subscriptions.entries()) {
      if (sub.eventType === eventType && sub.handler === handler) {
        this.subscriptions.delete(id);
        break;
      }
    }
  }

  /**
   * Remove all handlers for an event type, or every handler when omitted
   */
  removeAllHandlers(eventType?: TransactionEventType): void {
    if (eventType) {
      this.handlers.delete(eventType);

      for (const [id, sub] of this.subscriptions.entries()) {
        if (sub.eventType === eventType) {
          this.subscriptions.delete(id);
        }
      }
    } else {
      this.handlers.clear();
      this.globalHandlers.clear();
      this.subscriptions.clear();
    }
  }

  /**
   * Dispatch an event to all registered handlers.
   * A failing handler is reported and does not stop the others.
   */
  dispatch(event: TransactionEvent): void {
    const errors: Array<{ handler: string; error: Error }> = [];

    for (const handler of this.getHandlers(event.eventType)) {
      try {
        handler(event.eventType, event);
      } catch (error) {
        errors.push({
          handler: handler.name || 'anonymous',
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }

    if (errors.length > 0) {
      this.logger.error(
        `Event dispatch errors for ${event.eventType}: ${errors
          .map(({ handler, error }) => `${handler}: ${error.message}`)
          .join('; ')}`,
      );
    }
  }

  /**
   * Get all handlers for an event type, specific ones first
   */
  getHandlers(eventType: TransactionEventType): EventHandler[] {
    const specificHandlers = Array.from(this.handlers.get(eventType) ?? []);
    return [...specificHandlers, ...this.globalHandlers];
  }

  /**
   * Get handler count for an event type, or across all types when omitted
   */
  getHandlerCount(eventType?: TransactionEventType): number {
    if (eventType) {
      return (this.handlers.get(eventType)?.size ?? 0) + this.globalHandlers.size;
    }

    let total = this.globalHandlers.size;
    for (const handlers of this.handlers.values()) {
      total += handlers.size;
    }
    return total;
  }

  /**
   * Get all event types with specific handlers
   */
  getEventTypes(): TransactionEventType[] {
    return Array.from(this.handlers.keys());
  }
}
