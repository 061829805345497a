import { EventHandler, LifecycleLogger, TransactionEvent } from '../../interfaces';

export type EventLogLevel = 'verbose' | 'normal' | 'minimal';

/**
 * Logging event handler
 * Logs all lifecycle events for debugging and monitoring
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: LifecycleLogger = console,
    private readonly logLevel: EventLogLevel = 'normal',
  ) {}

  /**
   * Create the event handler function
   */
  getHandler(): EventHandler {
    return (eventType, event) => {
      const logData = this.prepareLogData(event);
      this.logger.log(`[Lifecycle Event] ${eventType} ${JSON.stringify(logData)}`);
    };
  }

  /**
   * Prepare log data based on log level
   */
  private prepareLogData(event: TransactionEvent): Record<string, unknown> {
    switch (this.logLevel) {
      case 'verbose':
        return {
          timestamp: event.timestamp.toISOString(),
          transactionId: event.transactionId,
          fromStatus: event.fromStatus,
          toStatus: event.toStatus,
          amount: event.amount,
          fullyRefunded: event.fullyRefunded,
          transaction: event.transaction,
        };

      case 'minimal':
        return {
          transactionId: event.transactionId,
        };

      case 'normal':
      default:
        return {
          timestamp: event.timestamp.toISOString(),
          transactionId: event.transactionId,
          fromStatus: event.fromStatus,
          toStatus: event.toStatus,
          amount: event.amount,
        };
    }
  }
}
