import {
  EventDispatcherImpl,
  LifecycleLogger,
  LoggingEventHandler,
  TransactionEvent,
  TransactionEventType,
  TransactionStatus,
} from '../../src';

const createLogger = (): jest.Mocked<LifecycleLogger> => ({
  log: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

const timestamp = new Date('2026-01-01T00:00:00.000Z');

const refundEvent = (): TransactionEvent => ({
  eventType: TransactionEventType.REFUNDED,
  transactionId: 'tx-1',
  transaction: {
    id: 'tx-1',
    ownerId: 'u1',
    capturedAmount: 100,
    refundedAmount: 30,
    refundableAmount: 70,
    status: TransactionStatus.CAPTURED,
    createdAt: timestamp,
    updatedAt: timestamp,
  },
  fromStatus: TransactionStatus.CAPTURED,
  toStatus: TransactionStatus.CAPTURED,
  amount: 30,
  fullyRefunded: false,
  timestamp,
});

describe('EventDispatcherImpl', () => {
  let logger: jest.Mocked<LifecycleLogger>;
  let dispatcher: EventDispatcherImpl;

  beforeEach(() => {
    logger = createLogger();
    dispatcher = new EventDispatcherImpl(logger);
  });

  it('should deliver to specific handlers before global ones', () => {
    const calls: string[] = [];
    dispatcher.onAll(() => calls.push('global'));
    dispatcher.on(TransactionEventType.REFUNDED, () => calls.push('specific'));
    dispatcher.on(TransactionEventType.CAPTURED, () => calls.push('other'));

    dispatcher.dispatch(refundEvent());

    expect(calls).toEqual(['specific', 'global']);
  });

  it('should pass the event type and event to handlers', () => {
    const handler = jest.fn();
    dispatcher.on(TransactionEventType.REFUNDED, handler);
    const event = refundEvent();

    dispatcher.dispatch(event);

    expect(handler).toHaveBeenCalledWith(TransactionEventType.REFUNDED, event);
  });

  it('should isolate failing handlers and report them', () => {
    const survivor = jest.fn();
    dispatcher.on(TransactionEventType.REFUNDED, function notifyLedger() {
      throw new Error('ledger offline');
    });
    dispatcher.on(TransactionEventType.REFUNDED, survivor);

    dispatcher.dispatch(refundEvent());

    expect(survivor).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Event dispatch errors for transaction.refunded: notifyLedger: ledger offline',
    );
  });

  it('should stop delivering after unsubscribe', () => {
    const specific = jest.fn();
    const global = jest.fn();
    dispatcher.on(TransactionEventType.REFUNDED, specific).unsubscribe();
    dispatcher.onAll(global).unsubscribe();

    dispatcher.dispatch(refundEvent());

    expect(specific).not.toHaveBeenCalled();
    expect(global).not.toHaveBeenCalled();
    expect(dispatcher.getHandlerCount()).toBe(0);
  });

  it('should count and list handlers', () => {
    dispatcher.on(TransactionEventType.CREATED, jest.fn());
    dispatcher.on(TransactionEventType.REFUNDED, jest.fn());
    dispatcher.onAll(jest.fn());

    expect(dispatcher.getHandlerCount()).toBe(3);
    expect(dispatcher.getHandlerCount(TransactionEventType.CREATED)).toBe(2);
    expect(dispatcher.getEventTypes()).toEqual([
      TransactionEventType.CREATED,
      TransactionEventType.REFUNDED,
    ]);

    dispatcher.removeAllHandlers(TransactionEventType.CREATED);
    expect(dispatcher.getEventTypes()).toEqual([TransactionEventType.REFUNDED]);

    dispatcher.removeAllHandlers();
    expect(dispatcher.getHandlerCount()).toBe(0);
  });
});

describe('LoggingEventHandler', () => {
  it('should log the transition at normal level', () => {
    const logger = createLogger();
    const handler = new LoggingEventHandler(logger).getHandler();

    handler(TransactionEventType.REFUNDED, refundEvent());

    expect(logger.log).toHaveBeenCalledWith(
      '[Lifecycle Event] transaction.refunded {"timestamp":"2026-01-01T00:00:00.000Z","transactionId":"tx-1","fromStatus":"CAPTURED","toStatus":"CAPTURED","amount":30}',
    );
  });

  it('should log only the id at minimal level', () => {
    const logger = createLogger();
    const handler = new LoggingEventHandler(logger, 'minimal').getHandler();

    handler(TransactionEventType.REFUNDED, refundEvent());

    expect(logger.log).toHaveBeenCalledWith(
      '[Lifecycle Event] transaction.refunded {"transactionId":"tx-1"}',
    );
  });

  it('should include the record at verbose level', () => {
    const logger = createLogger();
    const handler = new LoggingEventHandler(logger, 'verbose').getHandler();

    handler(TransactionEventType.REFUNDED, refundEvent());

    const message = logger.log.mock.calls[0][0];
    const payload = JSON.parse(message.replace('[Lifecycle Event] transaction.refunded ', ''));
    expect(payload.fullyRefunded).toBe(false);
    expect(payload.transaction).toEqual({
      id: 'tx-1',
      ownerId: 'u1',
      capturedAmount: 100,
      refundedAmount: 30,
      refundableAmount: 70,
      status: 'CAPTURED',
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    });
  });
});
