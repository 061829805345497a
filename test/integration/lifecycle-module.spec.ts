import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  ConfigurationService,
  EVENT_DISPATCHER,
  EventDispatcherImpl,
  HealthController,
  InMemoryTransactionStore,
  InvalidRefundAmountError,
  InvalidTransactionStateError,
  LifecycleModule,
  TRANSACTION_STORE,
  TransactionController,
  TransactionEventType,
  TransactionService,
  TransactionStatus,
  TransactionStore,
} from '../../src';

describe('LifecycleModule Integration', () => {
  let moduleRef: TestingModule | undefined;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  afterEach(async () => {
    await moduleRef?.close();
    moduleRef = undefined;
  });

  describe('forRoot', () => {
    let controller: TransactionController;

    beforeEach(async () => {
      moduleRef = await Test.createTestingModule({
        imports: [LifecycleModule.forRoot({ events: { enableLogging: false } })],
      }).compile();

      controller = moduleRef.get(TransactionController);
    });

    it('should provide the service and an in-memory store', () => {
      expect(moduleRef?.get(TransactionService)).toBeInstanceOf(TransactionService);
      expect(moduleRef?.get<TransactionStore>(TRANSACTION_STORE)).toBeInstanceOf(
        InMemoryTransactionStore,
      );
      expect(moduleRef?.get(ConfigurationService).getStorageType()).toBe('memory');
    });

    it('should run a transaction through the controller', () => {
      const created = controller.createTransaction({ ownerId: 'u1', amount: 100 });
      expect(created.status).toBe(TransactionStatus.CREATED);

      controller.authorize(created.id);
      controller.capture(created.id);

      const partial = controller.refund(created.id, { amount: 30 });
      expect(partial).toMatchObject({
        status: TransactionStatus.CAPTURED,
        refundedAmount: 30,
        refundableAmount: 70,
      });

      const full = controller.refund(created.id, { amount: 70 });
      expect(full.status).toBe(TransactionStatus.REFUNDED);

      expect(controller.getTransaction(created.id)).toEqual(full);
      expect(() => controller.refund(created.id, { amount: 1 })).toThrow(
        InvalidTransactionStateError,
      );
    });

    it('should surface domain errors from the controller', () => {
      const created = controller.createTransaction({ ownerId: 'u3', amount: 75 });
      controller.authorize(created.id);
      controller.capture(created.id);

      expect(() => controller.refund(created.id, { amount: 100 })).toThrow(
        InvalidRefundAmountError,
      );
    });

    it('should describe the lifecycle from the health controller', () => {
      const health = moduleRef?.get(HealthController);

      expect(health?.health()).toMatchObject({ status: 'healthy', storage: 'memory' });

      const lifecycle = health?.lifecycle();
      expect(lifecycle?.initialState).toBe(TransactionStatus.CREATED);
      expect(lifecycle?.transitions).toHaveLength(4);
      expect(lifecycle?.transitions[0]).toEqual({
        from: TransactionStatus.CREATED,
        to: TransactionStatus.AUTHORIZED,
        action: 'authorize',
        description: 'Funds reserved against the payer',
      });
      expect(lifecycle?.diagram.split('\n')[0]).toBe('stateDiagram-v2');
    });
  });

  describe('forRootAsync', () => {
    it('should use a custom store and configured handlers', async () => {
      const customStore = new InMemoryTransactionStore();
      const handler = jest.fn();

      moduleRef = await Test.createTestingModule({
        imports: [
          LifecycleModule.forRootAsync({
            useFactory: () => ({
              storage: { type: 'custom', store: customStore },
              events: {
                enableLogging: false,
                handlers: [{ eventType: TransactionEventType.CREATED, handler }],
              },
            }),
          }),
        ],
      }).compile();

      const service = moduleRef.get(TransactionService);
      const transaction = service.createTransaction('u9', 10);

      expect(customStore.count()).toBe(1);
      expect(customStore.exists(transaction.id)).toBe(true);
      expect(handler).toHaveBeenCalledWith(
        TransactionEventType.CREATED,
        expect.objectContaining({
          transactionId: transaction.id,
          fromStatus: null,
          toStatus: TransactionStatus.CREATED,
          amount: 10,
        }),
      );
      expect(moduleRef.get(ConfigurationService).getStorageType()).toBe('custom');
    });

    it('should register the logging handler when event logging is enabled', async () => {
      moduleRef = await Test.createTestingModule({
        imports: [
          LifecycleModule.forRootAsync({
            useFactory: async () => ({ events: { enableLogging: true } }),
          }),
        ],
      }).compile();

      const dispatcher = moduleRef.get<EventDispatcherImpl>(EVENT_DISPATCHER);

      expect(dispatcher.getHandlerCount()).toBe(1);
    });

    it('should leave the dispatcher empty when event logging is disabled', async () => {
      moduleRef = await Test.createTestingModule({
        imports: [
          LifecycleModule.forRootAsync({
            useFactory: () => ({ events: { enableLogging: false } }),
          }),
        ],
      }).compile();

      expect(moduleRef.get(ConfigurationService).isEventLoggingEnabled()).toBe(false);
      expect(
        moduleRef.get<EventDispatcherImpl>(EVENT_DISPATCHER).getHandlerCount(),
      ).toBe(0);
    });

    it('should fail to start without a custom store', async () => {
      await expect(
        Test.createTestingModule({
          imports: [LifecycleModule.forRoot({ storage: { type: 'custom' } })],
        }).compile(),
      ).rejects.toThrow('Custom transaction store not provided');
    });
  });
});
