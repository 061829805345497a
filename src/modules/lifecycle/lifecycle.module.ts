import { DynamicModule, Global, Logger, Module, Provider } from '@nestjs/common';
import {
  LifecycleModuleConfig,
  LifecycleModuleAsyncConfig,
  ResolvedLifecycleConfig,
  mergeLifecycleConfig,
} from './lifecycle.config';
import {
  EventDispatcher,
  EventDispatcherImpl,
  LoggingEventHandler,
  RateLimiter,
  TransactionService,
  TransactionStateMachine,
  TransactionStore,
} from '../../core';
import { InMemoryTransactionStore } from '../../adapters/storage/memory';
import {
  EVENT_DISPATCHER,
  LIFECYCLE_CONFIG,
  RATE_LIMITER,
  TRANSACTION_STATE_MACHINE,
  TRANSACTION_STORE,
} from './constants';
import { TransactionController } from './controllers/transaction.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';
import { LifecycleRateLimitGuard } from './middleware/rate-limit.guard';

const EXPORTED_TOKENS = [
  LIFECYCLE_CONFIG,
  TRANSACTION_STORE,
  EVENT_DISPATCHER,
  TRANSACTION_STATE_MACHINE,
  TransactionService,
  ConfigurationService,
];

/**
 * Lifecycle Module - Main NestJS Module
 *
 * Wires the store, state machine, event dispatcher and lifecycle service,
 * and mounts the transaction and health controllers
 */
@Global()
@Module({})
export class LifecycleModule {
  /**
   * Configure the lifecycle module synchronously
   */
  static forRoot(config: LifecycleModuleConfig = {}): DynamicModule {
    return {
      module: LifecycleModule,
      providers: [
        {
          provide: LIFECYCLE_CONFIG,
          useValue: mergeLifecycleConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [TransactionController, HealthController],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure the lifecycle module asynchronously
   */
  static forRootAsync(options: LifecycleModuleAsyncConfig): DynamicModule {
    return {
      module: LifecycleModule,
      imports: options.imports || [],
      providers: [
        {
          provide: LIFECYCLE_CONFIG,
          useFactory: async (...args) =>
            mergeLifecycleConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [TransactionController, HealthController],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers derived from the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: TRANSACTION_STORE,
        useFactory: (config: ResolvedLifecycleConfig): TransactionStore => {
          switch (config.storage.type) {
            case 'memory':
              return new InMemoryTransactionStore();

            case 'custom':
              if (!config.storage.store) {
                throw new Error('Custom transaction store not provided');
              }
              return config.storage.store;

            default:
              throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
          }
        },
        inject: [LIFECYCLE_CONFIG],
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: (configuration: ConfigurationService): EventDispatcher => {
          const { events } = configuration.getConfig();
          const dispatcher =
            events.dispatcher ??
            new EventDispatcherImpl(new Logger('EventDispatcher'));

          if (configuration.isEventLoggingEnabled()) {
            const loggingHandler = new LoggingEventHandler(
              new Logger('LifecycleEvents'),
              events.logLevel,
            );
            dispatcher.onAll(loggingHandler.getHandler());
          }

          for (const { eventType, handler } of events.handlers ?? []) {
            dispatcher.on(eventType, handler);
          }

          return dispatcher;
        },
        inject: [ConfigurationService],
      },
      {
        provide: TRANSACTION_STATE_MACHINE,
        useFactory: () => new TransactionStateMachine(),
      },
      {
        provide: RATE_LIMITER,
        useFactory: (config: ResolvedLifecycleConfig) =>
          new RateLimiter({
            maxRequests: config.rateLimit.maxRequests,
            windowMs: config.rateLimit.windowMs,
            strategy: config.rateLimit.strategy,
          }),
        inject: [LIFECYCLE_CONFIG],
      },
      {
        provide: TransactionService,
        useFactory: (
          store: TransactionStore,
          stateMachine: TransactionStateMachine,
          dispatcher: EventDispatcher,
        ) =>
          new TransactionService(store, stateMachine, dispatcher, {
            logger: new Logger(TransactionService.name),
          }),
        inject: [TRANSACTION_STORE, TRANSACTION_STATE_MACHINE, EVENT_DISPATCHER],
      },
      ConfigurationService,
      LifecycleRateLimitGuard,
    ];
  }
}
