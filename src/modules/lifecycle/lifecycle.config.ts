import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import {
  EventDispatcher,
  EventHandler,
  EventLogLevel,
  RateLimitStrategy,
  TransactionEventType,
  TransactionStore,
} from '../../core';

/**
 * Lifecycle Module Configuration
 */
export interface LifecycleModuleConfig {
  /**
   * Storage configuration
   */
  storage?: {
    type: 'memory' | 'custom';
    store?: TransactionStore;
  };

  /**
   * Event configuration
   */
  events?: {
    dispatcher?: EventDispatcher;
    enableLogging?: boolean;
    logLevel?: EventLogLevel;
    handlers?: Array<{
      eventType: TransactionEventType;
      handler: EventHandler;
    }>;
  };

  /**
   * Request rate limiting for the HTTP API
   */
  rateLimit?: {
    enabled?: boolean;
    maxRequests?: number;
    windowMs?: number;
    strategy?: RateLimitStrategy;
  };

  /**
   * API configuration
   */
  api?: {
    enableSwagger?: boolean;
  };
}

/**
 * Configuration with every default filled in
 */
export interface ResolvedLifecycleConfig {
  storage: NonNullable<LifecycleModuleConfig['storage']>;
  events: NonNullable<LifecycleModuleConfig['events']> & {
    enableLogging: boolean;
    logLevel: EventLogLevel;
  };
  rateLimit: {
    enabled: boolean;
    maxRequests: number;
    windowMs: number;
    strategy: RateLimitStrategy;
  };
  api: {
    enableSwagger: boolean;
  };
}

/**
 * Async configuration factory
 */
export interface LifecycleModuleAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<LifecycleModuleConfig>['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultLifecycleConfig: ResolvedLifecycleConfig = {
  storage: {
    type: 'memory',
  },
  events: {
    enableLogging: true,
    logLevel: 'normal',
  },
  rateLimit: {
    enabled: true,
    maxRequests: 100,
    windowMs: 60000,
    strategy: 'fixed-window',
  },
  api: {
    enableSwagger: true,
  },
};

/**
 * Merge a partial configuration over the defaults, section by section
 */
export function mergeLifecycleConfig(
  config: LifecycleModuleConfig = {},
): ResolvedLifecycleConfig {
  return {
    storage: config.storage ?? defaultLifecycleConfig.storage,
    events: { ...defaultLifecycleConfig.events, ...config.events },
    rateLimit: { ...defaultLifecycleConfig.rateLimit, ...config.rateLimit },
    api: { ...defaultLifecycleConfig.api, ...config.api },
  };
}
