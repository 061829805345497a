import { Injectable, Inject } from '@nestjs/common';
import type { ResolvedLifecycleConfig } from '../lifecycle.config';
import { LIFECYCLE_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to the resolved lifecycle configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(LIFECYCLE_CONFIG)
    private readonly config: ResolvedLifecycleConfig,
  ) {}

  getConfig(): ResolvedLifecycleConfig {
    return this.config;
  }

  getStorageType(): ResolvedLifecycleConfig['storage']['type'] {
    return this.config.storage.type;
  }

  getRateLimitConfig(): ResolvedLifecycleConfig['rateLimit'] {
    return this.config.rateLimit;
  }

  isRateLimitEnabled(): boolean {
    return this.config.rateLimit.enabled;
  }

  isEventLoggingEnabled(): boolean {
    return this.config.events.enableLogging;
  }

  isSwaggerEnabled(): boolean {
    return this.config.api.enableSwagger;
  }
}
