import { registerAs } from '@nestjs/config';
import type { EventLogLevel, RateLimitStrategy } from '../core';
import {
  LifecycleModuleConfig,
  defaultLifecycleConfig,
} from '../modules/lifecycle/lifecycle.config';

const EVENT_LOG_LEVELS: readonly EventLogLevel[] = ['minimal', 'normal', 'verbose'];
const RATE_LIMIT_STRATEGIES: readonly RateLimitStrategy[] = [
  'fixed-window',
  'sliding-window',
];

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseOneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  const match = allowed.find((candidate) => candidate === value);
  return match ?? fallback;
}

/**
 * Build the module configuration from environment variables
 */
export function lifecycleConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): LifecycleModuleConfig {
  const defaults = defaultLifecycleConfig;

  return {
    storage: { type: 'memory' },
    events: {
      enableLogging: parseBoolean(
        env.LIFECYCLE_EVENT_LOGGING,
        defaults.events.enableLogging,
      ),
      logLevel: parseOneOf(
        env.LIFECYCLE_EVENT_LOG_LEVEL,
        EVENT_LOG_LEVELS,
        defaults.events.logLevel,
      ),
    },
    rateLimit: {
      enabled: parseBoolean(env.RATE_LIMIT_ENABLED, defaults.rateLimit.enabled),
      maxRequests: parsePositiveInt(
        env.RATE_LIMIT_MAX_REQUESTS,
        defaults.rateLimit.maxRequests,
      ),
      windowMs: parsePositiveInt(
        env.RATE_LIMIT_WINDOW_MS,
        defaults.rateLimit.windowMs,
      ),
      strategy: parseOneOf(
        env.RATE_LIMIT_STRATEGY,
        RATE_LIMIT_STRATEGIES,
        defaults.rateLimit.strategy,
      ),
    },
    api: {
      enableSwagger: parseBoolean(env.SWAGGER_ENABLED, defaults.api.enableSwagger),
    },
  };
}

export default registerAs('lifecycle', () => lifecycleConfigFromEnv());

export const appConfig = registerAs('app', () => ({
  port: parsePositiveInt(process.env.PORT, 4010),
  nodeEnv: process.env.NODE_ENV || 'development',
}));
