import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  CreateTransactionDto,
  RefundTransactionDto,
  defaultLifecycleConfig,
  mergeLifecycleConfig,
} from '../../src';
import {
  lifecycleConfigFromEnv,
  parseBoolean,
  parseOneOf,
  parsePositiveInt,
} from '../../src/config/env.config';

describe('Environment configuration', () => {
  it('should fall back to defaults with an empty environment', () => {
    expect(lifecycleConfigFromEnv({})).toEqual({
      storage: { type: 'memory' },
      events: { enableLogging: true, logLevel: 'normal' },
      rateLimit: {
        enabled: true,
        maxRequests: 100,
        windowMs: 60000,
        strategy: 'fixed-window',
      },
      api: { enableSwagger: true },
    });
  });

  it('should read overrides and ignore malformed values', () => {
    const config = lifecycleConfigFromEnv({
      LIFECYCLE_EVENT_LOGGING: 'false',
      LIFECYCLE_EVENT_LOG_LEVEL: 'verbose',
      RATE_LIMIT_ENABLED: 'yes',
      RATE_LIMIT_MAX_REQUESTS: '5',
      RATE_LIMIT_WINDOW_MS: 'abc',
      RATE_LIMIT_STRATEGY: 'sliding-window',
      SWAGGER_ENABLED: '0',
    });

    expect(config.events).toEqual({ enableLogging: false, logLevel: 'verbose' });
    expect(config.rateLimit).toEqual({
      enabled: true,
      maxRequests: 5,
      windowMs: 60000,
      strategy: 'sliding-window',
    });
    expect(config.api).toEqual({ enableSwagger: false });
  });

  it('should parse primitive values', () => {
    expect(parseBoolean(' ON ', false)).toBe(true);
    expect(parseBoolean('', true)).toBe(true);
    expect(parseBoolean('nope', true)).toBe(false);
    expect(parsePositiveInt('-3', 7)).toBe(7);
    expect(parsePositiveInt('12', 7)).toBe(12);
    expect(parseOneOf('loud', ['minimal', 'normal'], 'normal')).toBe('normal');
  });
});

describe('mergeLifecycleConfig', () => {
  it('should return the defaults when nothing is given', () => {
    expect(mergeLifecycleConfig()).toEqual(defaultLifecycleConfig);
  });

  it('should merge each section over the defaults', () => {
    const merged = mergeLifecycleConfig({
      events: { logLevel: 'minimal' },
      rateLimit: { maxRequests: 10 },
    });

    expect(merged.events).toEqual({ enableLogging: true, logLevel: 'minimal' });
    expect(merged.rateLimit).toEqual({
      enabled: true,
      maxRequests: 10,
      windowMs: 60000,
      strategy: 'fixed-window',
    });
    expect(merged.storage).toEqual({ type: 'memory' });
  });
});

describe('Request DTO validation', () => {
  it('should accept a well formed create request', () => {
    const dto = plainToInstance(CreateTransactionDto, { ownerId: 'u1', amount: 100 });

    expect(validateSync(dto)).toHaveLength(0);
  });

  it('should reject an empty owner and non-positive amount', () => {
    const dto = plainToInstance(CreateTransactionDto, { ownerId: '', amount: 0 });

    expect(
      validateSync(dto)
        .map((error) => error.property)
        .sort(),
    ).toEqual(['amount', 'ownerId']);
  });

  it('should reject a negative refund amount', () => {
    const dto = plainToInstance(RefundTransactionDto, { amount: -5 });
    const errors = validateSync(dto);

    expect(errors).toHaveLength(1);
    expect(Object.keys(errors[0].constraints ?? {})).toContain('isPositive');
  });
});
