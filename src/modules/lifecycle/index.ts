/**
 * Lifecycle NestJS Module
 *
 * Main module for integrating the transaction lifecycle into NestJS applications
 */

// Main module
export { LifecycleModule } from './lifecycle.module';

// Configuration
export {
  defaultLifecycleConfig,
  mergeLifecycleConfig,
} from './lifecycle.config';
export type {
  LifecycleModuleConfig,
  LifecycleModuleAsyncConfig,
  ResolvedLifecycleConfig,
} from './lifecycle.config';

// Injection tokens
export * from './constants';

// Controllers
export { TransactionController } from './controllers/transaction.controller';
export { HealthController } from './controllers/health.controller';

// Services
export { ConfigurationService } from './services/configuration.service';

// Error mapping
export {
  TransactionExceptionFilter,
  errorCodeToStatus,
} from './filters/transaction-exception.filter';
export type { TransactionErrorBody } from './filters/transaction-exception.filter';

// Rate limiting
export { LifecycleRateLimitGuard, clientKey } from './middleware/rate-limit.guard';
