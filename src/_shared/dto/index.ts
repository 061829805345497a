/**
 * Centralized DTOs for the lifecycle API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './transaction.dto';
