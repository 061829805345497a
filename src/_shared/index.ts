/**
 * Shared Resources
 *
 * Centralized exports for components used across the HTTP layer
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger';
