/**
 * NestJS integration for the transaction lifecycle
 */

export * from './lifecycle';
