/**
 * Shared utilities for shelf services.
 */

export * from './constants';
export * from './logger';
