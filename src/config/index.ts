/**
 * Configuration Module
 *
 * Exports all configuration constants, schemas and loaders.
 */

export * from './constants';
export * from './schemas';
export * from './loader';
