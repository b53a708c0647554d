/**
 * Schema validation exports
 * Centralized validation for the pillar input trees
 */

export * from './providers.schema';
export * from './servers.schema';
export * from './defaults.schema';
export * from './validation';
