/**
 * Types barrel export
 */

export * from './result';
export * from './cloud';
