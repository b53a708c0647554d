/**
 * Expansion core barrel export
 */

export * from './diagnostics';
export * from './environment-builder';
export * from './role-resolver';
export * from './network-interfaces';
export * from './profile-synthesizer';
export * from './hostname-distributor';
export * from './assembler';
