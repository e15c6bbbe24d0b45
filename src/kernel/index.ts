export * from './types.js';
export * from './codec-error.js';
export * from './constraint.js';
export * from './zone-config.js';
