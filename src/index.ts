export * from './kernel/index.js';
export * from './codec/index.js';
