// Export all models

export * from './types.js';
export * from './specification.js';
export * from './drift.js';
export * from './alert.js';
export * from './suggestion.js';
export * from './monitor.js';
