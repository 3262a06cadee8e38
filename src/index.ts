// driftwatch public API

export * from './models/index.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/async.js';
export * from './core/fingerprint.js';
export * from './core/path-matcher.js';
export * from './core/schemas.js';
export * from './core/validation.js';
export * from './services/index.js';
