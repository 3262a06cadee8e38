// Export all services

export * from './config/config-service.js';
export * from './storage/index.js';
export * from './specs/index.js';
export * from './drift/index.js';
export * from './alerts/index.js';
export * from './realignment/index.js';
export * from './monitor/index.js';
