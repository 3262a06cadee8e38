// Export storage services

export * from './alert-store.js';
export * from './cache.js';
export * from './serial-lock.js';
