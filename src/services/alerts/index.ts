/**
 * Alerting Module
 *
 * @module services/alerts
 */

export * from './alert-system.js';
export * from './alert-formatter.js';
export * from './rate-limiter.js';
export * from './channels/index.js';
