/**
 * Monitoring Module
 *
 * @module services/monitor
 */

export * from './continuous-monitor.js';
export * from './change-queue.js';
export * from './change-source.js';
export * from './resource-probe.js';
