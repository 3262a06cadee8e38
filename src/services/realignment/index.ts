/**
 * Realignment Module
 *
 * @module services/realignment
 */

export * from './realignment-engine.js';
export * from './report-context.js';
