/**
 * Drift Detection Module
 *
 * Classifies deviations between extracted code signatures and
 * normalized specifications.
 *
 * @module services/drift
 */

export * from './drift-detector.js';
export * from './baseline-store.js';
export * from './signatures.js';
