/**
 * Specification and signature sources
 *
 * @module services/specs
 */

export * from './specification-registry.js';
export * from './json-signature-extractor.js';
