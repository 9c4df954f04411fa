/**
 * Core Module for Subtrack Lineage
 *
 * Data model, error taxonomy, configuration, logging, frame arithmetic and
 * content digests.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './config/analysis-config.js';
export * from './logging/logger.js';
export * from './time/frames.js';
export * from './identity/content-digest.js';
