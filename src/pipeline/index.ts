/**
 * Analysis Pipeline for Subtrack Lineage
 *
 * Track, location and batch runners.
 */

export * from './track-processor.js';
export * from './location-analyzer.js';
export * from './batch.js';
