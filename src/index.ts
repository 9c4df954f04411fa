/**
 * Subtrack Lineage
 *
 * Decomposes branching cell tracks into non-branching subtracks, measures
 * each one and emits statistics, edge and lineage tables.
 *
 * @packageDocumentation
 */

// Data model, errors, configuration, logging
export * from './core/index.js';

// Track graph loader exports
export * from './graph/index.js';

// Quality-control exports
export * from './qc/index.js';

// Lineage decomposition and tree reconstruction exports
export * from './lineage/index.js';

// Kinematic statistics exports
export * from './stats/index.js';

// Table emitter exports
export * from './emit/index.js';

// Tracker export I/O
export * from './io/index.js';

// Track, location and batch runners
export * from './pipeline/index.js';

/**
 * Version
 */
export const VERSION = '0.1.0';
