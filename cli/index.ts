/**
 * CLI Tools for Subtrack Lineage
 *
 * Provides:
 * - Lineage CLI: location and batch analysis, lineage tree printing
 */

export * from './analyze.js';
