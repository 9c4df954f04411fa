/**
 * Lineage Decomposition for Subtrack Lineage
 *
 * Provides:
 * - Decomposition: split a track into non-branching subtracks
 * - Reconstruction: rebuild the lineage tree from emitted rows
 */

export * from './decomposer.js';
export * from './lineage-tree.js';
