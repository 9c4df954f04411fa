/**
 * Track Graph for Subtrack Lineage
 *
 * Loads one track's spots and edges into a directed temporal graph.
 */

export * from './track-graph.js';
