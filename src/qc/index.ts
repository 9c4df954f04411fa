/**
 * Quality Control for Subtrack Lineage
 *
 * Track admission rules applied before decomposition.
 */

export * from './quality-filter.js';
