/**
 * Location I/O for Subtrack Lineage
 */

export * from './location-files.js';
export * from './tracker-tables.js';
