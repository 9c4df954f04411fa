/**
 * Table Emitter for Subtrack Lineage
 */

export * from './csv.js';
export * from './tables.js';
