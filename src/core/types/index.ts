export * from './spot.js';
export * from './edge.js';
export * from './subtrack.js';
