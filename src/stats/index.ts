/**
 * Kinematic Statistics for Subtrack Lineage
 */

export * from './descriptive.js';
export * from './kinematics.js';
