/**
 * Edge Types for Subtrack Lineage
 *
 * An edge is a directed temporal link between two spots of the same track.
 * Edges arrive from the tracker as {@link EdgeRecord}s whose measurements may
 * be missing; the loader turns them into {@link MeasuredEdge}s.
 */

import type { SpotId, TrackId } from './spot.js';

/**
 * Edge as read from the tracker's edge table
 */
export interface EdgeRecord {
  readonly sourceId: SpotId;
  readonly targetId: SpotId;
  readonly trackId: TrackId;
  /** Distance between source and target, if exported */
  readonly displacement?: number | undefined;
  /** Displacement per frame elapsed, if exported */
  readonly speed?: number | undefined;
  /** Turning angle against the previous edge per frame elapsed, if exported */
  readonly directionalChangeRate?: number | undefined;
}

/**
 * Edge with every measurement resolved
 */
export interface MeasuredEdge {
  readonly sourceId: SpotId;
  readonly targetId: SpotId;
  readonly trackId: TrackId;
  readonly sourceFrame: number;
  readonly targetFrame: number;
  readonly displacement: number;
  readonly speed: number;
  /** Undefined for edges without a predecessor in their chain */
  readonly directionalChangeRate: number | undefined;
}

/**
 * How an edge relates to the subtrack it is assigned to
 */
export const EdgeKind = {
  /** Both endpoints lie inside the subtrack */
  INTERNAL: 'INTERNAL',
  /** Links a split spot to the first spot of a daughter subtrack */
  DIVISION: 'DIVISION',
} as const;

export type EdgeKindValue = (typeof EdgeKind)[keyof typeof EdgeKind];

/**
 * Stable key for an edge within a track
 */
export function edgeKey(edge: Pick<EdgeRecord, 'sourceId' | 'targetId'>): string {
  return `${edge.sourceId}->${edge.targetId}`;
}
