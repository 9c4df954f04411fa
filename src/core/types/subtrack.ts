/**
 * Subtrack and Lineage Types
 *
 * A subtrack is a maximal non-branching segment of a track. The split spot
 * closes the segment that precedes the division; each daughter segment starts
 * at the spot following it.
 */

import type { EdgeKindValue, MeasuredEdge } from './edge.js';
import type { SpotId, TrackId } from './spot.js';

/**
 * One decomposed segment of a track
 */
export interface SubtrackRecord {
  /** Track the segment belongs to */
  readonly trackId: TrackId;

  /** 1-based pre-order ordinal within the track */
  readonly index: number;

  /** Spots of the segment, in frame order */
  readonly spotIds: readonly SpotId[];

  readonly startFrame: number;
  readonly endFrame: number;

  /** Number of divisions crossed from the root segment */
  readonly generation: number;

  /** Index of the segment that divided into this one */
  readonly parentIndex?: number | undefined;

  /** Closing frame of the parent segment */
  readonly splitFrame?: number | undefined;

  /** Daughter segment indices, in traversal order */
  readonly childIndices: readonly number[];

  /** Indices from the generation-0 segment down to this one */
  readonly pathFromRoot: readonly number[];
}

/**
 * An input edge together with the subtrack it was assigned to
 */
export interface AssignedEdge {
  readonly edge: MeasuredEdge;
  readonly subtrackIndex: number;
  readonly kind: EdgeKindValue;
}

/**
 * Result of decomposing one track
 */
export interface LineageDecomposition {
  readonly trackId: TrackId;
  /** Segments in pre-order */
  readonly subtracks: readonly SubtrackRecord[];
  /** Every track edge, grouped by subtrack in pre-order */
  readonly edges: readonly AssignedEdge[];
}

/**
 * Externally visible subtrack identifier
 */
export function formatSubtrackId(trackId: TrackId, index: number): string {
  return `Track_${trackId}_Sub_${index}`;
}

/**
 * Separator used when serializing a path from the root
 */
export const LINEAGE_PATH_SEPARATOR = '>';

export function formatLineagePath(path: readonly number[]): string {
  return path.join(LINEAGE_PATH_SEPARATOR);
}

/**
 * Parse a serialized path; returns null when any segment is not a positive integer
 */
export function parseLineagePath(text: string): number[] | null {
  if (text.trim() === '') {
    return null;
  }

  const indices = text.split(LINEAGE_PATH_SEPARATOR).map((part) => Number(part.trim()));
  if (indices.some((index) => !Number.isInteger(index) || index < 1)) {
    return null;
  }

  return indices;
}
