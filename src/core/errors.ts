/**
 * Error Taxonomy for Subtrack Lineage
 *
 * Structural anomalies are local to one track: the pipeline records them with
 * the track id and moves on to the next track. Configuration and numeric
 * policy errors are defects in the caller or in this library and propagate.
 */

import type { SpotId, TrackId } from './types/spot.js';

/**
 * Stable error codes, written to run manifests
 */
export const LineageErrorCode = {
  /** Referential or temporal integrity violation in the input tables */
  MALFORMED_TRACK: 'MALFORMED_TRACK',
  /** Track has more than one node without an incoming edge */
  MULTIPLE_ROOTS: 'MULTIPLE_ROOTS',
  /** Track contains a spot with two or more incoming edges */
  UNSUPPORTED_MERGE: 'UNSUPPORTED_MERGE',
  /** QC thresholds or analysis configuration failed validation */
  CONFIGURATION: 'CONFIGURATION',
  /** A non-finite number reached an output table */
  NUMERIC_POLICY: 'NUMERIC_POLICY',
  /** A location's tracker export is missing or unreadable */
  LOCATION_INPUT: 'LOCATION_INPUT',
} as const;

export type LineageErrorCodeValue = (typeof LineageErrorCode)[keyof typeof LineageErrorCode];

/**
 * Codes that abort one track and nothing else
 */
export const TRACK_FAILURE_CODES: readonly LineageErrorCodeValue[] = [
  LineageErrorCode.MALFORMED_TRACK,
  LineageErrorCode.MULTIPLE_ROOTS,
  LineageErrorCode.UNSUPPORTED_MERGE,
];

/**
 * Base class for every error raised by this library
 */
export abstract class LineageError extends Error {
  abstract readonly code: LineageErrorCodeValue;

  /** Track being processed when the error was raised, if any */
  readonly trackId: TrackId | undefined;

  constructor(message: string, trackId?: TrackId) {
    super(message);
    this.name = new.target.name;
    this.trackId = trackId;
  }
}

export class MalformedTrackError extends LineageError {
  readonly code = LineageErrorCode.MALFORMED_TRACK;

  constructor(trackId: TrackId, reason: string) {
    super(`Track ${trackId} is malformed: ${reason}`, trackId);
  }
}

export class MultipleRootsError extends LineageError {
  readonly code = LineageErrorCode.MULTIPLE_ROOTS;
  readonly rootIds: readonly SpotId[];

  constructor(trackId: TrackId, rootIds: readonly SpotId[]) {
    super(
      `Track ${trackId} has ${rootIds.length} root spots (${rootIds.join(', ')}); expected exactly one`,
      trackId
    );
    this.rootIds = rootIds;
  }
}

export class UnsupportedMergeError extends LineageError {
  readonly code = LineageErrorCode.UNSUPPORTED_MERGE;
  readonly spotId: SpotId;
  readonly parentIds: readonly SpotId[];

  constructor(trackId: TrackId, spotId: SpotId, parentIds: readonly SpotId[]) {
    super(
      `Track ${trackId} merges into spot ${spotId} from spots ${parentIds.join(', ')}; merge topologies are not supported`,
      trackId
    );
    this.spotId = spotId;
    this.parentIds = parentIds;
  }
}

export class ConfigurationError extends LineageError {
  readonly code = LineageErrorCode.CONFIGURATION;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class NumericPolicyError extends LineageError {
  readonly code = LineageErrorCode.NUMERIC_POLICY;
  readonly column: string;

  constructor(column: string, value: number) {
    super(`Column ${column} received non-finite value ${String(value)}`);
    this.column = column;
  }
}

export class LocationInputError extends LineageError {
  readonly code = LineageErrorCode.LOCATION_INPUT;
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Cannot read tracking result at ${path}: ${reason}`);
    this.path = path;
  }
}

/**
 * Whether an error aborts a single track rather than the whole run
 */
export function isTrackFailure(error: unknown): error is LineageError {
  return error instanceof LineageError && TRACK_FAILURE_CODES.includes(error.code);
}
