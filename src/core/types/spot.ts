/**
 * Spot Schema for Subtrack Lineage
 *
 * A spot is one detected object at one timepoint, as exported by the
 * upstream tracker. Spots are immutable once loaded.
 */

/**
 * Spot identifier, unique within a location
 */
export type SpotId = number;

/**
 * Tracker-assigned track identifier
 */
export type TrackId = number;

/**
 * Position in calibrated space. 2D data carries z = 0.
 */
export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Shape descriptors the tracker may export per spot
 */
export const ShapeDescriptor = {
  /** Estimated object radius */
  RADIUS: 'RADIUS',
  /** Area of the segmented contour */
  AREA: 'AREA',
  /** Perimeter of the segmented contour */
  PERIMETER: 'PERIMETER',
  /** 4π·area / perimeter² */
  CIRCULARITY: 'CIRCULARITY',
  /** Major over minor axis of the fitted ellipse */
  ELLIPSE_ASPECTRATIO: 'ELLIPSE_ASPECTRATIO',
  /** Area over convex hull area */
  SOLIDITY: 'SOLIDITY',
} as const;

export type ShapeDescriptorValue = (typeof ShapeDescriptor)[keyof typeof ShapeDescriptor];

/**
 * Canonical output order for shape descriptors
 */
export const SHAPE_DESCRIPTORS: readonly ShapeDescriptorValue[] = Object.values(ShapeDescriptor);

export type ShapeMeasurements = Readonly<Partial<Record<ShapeDescriptorValue, number>>>;

/**
 * Intensity aggregates of one spot in one channel
 */
export interface ChannelIntensity {
  /** 1-based channel number (CH1, CH2, ...) */
  readonly channel: number;
  readonly mean: number;
  readonly median?: number | undefined;
  readonly min?: number | undefined;
  readonly max?: number | undefined;
  readonly total?: number | undefined;
  readonly std?: number | undefined;
}

/**
 * A detected object at one timepoint
 */
export interface Spot {
  /** Unique identifier within the location */
  readonly id: SpotId;

  /** Track this spot was linked into */
  readonly trackId: TrackId;

  /** Frame index (integer timepoint) */
  readonly frame: number;

  /** Spot center */
  readonly position: Position;

  /** Detector quality score, when exported */
  readonly quality?: number | undefined;

  /** Per-channel intensity aggregates, ordered by channel */
  readonly intensities: readonly ChannelIntensity[];

  /** Shape descriptors present in the export */
  readonly shape: ShapeMeasurements;
}

/**
 * Euclidean distance between two positions
 */
export function distanceBetween(a: Position, b: Position): number {
  return Math.hypot(b.x - a.x, b.y - a.y, b.z - a.z);
}
