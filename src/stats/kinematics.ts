/**
 * Kinematic Statistics Engine
 *
 * Computes per-subtrack motility metrics from the subtrack's spots and its
 * INTERNAL edges. Division edges belong to the daughter's lineage record but
 * are not part of its motion.
 *
 * Numeric policy:
 * - speed statistics are undefined for a subtrack without edges
 * - confinement, linearity and outreach ratios are 0 when total distance is 0
 * - tortuosity is undefined when net displacement is 0
 * - mean directional change rate is undefined below two edges
 *
 * Undefined is written as an empty cell; NaN and Infinity never leave here.
 */

import { frameSpan } from '../core/time/frames.js';
import type { MeasuredEdge } from '../core/types/edge.js';
import type { ShapeDescriptorValue, ShapeMeasurements, Spot } from '../core/types/spot.js';
import { SHAPE_DESCRIPTORS, distanceBetween } from '../core/types/spot.js';
import type { SubtrackRecord } from '../core/types/subtrack.js';
import { formatSubtrackId } from '../core/types/subtrack.js';
import { maximum, mean, safeRatio, sum, summarizeValues } from './descriptive.js';

/**
 * Metrics of one subtrack
 */
export interface SubtrackStatistics {
  readonly subtrackId: string;
  readonly trackId: number;
  readonly subtrackIndex: number;
  readonly generation: number;
  readonly startFrame: number;
  readonly endFrame: number;
  readonly numberSpots: number;
  readonly numberEdges: number;

  /** endFrame - startFrame + 1 */
  readonly duration: number;
  /** Distance between first and last spot */
  readonly netDisplacement: number;
  /** Sum of per-edge displacements */
  readonly totalDistance: number;
  /** Farthest any spot got from the first spot */
  readonly maxDistance: number;

  readonly meanSpeed: number | undefined;
  readonly minSpeed: number | undefined;
  readonly maxSpeed: number | undefined;
  readonly medianSpeed: number | undefined;
  readonly stdSpeed: number | undefined;

  readonly confinementRatio: number;
  /** Same quantity as confinementRatio, kept as a separate output column */
  readonly linearityOfForwardProgression: number;
  readonly meanStraightLineSpeed: number;
  readonly meanDirectionalChangeRate: number | undefined;
  readonly outreachRatio: number;
  readonly tortuosity: number | undefined;

  readonly meanX: number;
  readonly meanY: number;
  readonly meanZ: number;
  readonly startX: number;
  readonly startY: number;
  readonly endX: number;
  readonly endY: number;

  readonly meanQuality: number | undefined;
  /** Channel number to mean of the spots' mean intensity */
  readonly meanIntensityByChannel: ReadonlyMap<number, number>;
  readonly meanShape: ShapeMeasurements;
}

function definedValues(values: readonly (number | undefined)[]): number[] {
  return values.filter((value): value is number => value !== undefined && Number.isFinite(value));
}

function meanIntensities(spots: readonly Spot[]): Map<number, number> {
  const byChannel = new Map<number, number[]>();
  for (const spot of spots) {
    for (const intensity of spot.intensities) {
      if (!Number.isFinite(intensity.mean)) continue;
      const list = byChannel.get(intensity.channel) ?? [];
      list.push(intensity.mean);
      byChannel.set(intensity.channel, list);
    }
  }

  const result = new Map<number, number>();
  for (const channel of Array.from(byChannel.keys()).sort((a, b) => a - b)) {
    const value = mean(byChannel.get(channel) ?? []);
    if (value !== undefined) result.set(channel, value);
  }
  return result;
}

function meanShape(spots: readonly Spot[]): ShapeMeasurements {
  const result: Partial<Record<ShapeDescriptorValue, number>> = {};
  for (const descriptor of SHAPE_DESCRIPTORS) {
    const value = mean(definedValues(spots.map((spot) => spot.shape[descriptor])));
    if (value !== undefined) result[descriptor] = value;
  }
  return result;
}

/**
 * Compute the metrics of one subtrack
 *
 * @param spots - the subtrack's spots, in the order of `subtrack.spotIds`
 * @param internalEdges - edges whose endpoints both lie in the subtrack
 */
export function computeSubtrackStatistics(
  subtrack: SubtrackRecord,
  spots: readonly Spot[],
  internalEdges: readonly MeasuredEdge[]
): SubtrackStatistics {
  const first = spots[0];
  const last = spots[spots.length - 1];
  if (!first || !last || spots.length !== subtrack.spotIds.length) {
    throw new Error(
      `Subtrack ${formatSubtrackId(subtrack.trackId, subtrack.index)} needs ${subtrack.spotIds.length} spots, got ${spots.length}`
    );
  }

  const netDisplacement = distanceBetween(first.position, last.position);
  const totalDistance = sum(internalEdges.map((edge) => edge.displacement));
  const maxDistance = maximum(spots.map((spot) => distanceBetween(first.position, spot.position))) ?? 0;
  const duration = frameSpan({ start: subtrack.startFrame, stop: subtrack.endFrame });

  const speeds = summarizeValues(internalEdges.map((edge) => edge.speed));
  const confinementRatio = safeRatio(netDisplacement, totalDistance, 0);

  const turning = definedValues(internalEdges.map((edge) => edge.directionalChangeRate));
  const meanDirectionalChangeRate = internalEdges.length >= 2 ? mean(turning) : undefined;

  return {
    subtrackId: formatSubtrackId(subtrack.trackId, subtrack.index),
    trackId: subtrack.trackId,
    subtrackIndex: subtrack.index,
    generation: subtrack.generation,
    startFrame: subtrack.startFrame,
    endFrame: subtrack.endFrame,
    numberSpots: spots.length,
    numberEdges: internalEdges.length,

    duration,
    netDisplacement,
    totalDistance,
    maxDistance,

    meanSpeed: speeds?.mean,
    minSpeed: speeds?.min,
    maxSpeed: speeds?.max,
    medianSpeed: speeds?.median,
    stdSpeed: speeds?.std,

    confinementRatio,
    linearityOfForwardProgression: confinementRatio,
    meanStraightLineSpeed: netDisplacement / duration,
    meanDirectionalChangeRate,
    outreachRatio: safeRatio(maxDistance, totalDistance, 0),
    tortuosity: safeRatio(totalDistance, netDisplacement, undefined),

    meanX: mean(spots.map((spot) => spot.position.x)) ?? first.position.x,
    meanY: mean(spots.map((spot) => spot.position.y)) ?? first.position.y,
    meanZ: mean(spots.map((spot) => spot.position.z)) ?? first.position.z,
    startX: first.position.x,
    startY: first.position.y,
    endX: last.position.x,
    endY: last.position.y,

    meanQuality: mean(definedValues(spots.map((spot) => spot.quality))),
    meanIntensityByChannel: meanIntensities(spots),
    meanShape: meanShape(spots),
  };
}
