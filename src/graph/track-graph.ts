/**
 * Track Graph Loader
 *
 * Builds the directed temporal graph of one track from its spot and edge
 * tables. Construction is pure: inputs are never mutated and the returned
 * graph is read-only.
 *
 * Outgoing edges of every node are ordered by target frame, then by target
 * spot id, which fixes the order in which daughter branches are visited.
 */

import { MalformedTrackError } from '../core/errors.js';
import { frameRangeOf, frameSpan, framesElapsed, isValidFrame } from '../core/time/frames.js';
import type { EdgeRecord, MeasuredEdge } from '../core/types/edge.js';
import { edgeKey } from '../core/types/edge.js';
import type { Position, Spot, SpotId, TrackId } from '../core/types/spot.js';
import { distanceBetween } from '../core/types/spot.js';

/**
 * A spot with its incident edges
 */
export interface TrackGraphNode {
  readonly spot: Spot;
  /** Ordered by target frame, then target spot id */
  readonly outgoing: readonly MeasuredEdge[];
  /** Ordered by source spot id */
  readonly incoming: readonly MeasuredEdge[];
}

/**
 * In-memory graph of one track
 */
export interface TrackGraph {
  readonly trackId: TrackId;
  readonly nodes: ReadonlyMap<SpotId, TrackGraphNode>;
  /** All edges ordered by source frame, source id, target frame, target id */
  readonly edges: readonly MeasuredEdge[];
}

/**
 * Track-level summary used by quality control
 */
export interface TrackSummary {
  readonly trackId: TrackId;
  /** Spots with two or more outgoing edges */
  readonly splitCount: number;
  /** Spots with two or more incoming edges */
  readonly mergeCount: number;
  readonly startFrame: number;
  readonly stopFrame: number;
  /** stopFrame - startFrame + 1 */
  readonly durationFrames: number;
  readonly spotCount: number;
  readonly edgeCount: number;
}

interface RawLink {
  readonly record: EdgeRecord;
  readonly source: Spot;
  readonly target: Spot;
}

function finiteOrUndefined(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

function compareLinks(a: RawLink, b: RawLink): number {
  return (
    a.source.frame - b.source.frame ||
    a.source.id - b.source.id ||
    a.target.frame - b.target.frame ||
    a.target.id - b.target.id
  );
}

function vectorBetween(from: Position, to: Position): Position {
  return { x: to.x - from.x, y: to.y - from.y, z: to.z - from.z };
}

/**
 * Unsigned angle between two vectors, in radians; undefined when either has zero length
 */
export function turningAngle(a: Position, b: Position): number | undefined {
  const dot = a.x * b.x + a.y * b.y + a.z * b.z;
  const cross = Math.hypot(a.y * b.z - a.z * b.y, a.z * b.x - a.x * b.z, a.x * b.y - a.y * b.x);

  if (Math.hypot(a.x, a.y, a.z) === 0 || Math.hypot(b.x, b.y, b.z) === 0) {
    return undefined;
  }

  return Math.atan2(cross, dot);
}

/**
 * Resolve an edge's measurements, deriving the ones the tracker did not export
 */
function measureLink(link: RawLink, predecessor: RawLink | undefined): MeasuredEdge {
  const elapsed = framesElapsed(link.source.frame, link.target.frame);
  const displacement =
    finiteOrUndefined(link.record.displacement) ??
    distanceBetween(link.source.position, link.target.position);
  const speed = finiteOrUndefined(link.record.speed) ?? displacement / elapsed;

  let directionalChangeRate = finiteOrUndefined(link.record.directionalChangeRate);
  if (directionalChangeRate === undefined && predecessor !== undefined) {
    const angle = turningAngle(
      vectorBetween(predecessor.source.position, predecessor.target.position),
      vectorBetween(link.source.position, link.target.position)
    );
    directionalChangeRate = angle === undefined ? undefined : angle / elapsed;
  }

  return {
    sourceId: link.source.id,
    targetId: link.target.id,
    trackId: link.record.trackId,
    sourceFrame: link.source.frame,
    targetFrame: link.target.frame,
    displacement,
    speed,
    directionalChangeRate,
  };
}

function assertAcyclic(
  trackId: TrackId,
  spotIds: readonly SpotId[],
  links: readonly RawLink[]
): void {
  const inDegree = new Map<SpotId, number>(spotIds.map((id) => [id, 0]));
  const successors = new Map<SpotId, SpotId[]>();

  for (const link of links) {
    inDegree.set(link.target.id, (inDegree.get(link.target.id) ?? 0) + 1);
    const list = successors.get(link.source.id) ?? [];
    list.push(link.target.id);
    successors.set(link.source.id, list);
  }

  const ready = spotIds.filter((id) => inDegree.get(id) === 0);
  let visited = 0;

  for (let id = ready.pop(); id !== undefined; id = ready.pop()) {
    visited++;
    for (const next of successors.get(id) ?? []) {
      const remaining = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, remaining);
      if (remaining === 0) {
        ready.push(next);
      }
    }
  }

  if (visited !== spotIds.length) {
    throw new MalformedTrackError(trackId, 'edges form a cycle');
  }
}

/**
 * Build the graph of one track
 *
 * @throws MalformedTrackError when an edge references an unknown spot, belongs
 * to another track, repeats, does not advance in time, or when the graph has a cycle
 */
export function loadTrackGraph(
  trackId: TrackId,
  spots: readonly Spot[],
  edges: readonly EdgeRecord[]
): TrackGraph {
  if (spots.length === 0) {
    throw new MalformedTrackError(trackId, 'track has no spots');
  }

  const spotsById = new Map<SpotId, Spot>();
  for (const spot of spots) {
    if (spot.trackId !== trackId) {
      throw new MalformedTrackError(trackId, `spot ${spot.id} belongs to track ${spot.trackId}`);
    }
    if (!isValidFrame(spot.frame)) {
      throw new MalformedTrackError(trackId, `spot ${spot.id} has invalid frame ${spot.frame}`);
    }
    if (spotsById.has(spot.id)) {
      throw new MalformedTrackError(trackId, `spot ${spot.id} appears more than once`);
    }
    spotsById.set(spot.id, spot);
  }

  const seen = new Set<string>();
  const links: RawLink[] = [];

  for (const record of edges) {
    const key = edgeKey(record);
    if (record.trackId !== trackId) {
      throw new MalformedTrackError(trackId, `edge ${key} belongs to track ${record.trackId}`);
    }
    if (record.sourceId === record.targetId) {
      throw new MalformedTrackError(trackId, `edge ${key} is a self-loop`);
    }
    if (seen.has(key)) {
      throw new MalformedTrackError(trackId, `edge ${key} appears more than once`);
    }
    seen.add(key);

    const source = spotsById.get(record.sourceId);
    const target = spotsById.get(record.targetId);
    if (!source) {
      throw new MalformedTrackError(trackId, `edge ${key} references unknown spot ${record.sourceId}`);
    }
    if (!target) {
      throw new MalformedTrackError(trackId, `edge ${key} references unknown spot ${record.targetId}`);
    }

    links.push({ record, source, target });
  }

  assertAcyclic(trackId, Array.from(spotsById.keys()), links);

  for (const { record, source, target } of links) {
    if (target.frame <= source.frame) {
      throw new MalformedTrackError(
        trackId,
        `edge ${edgeKey(record)} goes from frame ${source.frame} to frame ${target.frame}`
      );
    }
  }

  links.sort(compareLinks);

  const incomingLinks = new Map<SpotId, RawLink[]>();
  for (const link of links) {
    const list = incomingLinks.get(link.target.id) ?? [];
    list.push(link);
    incomingLinks.set(link.target.id, list);
  }

  const measured = links.map((link) => {
    const predecessors = incomingLinks.get(link.source.id) ?? [];
    return measureLink(link, predecessors.length === 1 ? predecessors[0] : undefined);
  });

  const outgoing = new Map<SpotId, MeasuredEdge[]>();
  const incoming = new Map<SpotId, MeasuredEdge[]>();
  for (const edge of measured) {
    outgoing.set(edge.sourceId, [...(outgoing.get(edge.sourceId) ?? []), edge]);
    incoming.set(edge.targetId, [...(incoming.get(edge.targetId) ?? []), edge]);
  }

  const nodes = new Map<SpotId, TrackGraphNode>();
  for (const spot of spotsById.values()) {
    nodes.set(spot.id, {
      spot,
      outgoing: (outgoing.get(spot.id) ?? []).sort(
        (a, b) => a.targetFrame - b.targetFrame || a.targetId - b.targetId
      ),
      incoming: (incoming.get(spot.id) ?? []).sort((a, b) => a.sourceId - b.sourceId),
    });
  }

  return { trackId, nodes, edges: measured };
}

/**
 * Compute the summary statistics quality control needs
 */
export function summarizeTrack(graph: TrackGraph): TrackSummary {
  let splitCount = 0;
  let mergeCount = 0;

  for (const node of graph.nodes.values()) {
    if (node.outgoing.length >= 2) splitCount++;
    if (node.incoming.length >= 2) mergeCount++;
  }

  const range = frameRangeOf(Array.from(graph.nodes.values(), (node) => node.spot.frame));
  if (!range) {
    throw new MalformedTrackError(graph.trackId, 'track has no spots');
  }

  return {
    trackId: graph.trackId,
    splitCount,
    mergeCount,
    startFrame: range.start,
    stopFrame: range.stop,
    durationFrames: frameSpan(range),
    spotCount: graph.nodes.size,
    edgeCount: graph.edges.length,
  };
}

/**
 * Get a node or fail the track
 */
export function requireNode(graph: TrackGraph, spotId: SpotId): TrackGraphNode {
  const node = graph.nodes.get(spotId);
  if (!node) {
    throw new MalformedTrackError(graph.trackId, `spot ${spotId} is not part of the track`);
  }
  return node;
}
