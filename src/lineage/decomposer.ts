/**
 * Lineage Decomposer
 *
 * Partitions a track into maximal non-branching subtracks and places each
 * one in the track's lineage tree.
 *
 * The traversal is a depth-first work-list rather than language-level
 * recursion, so deeply nested divisions cannot exhaust the call stack. A
 * segment is closed (and numbered) before any of its daughters is opened,
 * which yields pre-order numbering:
 *
 *   Sub_1 ──┬── Sub_2
 *           └── Sub_3 ──┬── Sub_4
 *                       └── Sub_5
 *
 * The split spot is the last spot of the segment that precedes the division.
 * Each daughter starts at the spot following it, reached through a DIVISION
 * edge that is assigned to the daughter.
 */

import { MalformedTrackError, MultipleRootsError, UnsupportedMergeError } from '../core/errors.js';
import type { MeasuredEdge } from '../core/types/edge.js';
import { EdgeKind } from '../core/types/edge.js';
import type { SpotId } from '../core/types/spot.js';
import type { AssignedEdge, LineageDecomposition, SubtrackRecord } from '../core/types/subtrack.js';
import type { TrackGraph, TrackGraphNode } from '../graph/track-graph.js';
import { requireNode } from '../graph/track-graph.js';

/**
 * A segment waiting to be walked
 */
interface PendingSegment {
  readonly seedId: SpotId;
  readonly generation: number;
  readonly parentIndex: number | undefined;
  readonly splitFrame: number | undefined;
  readonly parentPath: readonly number[];
  /** Edge from the parent's split spot into the seed */
  readonly divisionEdge: MeasuredEdge | undefined;
}

/**
 * Find the unique spot without an incoming edge
 *
 * @throws MultipleRootsError when more than one exists
 */
export function findRootSpot(graph: TrackGraph): SpotId {
  const roots = Array.from(graph.nodes.values())
    .filter((node) => node.incoming.length === 0)
    .map((node) => node.spot.id)
    .sort((a, b) => a - b);

  const [root] = roots;
  if (root === undefined) {
    throw new MalformedTrackError(graph.trackId, 'every spot has an incoming edge');
  }
  if (roots.length > 1) {
    throw new MultipleRootsError(graph.trackId, roots);
  }

  return root;
}

function enter(graph: TrackGraph, spotId: SpotId): TrackGraphNode {
  const node = requireNode(graph, spotId);
  if (node.incoming.length > 1) {
    throw new UnsupportedMergeError(
      graph.trackId,
      spotId,
      node.incoming.map((edge) => edge.sourceId)
    );
  }
  return node;
}

function soleSuccessor(node: TrackGraphNode): MeasuredEdge | undefined {
  return node.outgoing.length === 1 ? node.outgoing[0] : undefined;
}

/**
 * Decompose one track into subtracks
 *
 * @throws MultipleRootsError when the track has more than one root spot
 * @throws UnsupportedMergeError when a spot has two or more incoming edges
 * @throws MalformedTrackError when some spots are unreachable from the root
 */
export function decomposeTrack(graph: TrackGraph): LineageDecomposition {
  const rootId = findRootSpot(graph);

  const closed: Omit<SubtrackRecord, 'childIndices'>[] = [];
  const childIndices = new Map<number, number[]>();
  const edges: AssignedEdge[] = [];
  let visitedSpots = 0;

  const stack: PendingSegment[] = [
    {
      seedId: rootId,
      generation: 0,
      parentIndex: undefined,
      splitFrame: undefined,
      parentPath: [],
      divisionEdge: undefined,
    },
  ];

  for (let pending = stack.pop(); pending !== undefined; pending = stack.pop()) {
    const index = closed.length + 1;

    if (pending.divisionEdge) {
      edges.push({ edge: pending.divisionEdge, subtrackIndex: index, kind: EdgeKind.DIVISION });
    }

    let node = enter(graph, pending.seedId);
    const spotIds: SpotId[] = [node.spot.id];

    for (let edge = soleSuccessor(node); edge !== undefined; edge = soleSuccessor(node)) {
      edges.push({ edge, subtrackIndex: index, kind: EdgeKind.INTERNAL });
      node = enter(graph, edge.targetId);
      spotIds.push(node.spot.id);
    }

    visitedSpots += spotIds.length;
    const startFrame = requireNode(graph, pending.seedId).spot.frame;
    const endFrame = node.spot.frame;
    const pathFromRoot = [...pending.parentPath, index];

    closed.push({
      trackId: graph.trackId,
      index,
      spotIds,
      startFrame,
      endFrame,
      generation: pending.generation,
      parentIndex: pending.parentIndex,
      splitFrame: pending.splitFrame,
      pathFromRoot,
    });
    childIndices.set(index, []);

    if (pending.parentIndex !== undefined) {
      childIndices.get(pending.parentIndex)?.push(index);
    }

    // Reverse push so the first daughter in loader order is walked next.
    for (const division of [...node.outgoing].reverse()) {
      stack.push({
        seedId: division.targetId,
        generation: pending.generation + 1,
        parentIndex: index,
        splitFrame: endFrame,
        parentPath: pathFromRoot,
        divisionEdge: division,
      });
    }
  }

  if (visitedSpots !== graph.nodes.size) {
    throw new MalformedTrackError(
      graph.trackId,
      `${graph.nodes.size - visitedSpots} spots are unreachable from root spot ${rootId}`
    );
  }

  return {
    trackId: graph.trackId,
    subtracks: closed.map((record) => ({
      ...record,
      childIndices: childIndices.get(record.index) ?? [],
    })),
    edges,
  };
}

/**
 * Internal edges of one subtrack, in chain order
 */
export function internalEdgesOf(
  decomposition: LineageDecomposition,
  subtrackIndex: number
): MeasuredEdge[] {
  return decomposition.edges
    .filter((assigned) => assigned.subtrackIndex === subtrackIndex && assigned.kind === EdgeKind.INTERNAL)
    .map((assigned) => assigned.edge);
}
