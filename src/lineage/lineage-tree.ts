/**
 * Lineage Tree Reconstruction
 *
 * Rebuilds the parent/child structure of one track's subtracks from lineage
 * rows alone. Each row's path from the root names its parent, so no
 * decomposition has to be re-run.
 */

import { MalformedTrackError } from '../core/errors.js';
import type { TrackId } from '../core/types/spot.js';
import { formatSubtrackId } from '../core/types/subtrack.js';

/**
 * Fields of a lineage row the reconstruction reads
 */
export interface LineageTreeInput {
  readonly trackId: TrackId;
  readonly subtrackIndex: number;
  readonly generation: number;
  readonly startFrame: number;
  readonly endFrame: number;
  readonly pathFromRoot: readonly number[];
}

/**
 * One subtrack in a reconstructed tree
 */
export interface LineageTreeNode {
  readonly subtrackId: string;
  readonly subtrackIndex: number;
  readonly generation: number;
  readonly startFrame: number;
  readonly endFrame: number;
  /** Ordered by subtrack index */
  readonly children: readonly LineageTreeNode[];
}

/**
 * Reconstructed lineage tree of one track
 */
export interface LineageTree {
  readonly trackId: TrackId;
  readonly root: LineageTreeNode;
  readonly size: number;
  readonly maxGeneration: number;
  /** Subtracks without daughters, in pre-order */
  readonly leaves: readonly LineageTreeNode[];
}

interface MutableTreeNode {
  readonly row: LineageTreeInput;
  readonly children: MutableTreeNode[];
}

function freeze(node: MutableTreeNode): LineageTreeNode {
  return {
    subtrackId: formatSubtrackId(node.row.trackId, node.row.subtrackIndex),
    subtrackIndex: node.row.subtrackIndex,
    generation: node.row.generation,
    startFrame: node.row.startFrame,
    endFrame: node.row.endFrame,
    children: [...node.children]
      .sort((a, b) => a.row.subtrackIndex - b.row.subtrackIndex)
      .map(freeze),
  };
}

/**
 * Build the lineage tree of one track
 *
 * @throws Error when there are no rows
 * @throws MalformedTrackError when rows disagree on track, repeat an index,
 * carry an inconsistent path or generation, or do not form a single tree
 */
export function buildLineageTree(rows: readonly LineageTreeInput[]): LineageTree {
  const [first] = rows;
  if (!first) {
    throw new Error('No lineage rows to rebuild');
  }
  const trackId = first.trackId;

  const byIndex = new Map<number, MutableTreeNode>();
  for (const row of rows) {
    if (row.trackId !== trackId) {
      throw new MalformedTrackError(trackId, `lineage rows mix tracks ${trackId} and ${row.trackId}`);
    }
    if (byIndex.has(row.subtrackIndex)) {
      throw new MalformedTrackError(trackId, `subtrack index ${row.subtrackIndex} repeats`);
    }
    if (row.pathFromRoot[row.pathFromRoot.length - 1] !== row.subtrackIndex) {
      throw new MalformedTrackError(
        trackId,
        `path of subtrack ${row.subtrackIndex} does not end at itself`
      );
    }
    if (row.generation !== row.pathFromRoot.length - 1) {
      throw new MalformedTrackError(
        trackId,
        `subtrack ${row.subtrackIndex} has generation ${row.generation} but a path of length ${row.pathFromRoot.length}`
      );
    }
    byIndex.set(row.subtrackIndex, { row, children: [] });
  }

  let root: MutableTreeNode | undefined;
  for (const node of byIndex.values()) {
    const parentIndex = node.row.pathFromRoot[node.row.pathFromRoot.length - 2];
    if (parentIndex === undefined) {
      if (root) {
        throw new MalformedTrackError(trackId, 'more than one generation-0 subtrack');
      }
      root = node;
      continue;
    }

    const parent = byIndex.get(parentIndex);
    if (!parent) {
      throw new MalformedTrackError(
        trackId,
        `subtrack ${node.row.subtrackIndex} names missing parent ${parentIndex}`
      );
    }
    parent.children.push(node);
  }

  if (!root) {
    throw new MalformedTrackError(trackId, 'no generation-0 subtrack');
  }

  const frozen = freeze(root);
  const leaves: LineageTreeNode[] = [];
  let size = 0;
  let maxGeneration = 0;

  const pending: LineageTreeNode[] = [frozen];
  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    size++;
    maxGeneration = Math.max(maxGeneration, node.generation);
    if (node.children.length === 0) {
      leaves.push(node);
    }
    pending.push(...[...node.children].reverse());
  }

  if (size !== byIndex.size) {
    throw new MalformedTrackError(trackId, `${byIndex.size - size} subtracks are detached from the root`);
  }

  return { trackId, root: frozen, size, maxGeneration, leaves };
}

/**
 * Render a tree as indented text, one subtrack per line
 */
export function renderLineageTree(tree: LineageTree): string {
  const lines: string[] = [];
  const pending: LineageTreeNode[] = [tree.root];

  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    lines.push(
      `${'  '.repeat(node.generation)}${node.subtrackId} [${node.startFrame}-${node.endFrame}]`
    );
    pending.push(...[...node.children].reverse());
  }

  return lines.join('\n');
}
