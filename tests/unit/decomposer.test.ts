import { describe, it, expect } from '@jest/globals';
import { MultipleRootsError, UnsupportedMergeError } from '../../src/core/errors.js';
import { EdgeKind } from '../../src/core/types/edge.js';
import { loadTrackGraph } from '../../src/graph/track-graph.js';
import { decomposeTrack, findRootSpot, internalEdgesOf } from '../../src/lineage/decomposer.js';
import type { BuiltTrack } from '../helpers/track-builder.js';
import { TrackBuilder, straightTrack, twoLevelDivision } from '../helpers/track-builder.js';

const decompose = ({ trackId, spots, edges }: BuiltTrack) => decomposeTrack(loadTrackGraph(trackId, spots, edges));

describe('Lineage Decomposer', () => {
  it('should keep a non-dividing track as one subtrack', () => {
    const decomposition = decompose(straightTrack(3, 10, 5));

    expect(decomposition.subtracks).toEqual([
      {
        trackId: 3,
        index: 1,
        spotIds: [10, 11, 12, 13, 14],
        startFrame: 0,
        endFrame: 4,
        generation: 0,
        parentIndex: undefined,
        splitFrame: undefined,
        childIndices: [],
        pathFromRoot: [1],
      },
    ]);
    expect(decomposition.edges.every((e) => e.kind === EdgeKind.INTERNAL && e.subtrackIndex === 1)).toBe(true);
    expect(decomposition.edges).toHaveLength(4);
  });

  it('should decompose a single spot', () => {
    const decomposition = decompose(new TrackBuilder(2).spot(7, 12).build());

    expect(decomposition.subtracks).toHaveLength(1);
    expect(decomposition.subtracks[0]?.spotIds).toEqual([7]);
    expect(decomposition.subtracks[0]?.startFrame).toBe(12);
    expect(decomposition.subtracks[0]?.endFrame).toBe(12);
    expect(decomposition.edges).toEqual([]);
  });

  describe('two-level division', () => {
    const track = twoLevelDivision(1);
    const decomposition = decompose(track);
    const subtracks = decomposition.subtracks;

    it('should number subtracks in pre-order', () => {
      expect(subtracks.map((s) => s.index)).toEqual([1, 2, 3, 4, 5]);
      expect(subtracks.map((s) => s.spotIds[0])).toEqual([1, 100, 200, 300, 400]);
    });

    it('should keep the split spot in the pre-split subtrack', () => {
      expect(subtracks[0]?.spotIds).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
      expect(subtracks[2]?.spotIds).toEqual([200, 201, 202, 203]);
    });

    it('should place every spot in exactly one subtrack', () => {
      const placed = subtracks.flatMap((s) => s.spotIds);
      const expected = track.spots.map((spot) => spot.id);

      expect(placed).toHaveLength(120);
      expect(new Set(placed).size).toBe(placed.length);
      expect([...placed].sort((a, b) => a - b)).toEqual([...expected].sort((a, b) => a - b));
    });

    it('should never start a daughter at the last spot of its parent', () => {
      for (const subtrack of subtracks) {
        const parent = subtracks.find((s) => s.index === subtrack.parentIndex);
        if (!parent) continue;
        expect(subtrack.spotIds[0]).not.toBe(parent.spotIds[parent.spotIds.length - 1]);
        expect(subtrack.startFrame).toBe(parent.endFrame + 1);
      }
    });

    it('should record the lineage of every subtrack', () => {
      expect(subtracks.map((s) => s.generation)).toEqual([0, 1, 1, 2, 2]);
      expect(subtracks.map((s) => s.parentIndex)).toEqual([undefined, 1, 1, 3, 3]);
      expect(subtracks.map((s) => s.splitFrame)).toEqual([undefined, 10, 10, 14, 14]);
      expect(subtracks.map((s) => s.childIndices)).toEqual([[2, 3], [], [4, 5], [], []]);
      expect(subtracks.map((s) => s.pathFromRoot)).toEqual([[1], [1, 2], [1, 3], [1, 3, 4], [1, 3, 5]]);
      expect(subtracks.map((s) => [s.startFrame, s.endFrame])).toEqual([
        [0, 10],
        [11, 93],
        [11, 14],
        [15, 30],
        [15, 20],
      ]);
    });

    it('should assign every edge exactly once', () => {
      const keys = decomposition.edges.map((e) => `${e.edge.sourceId}->${e.edge.targetId}`);

      expect(keys).toHaveLength(119);
      expect(new Set(keys).size).toBe(119);
    });

    it('should assign division edges to the daughter', () => {
      const divisions = decomposition.edges
        .filter((e) => e.kind === EdgeKind.DIVISION)
        .map((e) => [e.edge.sourceId, e.edge.targetId, e.subtrackIndex]);

      expect(divisions).toEqual([
        [11, 100, 2],
        [11, 200, 3],
        [203, 300, 4],
        [203, 400, 5],
      ]);
    });

    it('should list internal edges per subtrack in chain order', () => {
      const internal = internalEdgesOf(decomposition, 3);
      expect(internal.map((e) => [e.sourceId, e.targetId])).toEqual([
        [200, 201],
        [201, 202],
        [202, 203],
      ]);
      expect(internalEdgesOf(decomposition, 1)).toHaveLength(10);
      expect(internalEdgesOf(decomposition, 2)).toHaveLength(82);
    });
  });

  it('should be deterministic', () => {
    expect(decompose(twoLevelDivision(1))).toEqual(decompose(twoLevelDivision(1)));
  });

  it('should reject a track with two roots', () => {
    const track = new TrackBuilder(5).spot(1, 0).spot(2, 0).spot(3, 1).link(1, 3).link(2, 3).build();
    const graph = loadTrackGraph(5, track.spots, track.edges);

    expect(() => findRootSpot(graph)).toThrow(MultipleRootsError);
    expect(() => decomposeTrack(graph)).toThrow('Track 5 has 2 root spots (1, 2); expected exactly one');
  });

  it('should reject a merge below a single root', () => {
    const track = new TrackBuilder(6)
      .spot(1, 0)
      .spot(2, 1)
      .spot(3, 1)
      .spot(4, 2)
      .link(1, 2)
      .link(1, 3)
      .link(2, 4)
      .link(3, 4)
      .build();

    let caught: unknown;
    try {
      decompose(track);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnsupportedMergeError);
    expect(caught).toMatchObject({ trackId: 6, spotId: 4, parentIds: [2, 3] });
  });

  it('should handle deeply nested divisions without recursion', () => {
    const depth = 2500;
    const builder = new TrackBuilder(9);
    for (let i = 0; i <= depth; i++) {
      builder.spot(i, i);
      if (i > 0) builder.link(i - 1, i);
    }
    for (let i = 0; i < depth; i++) {
      builder.spot(100000 + i, i + 1).link(i, 100000 + i);
    }

    const decomposition = decompose(builder.build());
    const deepest = decomposition.subtracks[depth];

    expect(decomposition.subtracks).toHaveLength(2 * depth + 1);
    expect(deepest?.spotIds).toEqual([depth]);
    expect(deepest?.generation).toBe(depth);
    expect(deepest?.pathFromRoot).toHaveLength(depth + 1);
  });
});
