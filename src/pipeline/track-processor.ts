/**
 * Per-track processing: load, QC, decompose, measure, emit.
 *
 * A track ends in exactly one of three outcomes. Structural anomalies become
 * a `failed` outcome carrying the error; anything else is a defect and
 * propagates.
 */

import type { QcThresholds } from '../core/config/analysis-config.js';
import type { LineageError } from '../core/errors.js';
import { isTrackFailure } from '../core/errors.js';
import type { EdgeRecord } from '../core/types/edge.js';
import type { Spot, TrackId } from '../core/types/spot.js';
import type { LineageDecomposition } from '../core/types/subtrack.js';
import type { TrackTables } from '../emit/tables.js';
import { emitTrackTables } from '../emit/tables.js';
import type { TrackSummary } from '../graph/track-graph.js';
import { loadTrackGraph, requireNode, summarizeTrack } from '../graph/track-graph.js';
import { decomposeTrack, internalEdgesOf } from '../lineage/decomposer.js';
import type { QualityVerdict } from '../qc/quality-filter.js';
import { evaluateTrackQuality } from '../qc/quality-filter.js';
import { computeSubtrackStatistics } from '../stats/kinematics.js';

export const TrackStatus = {
  PROCESSED: 'processed',
  REJECTED: 'rejected',
  FAILED: 'failed',
} as const;

export type TrackStatusValue = (typeof TrackStatus)[keyof typeof TrackStatus];

export interface ProcessedTrack {
  readonly status: typeof TrackStatus.PROCESSED;
  readonly trackId: TrackId;
  readonly summary: TrackSummary;
  readonly decomposition: LineageDecomposition;
  readonly tables: TrackTables;
}

export interface RejectedTrack {
  readonly status: typeof TrackStatus.REJECTED;
  readonly trackId: TrackId;
  readonly summary: TrackSummary;
  readonly verdict: QualityVerdict;
}

export interface FailedTrack {
  readonly status: typeof TrackStatus.FAILED;
  readonly trackId: TrackId;
  readonly error: LineageError;
}

export type TrackOutcome = ProcessedTrack | RejectedTrack | FailedTrack;

/**
 * Run one track through the whole analysis
 *
 * @param spots - the track's spots
 * @param edges - the track's edges
 */
export function processTrack(
  trackId: TrackId,
  spots: readonly Spot[],
  edges: readonly EdgeRecord[],
  thresholds: QcThresholds
): TrackOutcome {
  try {
    const graph = loadTrackGraph(trackId, spots, edges);
    const summary = summarizeTrack(graph);
    const verdict = evaluateTrackQuality(summary, thresholds);

    if (!verdict.accepted) {
      return { status: TrackStatus.REJECTED, trackId, summary, verdict };
    }

    const decomposition = decomposeTrack(graph);
    const statistics = decomposition.subtracks.map((subtrack) =>
      computeSubtrackStatistics(
        subtrack,
        subtrack.spotIds.map((id) => requireNode(graph, id).spot),
        internalEdgesOf(decomposition, subtrack.index)
      )
    );

    return {
      status: TrackStatus.PROCESSED,
      trackId,
      summary,
      decomposition,
      tables: emitTrackTables(decomposition, statistics),
    };
  } catch (error) {
    if (isTrackFailure(error)) {
      return { status: TrackStatus.FAILED, trackId, error };
    }
    throw error;
  }
}
