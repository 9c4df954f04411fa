/**
 * Location Analyzer
 *
 * Groups a location's spots and edges by track, processes every track on its
 * own and merges the per-track tables once at the end. One failing track
 * never affects another.
 */

import type { QcThresholds } from '../core/config/analysis-config.js';
import { resolveQcThresholds } from '../core/config/analysis-config.js';
import type { LineageErrorCodeValue } from '../core/errors.js';
import type { LineageLogger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import type { EdgeRecord } from '../core/types/edge.js';
import type { Spot, TrackId } from '../core/types/spot.js';
import type { LocationTables, TableLayout, TrackTables } from '../emit/tables.js';
import { layoutFromSpots, mergeLocationTables } from '../emit/tables.js';
import type { QualityVerdict } from '../qc/quality-filter.js';
import type { TrackOutcome } from './track-processor.js';
import { TrackStatus, processTrack } from './track-processor.js';

/**
 * Parsed tracker export of one location
 */
export interface LocationInput {
  readonly spots: readonly Spot[];
  readonly edges: readonly EdgeRecord[];
  /** Tracks to analyze; every track present in the spots or edges when absent */
  readonly trackIds?: readonly TrackId[] | undefined;
}

export interface LocationAnalysisOptions {
  /** Validated or raw thresholds; defaults apply to absent fields */
  readonly thresholds?: unknown;
  readonly logger?: LineageLogger;
}

/**
 * A track that could not be analyzed
 */
export interface TrackFailure {
  readonly trackId: TrackId;
  readonly code: LineageErrorCodeValue;
  readonly message: string;
}

export interface LocationReport {
  readonly thresholds: QcThresholds;
  readonly trackCount: number;
  readonly processedTrackIds: readonly TrackId[];
  readonly rejected: readonly QualityVerdict[];
  readonly failures: readonly TrackFailure[];
  readonly subtrackCount: number;
  readonly tables: LocationTables;
  readonly layout: TableLayout;
}

function groupByTrack<T extends { readonly trackId: TrackId }>(items: readonly T[]): Map<TrackId, T[]> {
  const groups = new Map<TrackId, T[]>();
  for (const item of items) {
    const group = groups.get(item.trackId) ?? [];
    group.push(item);
    groups.set(item.trackId, group);
  }
  return groups;
}

function selectTrackIds(input: LocationInput): TrackId[] {
  const ids = input.trackIds ?? [
    ...input.spots.map((spot) => spot.trackId),
    ...input.edges.map((edge) => edge.trackId),
  ];
  return Array.from(new Set(ids)).sort((a, b) => a - b);
}

/**
 * Analyze every track of one location
 *
 * @throws ConfigurationError when the thresholds are invalid
 */
export function analyzeLocation(
  input: LocationInput,
  options: LocationAnalysisOptions = {}
): LocationReport {
  const thresholds = resolveQcThresholds(options.thresholds ?? {});
  const logger = options.logger ?? silentLogger;

  const spotsByTrack = groupByTrack(input.spots);
  const edgesByTrack = groupByTrack(input.edges);
  const trackIds = selectTrackIds(input);

  const outcomes: TrackOutcome[] = trackIds.map((trackId) =>
    processTrack(trackId, spotsByTrack.get(trackId) ?? [], edgesByTrack.get(trackId) ?? [], thresholds)
  );

  const processed: TrackTables[] = [];
  const rejected: QualityVerdict[] = [];
  const failures: TrackFailure[] = [];

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case TrackStatus.PROCESSED:
        processed.push(outcome.tables);
        break;
      case TrackStatus.REJECTED:
        rejected.push(outcome.verdict);
        logger.info(
          `Track ${outcome.trackId} rejected: ${outcome.verdict.violations.map((v) => v.message).join('; ')}`
        );
        break;
      case TrackStatus.FAILED:
        failures.push({
          trackId: outcome.trackId,
          code: outcome.error.code,
          message: outcome.error.message,
        });
        logger.warn(`Track ${outcome.trackId} failed (${outcome.error.code}): ${outcome.error.message}`);
        break;
    }
  }

  const tables = mergeLocationTables(processed);

  logger.info(
    `Analyzed ${trackIds.length} tracks: ${processed.length} processed, ${rejected.length} rejected, ${failures.length} failed, ${tables.lineage.length} subtracks`
  );

  return {
    thresholds,
    trackCount: trackIds.length,
    processedTrackIds: processed.map((t) => t.trackId).sort((a, b) => a - b),
    rejected,
    failures,
    subtrackCount: tables.lineage.length,
    tables,
    layout: layoutFromSpots(input.spots),
  };
}
