/**
 * Quality-Control Filter
 *
 * Track-level admission rules applied before lineage decomposition. A
 * rejection is a verdict, not an error: rejected tracks simply produce no rows.
 *
 * Rules:
 * - reject when the track divides more than `maxSplitsAllowed` times
 * - reject when the track spans fewer than `minTrackDurationFrames` frames
 */

import type { QcThresholds } from '../core/config/analysis-config.js';
import { DEFAULT_QC_THRESHOLDS } from '../core/config/analysis-config.js';
import { frameSpan } from '../core/time/frames.js';
import type { TrackId } from '../core/types/spot.js';
import type { TrackSummary } from '../graph/track-graph.js';

/**
 * QC rules a track can violate
 */
export const QcRule = {
  /** More divisions than allowed */
  TOO_MANY_SPLITS: 'TOO_MANY_SPLITS',
  /** Shorter than the minimum duration */
  TOO_SHORT: 'TOO_SHORT',
} as const;

export type QcRuleValue = (typeof QcRule)[keyof typeof QcRule];

/**
 * The part of a track summary QC looks at
 */
export type QcInput = Pick<TrackSummary, 'trackId' | 'splitCount' | 'startFrame' | 'stopFrame'>;

/**
 * A single failed rule
 */
export interface QcViolation {
  readonly rule: QcRuleValue;
  /** Value measured on the track */
  readonly observed: number;
  /** Threshold it was compared against */
  readonly limit: number;
  readonly message: string;
}

/**
 * Outcome of evaluating one track
 */
export interface QualityVerdict {
  readonly trackId: TrackId;
  readonly accepted: boolean;
  readonly violations: readonly QcViolation[];
}

/**
 * Evaluate one track against the thresholds
 */
export function evaluateTrackQuality(
  summary: QcInput,
  thresholds: QcThresholds = DEFAULT_QC_THRESHOLDS
): QualityVerdict {
  const violations: QcViolation[] = [];
  const duration = frameSpan({ start: summary.startFrame, stop: summary.stopFrame });

  if (summary.splitCount > thresholds.maxSplitsAllowed) {
    violations.push({
      rule: QcRule.TOO_MANY_SPLITS,
      observed: summary.splitCount,
      limit: thresholds.maxSplitsAllowed,
      message: `${summary.splitCount} splits exceeds the maximum of ${thresholds.maxSplitsAllowed}`,
    });
  }

  if (duration < thresholds.minTrackDurationFrames) {
    violations.push({
      rule: QcRule.TOO_SHORT,
      observed: duration,
      limit: thresholds.minTrackDurationFrames,
      message: `${duration} frames is below the minimum of ${thresholds.minTrackDurationFrames}`,
    });
  }

  return {
    trackId: summary.trackId,
    accepted: violations.length === 0,
    violations,
  };
}
