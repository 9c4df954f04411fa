/**
 * Analysis Configuration
 *
 * QC thresholds and batch settings are explicit values threaded through
 * every call. Nothing here is module-level mutable state.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_MAX_SPLITS_ALLOWED = 3;
export const DEFAULT_MIN_TRACK_DURATION_FRAMES = 20;
export const DEFAULT_OUTPUT_FOLDER = 'secondary_analysis';

export const QcThresholdsSchema = z
  .object({
    /** Tracks with more divisions than this are rejected */
    maxSplitsAllowed: z.number().int().min(0).default(DEFAULT_MAX_SPLITS_ALLOWED),
    /** Tracks spanning fewer frames than this are rejected */
    minTrackDurationFrames: z.number().int().min(1).default(DEFAULT_MIN_TRACK_DURATION_FRAMES),
  })
  .strict();

export type QcThresholds = Readonly<z.infer<typeof QcThresholdsSchema>>;

export const AnalysisConfigSchema = z
  .object({
    qc: QcThresholdsSchema.default({}),
    /** Locations processed at the same time in batch mode */
    concurrency: z.number().int().min(1).default(1),
    /** Folder created under each Tracking Result folder for the outputs */
    outputFolder: z.string().min(1).default(DEFAULT_OUTPUT_FOLDER),
  })
  .strict();

export type AnalysisConfig = Readonly<z.infer<typeof AnalysisConfigSchema>>;

export const DEFAULT_QC_THRESHOLDS: QcThresholds = QcThresholdsSchema.parse({});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate QC thresholds, filling in defaults for absent fields
 */
export function resolveQcThresholds(input: unknown = {}): QcThresholds {
  const result = QcThresholdsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(describeIssues(result.error));
  }
  return result.data;
}

/**
 * Validate a full analysis configuration, filling in defaults for absent fields
 */
export function resolveAnalysisConfig(input: unknown = {}): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(describeIssues(result.error));
  }
  return result.data;
}
