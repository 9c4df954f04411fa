/**
 * Location and batch runners
 *
 * Reads a `Tracking Result` folder, analyzes it and writes the three tables
 * plus a run manifest. The batch runner does this for every such folder below
 * a parent, a bounded number at a time.
 */

import { basename } from 'path';
import type { AnalysisConfig, QcThresholds } from '../core/config/analysis-config.js';
import { resolveAnalysisConfig } from '../core/config/analysis-config.js';
import { ConfigurationError } from '../core/errors.js';
import type { ContentDigest } from '../core/identity/content-digest.js';
import { digestText } from '../core/identity/content-digest.js';
import type { LineageLogger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import { encodeLocationTables } from '../emit/tables.js';
import type { OutputPaths } from '../io/location-files.js';
import {
  findTrackingResultFolders,
  locationNameFor,
  readTextFile,
  resolveLocationFiles,
  writeLocationOutputs,
} from '../io/location-files.js';
import { parseEdgeTable, parseSpotTable, parseTrackTable } from '../io/tracker-tables.js';
import type { QcRuleValue } from '../qc/quality-filter.js';
import type { LocationReport, TrackFailure } from './location-analyzer.js';
import { analyzeLocation } from './location-analyzer.js';

/**
 * Run record written beside a location's tables
 */
export interface LocationManifest {
  readonly location: string;
  readonly baseName: string;
  readonly inputs: {
    readonly spots: string;
    readonly edges: string;
    readonly tracks: string | null;
  };
  readonly thresholds: QcThresholds;
  readonly tracks: {
    readonly total: number;
    readonly processed: number;
    readonly rejected: number;
    readonly failed: number;
  };
  readonly subtracks: number;
  readonly rejections: readonly { readonly trackId: number; readonly rules: readonly QcRuleValue[] }[];
  readonly failures: readonly TrackFailure[];
  readonly digests: {
    readonly statistics: ContentDigest;
    readonly edges: ContentDigest;
    readonly lineage: ContentDigest;
  };
}

export const LocationStatus = {
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
} as const;

export interface SucceededLocation {
  readonly status: typeof LocationStatus.SUCCEEDED;
  readonly folder: string;
  readonly locationName: string;
  readonly report: LocationReport;
  readonly manifest: LocationManifest;
  readonly outputs: OutputPaths;
}

export interface FailedLocation {
  readonly status: typeof LocationStatus.FAILED;
  readonly folder: string;
  readonly locationName: string;
  readonly message: string;
}

export type LocationResult = SucceededLocation | FailedLocation;

/**
 * Analyze one `Tracking Result` folder and write its outputs
 *
 * @throws LocationInputError when the tracker export is missing or unreadable
 */
export async function analyzeTrackingResult(
  folder: string,
  config: AnalysisConfig,
  logger: LineageLogger = silentLogger
): Promise<SucceededLocation> {
  const files = await resolveLocationFiles(folder);
  logger.info(`Processing ${files.locationName} (${files.baseName})`);

  const [spotsText, edgesText, tracksText] = await Promise.all([
    readTextFile(files.spotsPath),
    readTextFile(files.edgesPath),
    files.tracksPath === undefined ? Promise.resolve(undefined) : readTextFile(files.tracksPath),
  ]);

  const report = analyzeLocation(
    {
      spots: parseSpotTable(spotsText, files.spotsPath),
      edges: parseEdgeTable(edgesText, files.edgesPath),
      trackIds:
        tracksText === undefined || files.tracksPath === undefined
          ? undefined
          : parseTrackTable(tracksText, files.tracksPath),
    },
    { thresholds: config.qc, logger }
  );

  const encoded = encodeLocationTables(report.tables, report.layout);

  const manifest: LocationManifest = {
    location: files.locationName,
    baseName: files.baseName,
    inputs: {
      spots: basename(files.spotsPath),
      edges: basename(files.edgesPath),
      tracks: files.tracksPath === undefined ? null : basename(files.tracksPath),
    },
    thresholds: report.thresholds,
    tracks: {
      total: report.trackCount,
      processed: report.processedTrackIds.length,
      rejected: report.rejected.length,
      failed: report.failures.length,
    },
    subtracks: report.subtrackCount,
    rejections: report.rejected.map((verdict) => ({
      trackId: verdict.trackId,
      rules: verdict.violations.map((v) => v.rule),
    })),
    failures: report.failures,
    digests: {
      statistics: digestText(encoded.statistics),
      edges: digestText(encoded.edges),
      lineage: digestText(encoded.lineage),
    },
  };

  const outputs = await writeLocationOutputs(folder, files.baseName, config.outputFolder, {
    ...encoded,
    manifest: JSON.stringify(manifest, null, 2) + '\n',
  });
  logger.info(`Wrote ${report.subtrackCount} subtracks for ${files.locationName}`);

  return {
    status: LocationStatus.SUCCEEDED,
    folder,
    locationName: files.locationName,
    report,
    manifest,
    outputs,
  };
}

/**
 * Errors that end one location and let the batch continue
 *
 * A configuration error is shared by every location and ends the batch.
 */
function isLocationFailure(error: unknown): error is Error {
  return error instanceof Error && !(error instanceof ConfigurationError);
}

export interface BatchOptions {
  /** Raw or validated analysis configuration */
  readonly config?: unknown;
  readonly logger?: LineageLogger;
  readonly progressCallback?: (completed: number, total: number) => void;
}

export interface BatchReport {
  readonly parent: string;
  readonly locations: readonly LocationResult[];
  readonly succeeded: number;
  readonly failed: number;
}

/**
 * Batch analyzer for every location below a parent folder
 */
export class BatchAnalyzer {
  readonly config: AnalysisConfig;
  private logger: LineageLogger;

  constructor(config: unknown = {}, logger: LineageLogger = silentLogger) {
    this.config = resolveAnalysisConfig(config);
    this.logger = logger;
  }

  /**
   * Analyze one location; any failure other than a configuration error
   * becomes a failed result
   */
  async analyzeFolder(folder: string): Promise<LocationResult> {
    try {
      return await analyzeTrackingResult(folder, this.config, this.logger);
    } catch (error) {
      if (!isLocationFailure(error)) throw error;
      const locationName = locationNameFor(folder);
      this.logger.error(`Location ${locationName} failed: ${error.message}`);
      return { status: LocationStatus.FAILED, folder, locationName, message: error.message };
    }
  }

  async analyzeFolders(
    folders: readonly string[],
    progressCallback?: (completed: number, total: number) => void
  ): Promise<LocationResult[]> {
    const { concurrency } = this.config;
    const results: LocationResult[] = [];

    for (let i = 0; i < folders.length; i += concurrency) {
      const batch = folders.slice(i, i + concurrency);
      results.push(...(await Promise.all(batch.map((folder) => this.analyzeFolder(folder)))));

      if (progressCallback) {
        progressCallback(Math.min(i + concurrency, folders.length), folders.length);
      }
    }

    return results;
  }

  async analyzeParent(
    parent: string,
    progressCallback?: (completed: number, total: number) => void
  ): Promise<BatchReport> {
    const folders = await findTrackingResultFolders(parent);
    this.logger.info(`Found ${folders.length} locations under ${parent}`);

    const locations = await this.analyzeFolders(folders, progressCallback);
    const succeeded = locations.filter((l) => l.status === LocationStatus.SUCCEEDED).length;

    this.logger.info(`Batch complete: ${succeeded} succeeded, ${locations.length - succeeded} failed`);

    return { parent, locations, succeeded, failed: locations.length - succeeded };
  }
}

/**
 * Analyze every `Tracking Result` folder below a parent folder
 *
 * @throws ConfigurationError when the configuration is invalid
 * @throws LocationInputError when the parent folder does not exist
 */
export async function analyzeBatch(parent: string, options: BatchOptions = {}): Promise<BatchReport> {
  const analyzer = new BatchAnalyzer(options.config ?? {}, options.logger ?? silentLogger);
  return analyzer.analyzeParent(parent, options.progressCallback);
}
