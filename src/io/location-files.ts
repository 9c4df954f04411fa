/**
 * Location File Layout
 *
 * A location's tracker export lives in a folder named `Tracking Result`:
 *
 *   <location>/Tracking Result/<base>-all-spots.csv   (or <base>-spots.csv)
 *   <location>/Tracking Result/<base>-edges.csv
 *   <location>/Tracking Result/<base>-tracks.csv      (optional)
 *
 * Outputs are written next to it, under `secondary_analysis/`.
 */

import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { resolveAnalysisConfig } from '../core/config/analysis-config.js';
import type { AnalysisConfig } from '../core/config/analysis-config.js';
import { ConfigurationError, LocationInputError } from '../core/errors.js';

export const TRACKING_RESULT_FOLDER = 'Tracking Result';

const ALL_SPOTS_SUFFIX = '-all-spots.csv';
const SPOTS_SUFFIX = '-spots.csv';
const EDGES_SUFFIX = '-edges.csv';
const TRACKS_SUFFIX = '-tracks.csv';
const CROPPED_SUFFIX = '_cropped';

/**
 * Resolved input files of one location
 */
export interface LocationFiles {
  /** The `Tracking Result` folder */
  readonly folder: string;
  /** File name prefix shared by the tracker's tables */
  readonly baseName: string;
  readonly locationName: string;
  readonly spotsPath: string;
  readonly edgesPath: string;
  readonly tracksPath: string | undefined;
}

/**
 * Encoded outputs of one location
 */
export interface LocationOutputs {
  readonly statistics: string;
  readonly edges: string;
  readonly lineage: string;
  readonly manifest: string;
}

/**
 * Where each output was written
 */
export interface OutputPaths {
  readonly statistics: string;
  readonly edges: string;
  readonly lineage: string;
  readonly manifest: string;
}

/**
 * Drop the `_cropped` suffix the stabilization step appends
 */
export function cleanLocationName(name: string): string {
  return name.endsWith(CROPPED_SUFFIX) ? name.slice(0, -CROPPED_SUFFIX.length) : name;
}

/**
 * Location name of a `Tracking Result` folder: its parent's name, cleaned
 */
export function locationNameFor(folder: string): string {
  return cleanLocationName(basename(dirname(folder)));
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Find every `Tracking Result` folder below a parent folder, sorted by path
 */
export async function findTrackingResultFolders(parent: string): Promise<string[]> {
  if (!(await isDirectory(parent))) {
    throw new LocationInputError(parent, 'not a directory');
  }

  const found: string[] = [];
  const pending: string[] = [parent];

  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const path = join(current, entry.name);
      if (entry.name === TRACKING_RESULT_FOLDER) {
        found.push(path);
      }
      pending.push(path);
    }
  }

  return found.sort();
}

/**
 * Locate the tracker tables inside a `Tracking Result` folder
 *
 * @throws LocationInputError when the folder, the spot table or the edge table is missing
 */
export async function resolveLocationFiles(folder: string): Promise<LocationFiles> {
  if (!(await isDirectory(folder))) {
    throw new LocationInputError(folder, 'not a directory');
  }

  const names = (await readdir(folder)).sort();
  const allSpots = names.find((name) => name.endsWith(ALL_SPOTS_SUFFIX));
  const spots = allSpots ?? names.find((name) => name.endsWith(SPOTS_SUFFIX));
  if (!spots) {
    throw new LocationInputError(folder, `no *${ALL_SPOTS_SUFFIX} or *${SPOTS_SUFFIX} file`);
  }

  const baseName = spots.slice(0, -(allSpots ? ALL_SPOTS_SUFFIX : SPOTS_SUFFIX).length);
  const edges = `${baseName}${EDGES_SUFFIX}`;
  if (!names.includes(edges)) {
    throw new LocationInputError(folder, `no ${edges} file`);
  }

  const tracks = `${baseName}${TRACKS_SUFFIX}`;

  return {
    folder,
    baseName,
    locationName: locationNameFor(folder),
    spotsPath: join(folder, spots),
    edgesPath: join(folder, edges),
    tracksPath: names.includes(tracks) ? join(folder, tracks) : undefined,
  };
}

/**
 * Read a text file as UTF-8, or as latin1 when it is not valid UTF-8
 */
export async function readTextFile(path: string): Promise<string> {
  const bytes = await readFile(path);
  const text = bytes.toString('utf8');
  const decoded = text.includes('\uFFFD') ? bytes.toString('latin1') : text;
  return decoded.charCodeAt(0) === 0xfeff ? decoded.slice(1) : decoded;
}

/**
 * Output file paths of a location
 */
export function outputPathsFor(folder: string, baseName: string, outputFolder: string): OutputPaths {
  const target = join(folder, outputFolder);
  return {
    statistics: join(target, `${baseName}-subtrack_statistics.csv`),
    edges: join(target, `${baseName}-subtrack_edges.csv`),
    lineage: join(target, `${baseName}-subtrack_lineage.csv`),
    manifest: join(target, `${baseName}-subtrack_manifest.json`),
  };
}

/**
 * Write a location's outputs, replacing earlier ones
 */
export async function writeLocationOutputs(
  folder: string,
  baseName: string,
  outputFolder: string,
  outputs: LocationOutputs
): Promise<OutputPaths> {
  const paths = outputPathsFor(folder, baseName, outputFolder);
  await mkdir(join(folder, outputFolder), { recursive: true });
  await Promise.all([
    writeFile(paths.statistics, outputs.statistics, 'utf8'),
    writeFile(paths.edges, outputs.edges, 'utf8'),
    writeFile(paths.lineage, outputs.lineage, 'utf8'),
    writeFile(paths.manifest, outputs.manifest, 'utf8'),
  ]);
  return paths;
}

/**
 * Load and validate a JSON analysis configuration file
 *
 * @throws ConfigurationError when the file is not JSON or fails validation
 */
export async function loadAnalysisConfigFile(path: string): Promise<AnalysisConfig> {
  const text = await readTextFile(path);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError([
      `${path}: ${error instanceof Error ? error.message : 'not valid JSON'}`,
    ]);
  }
  return resolveAnalysisConfig(raw);
}
