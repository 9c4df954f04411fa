/**
 * Integration tests for one location, from tracker export to output tables
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { resolveAnalysisConfig } from '../../src/core/config/analysis-config.js';
import { LocationInputError } from '../../src/core/errors.js';
import { digestText } from '../../src/core/identity/content-digest.js';
import { silentLogger } from '../../src/core/logging/logger.js';
import { EDGE_TABLE_COLUMNS, LINEAGE_TABLE_COLUMNS } from '../../src/emit/tables.js';
import { readTextFile, resolveLocationFiles } from '../../src/io/location-files.js';
import { analyzeTrackingResult } from '../../src/pipeline/batch.js';
import type { BuiltTrack } from '../helpers/track-builder.js';
import { TrackBuilder, straightTrack, twoLevelDivision } from '../helpers/track-builder.js';
import { makeTempRoot, removeTempRoot, writeTrackerExport } from '../helpers/tracker-export.js';

const EXPECTED_LINEAGE = [
  LINEAGE_TABLE_COLUMNS.join(','),
  'Track_1_Sub_1,1,1,,0,,0,10,11,11,2,1',
  'Track_1_Sub_2,1,2,Track_1_Sub_1,1,10,11,93,83,83,0,1>2',
  'Track_1_Sub_3,1,3,Track_1_Sub_1,1,10,11,14,4,4,2,1>3',
  'Track_1_Sub_4,1,4,Track_1_Sub_3,2,14,15,30,16,16,0,1>3>4',
  'Track_1_Sub_5,1,5,Track_1_Sub_3,2,14,15,20,6,6,0,1>3>5',
  '',
].join('\n');

function mergingTrack(trackId: number): BuiltTrack {
  return new TrackBuilder(trackId)
    .spot(5001, 0)
    .spot(5002, 0)
    .chain(5003, 1, 25)
    .link(5001, 5003)
    .link(5002, 5003)
    .build();
}

describe('Location Workflow Integration', () => {
  let root: string;
  const config = resolveAnalysisConfig({});
  const tracks = [twoLevelDivision(1), straightTrack(2, 1000, 10), mergingTrack(3)];

  beforeEach(async () => {
    root = await makeTempRoot();
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('should write the three tables and a manifest', async () => {
    const folder = await writeTrackerExport(root, 'A1_1_cropped', tracks, { trackIds: [1, 2, 3] });

    const result = await analyzeTrackingResult(folder, config, silentLogger);

    expect(result.locationName).toBe('A1_1');
    expect(result.outputs.lineage).toBe(join(folder, 'secondary_analysis', 'A1_1-subtrack_lineage.csv'));

    const lineage = await readFile(result.outputs.lineage, 'utf8');
    expect(lineage).toBe(EXPECTED_LINEAGE);

    const statistics = await readFile(result.outputs.statistics, 'utf8');
    const statisticsLines = statistics.trimEnd().split('\n');
    expect(statisticsLines).toHaveLength(6);
    expect(statisticsLines[0]?.endsWith('SUBTRACK_MEAN_QUALITY')).toBe(true);

    const edges = await readFile(result.outputs.edges, 'utf8');
    expect(edges.split('\n')[0]).toBe(EDGE_TABLE_COLUMNS.join(','));
    expect(edges.trimEnd().split('\n')).toHaveLength(120);

    const manifest: unknown = JSON.parse(await readFile(result.outputs.manifest, 'utf8'));
    expect(manifest).toEqual({
      location: 'A1_1',
      baseName: 'A1_1',
      inputs: { spots: 'A1_1-all-spots.csv', edges: 'A1_1-edges.csv', tracks: 'A1_1-tracks.csv' },
      thresholds: { maxSplitsAllowed: 3, minTrackDurationFrames: 20 },
      tracks: { total: 3, processed: 1, rejected: 1, failed: 1 },
      subtracks: 5,
      rejections: [{ trackId: 2, rules: ['TOO_SHORT'] }],
      failures: [
        {
          trackId: 3,
          code: 'MULTIPLE_ROOTS',
          message: 'Track 3 has 2 root spots (5001, 5002); expected exactly one',
        },
      ],
      digests: {
        statistics: digestText(statistics),
        edges: digestText(edges),
        lineage: digestText(lineage),
      },
    });
  });

  it('should produce byte-identical outputs on a second run', async () => {
    const folder = await writeTrackerExport(root, 'B2_1', tracks);

    const first = await analyzeTrackingResult(folder, config);
    const before = await Promise.all(Object.values(first.outputs).map((path) => readFile(path, 'utf8')));
    const second = await analyzeTrackingResult(folder, config);
    const after = await Promise.all(Object.values(second.outputs).map((path) => readFile(path, 'utf8')));

    expect(after).toEqual(before);
  });

  it('should analyze only the tracks listed in the tracks table', async () => {
    const folder = await writeTrackerExport(root, 'C3_1', tracks, { trackIds: [1, 2] });

    const result = await analyzeTrackingResult(folder, config);

    expect(result.manifest.tracks).toEqual({ total: 2, processed: 1, rejected: 1, failed: 0 });
  });

  it('should honor the QC thresholds', async () => {
    const folder = await writeTrackerExport(root, 'D4_1', tracks);

    const result = await analyzeTrackingResult(
      folder,
      resolveAnalysisConfig({ qc: { maxSplitsAllowed: 1, minTrackDurationFrames: 10 } })
    );

    expect(result.manifest.tracks).toEqual({ total: 3, processed: 1, rejected: 1, failed: 1 });
    expect(result.report.processedTrackIds).toEqual([2]);
    expect(result.manifest.rejections).toEqual([{ trackId: 1, rules: ['TOO_MANY_SPLITS'] }]);
  });

  it('should write header-only tables when every track fails', async () => {
    const folder = await writeTrackerExport(root, 'E5_1', [mergingTrack(8)]);

    const result = await analyzeTrackingResult(folder, config);

    expect(result.manifest.subtracks).toBe(0);
    expect(await readFile(result.outputs.lineage, 'utf8')).toBe(LINEAGE_TABLE_COLUMNS.join(',') + '\n');
    expect(await readFile(result.outputs.edges, 'utf8')).toBe(EDGE_TABLE_COLUMNS.join(',') + '\n');
  });

  it('should fall back to the plain spots file name', async () => {
    const folder = await writeTrackerExport(root, 'F6_1', tracks, { plainSpotsName: true });

    const files = await resolveLocationFiles(folder);

    expect(files.baseName).toBe('F6_1');
    expect(files.spotsPath).toBe(join(folder, 'F6_1-spots.csv'));
    expect(files.tracksPath).toBeUndefined();
  });

  it('should fail a location without an edge table', async () => {
    const folder = await writeTrackerExport(root, 'G7_1', tracks, { withoutEdges: true });

    await expect(analyzeTrackingResult(folder, config)).rejects.toThrow(LocationInputError);
    await expect(resolveLocationFiles(join(root, 'missing'))).rejects.toThrow('not a directory');
  });

  it('should read latin1 files and strip a byte order mark', async () => {
    const latin1 = join(root, 'latin1.csv');
    const bom = join(root, 'bom.csv');
    await writeFile(latin1, Buffer.from([0x49, 0x44, 0x2c, 0xb5, 0x6d, 0x0a]));
    await writeFile(bom, '\uFEFFID,FRAME\n', 'utf8');

    expect(await readTextFile(latin1)).toBe('ID,\u00B5m\n');
    expect(await readTextFile(bom)).toBe('ID,FRAME\n');
  });
});
