/**
 * Basic Lineage Example
 *
 * Decomposes one dividing cell track held in memory and prints:
 * - The QC outcome of each track
 * - The encoded lineage table
 * - The lineage tree rebuilt from the table rows
 */

import {
  analyzeLocation,
  buildLineageTree,
  createConsoleLogger,
  encodeLocationTables,
  groupLineageByTrack,
  renderLineageTree,
} from '../../src/index.js';
import type { EdgeRecord, Spot, SpotId } from '../../src/index.js';

const TRACK_ID = 0;

const spots: Spot[] = [];
const edges: EdgeRecord[] = [];

// A straight run of spots, one per frame, drifting along x at the given speed
function addRun(firstId: SpotId, startFrame: number, count: number, x0: number, dx: number, y: number): void {
  for (let i = 0; i < count; i++) {
    spots.push({
      id: firstId + i,
      trackId: TRACK_ID,
      frame: startFrame + i,
      position: { x: x0 + dx * i, y, z: 0 },
      quality: 10,
      intensities: [{ channel: 1, mean: 100 + i }],
      shape: { RADIUS: 4.5, AREA: 63.6 },
    });
    if (i > 0) {
      edges.push({ sourceId: firstId + i - 1, targetId: firstId + i, trackId: TRACK_ID });
    }
  }
}

// Mother cell, frames 0-24, then two daughters from frame 25
addRun(1, 0, 25, 0, 0.5, 0);
addRun(101, 25, 30, 12, 0.4, 2);
addRun(201, 25, 30, 12, -0.3, -2);
edges.push({ sourceId: 25, targetId: 101, trackId: TRACK_ID });
edges.push({ sourceId: 25, targetId: 201, trackId: TRACK_ID });

const logger = createConsoleLogger();

console.log('Subtrack Lineage - Basic Example');
console.log('================================\n');

const report = analyzeLocation(
  { spots, edges },
  { thresholds: { maxSplitsAllowed: 1, minTrackDurationFrames: 20 }, logger }
);

console.log(`\nProcessed tracks: ${report.processedTrackIds.join(', ') || 'none'}`);
console.log(`Subtracks: ${report.subtrackCount}\n`);

const encoded = encodeLocationTables(report.tables, report.layout);
console.log('Lineage table:');
console.log(encoded.lineage);

for (const [trackId, rows] of groupLineageByTrack(report.tables.lineage)) {
  const tree = buildLineageTree(rows);
  console.log(`Track ${trackId}: ${tree.size} subtracks, ${tree.leaves.length} leaves`);
  console.log(renderLineageTree(tree));
}
