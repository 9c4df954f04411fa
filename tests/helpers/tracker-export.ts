/**
 * Writes built tracks to disk in the tracker's export layout.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { BuiltTrack } from './track-builder.js';

const cell = (value: number | undefined): string => (value === undefined ? '' : String(value));

export function spotsCsv(tracks: readonly BuiltTrack[]): string {
  const lines = [
    'LABEL,ID,TRACK_ID,QUALITY,POSITION_X,POSITION_Y,POSITION_Z,FRAME,MEAN_INTENSITY_CH1',
    'Label,Spot ID,Track ID,Quality,X,Y,Z,Frame,Mean intensity ch1',
    'Label,Spot ID,Track ID,Quality,X,Y,Z,Frame,Mean ch1',
    ',,,(quality),(micron),(micron),(micron),,(counts)',
  ];
  for (const track of tracks) {
    for (const spot of track.spots) {
      const intensity = spot.intensities.find((i) => i.channel === 1);
      lines.push(
        [
          `ID${spot.id}`,
          spot.id,
          spot.trackId,
          cell(spot.quality),
          spot.position.x,
          spot.position.y,
          spot.position.z,
          spot.frame,
          cell(intensity?.mean),
        ].join(',')
      );
    }
  }
  return lines.join('\n') + '\n';
}

export function edgesCsv(tracks: readonly BuiltTrack[]): string {
  const lines = [
    'LABEL,TRACK_ID,SPOT_SOURCE_ID,SPOT_TARGET_ID',
    'Label,Track ID,Source spot ID,Target spot ID',
    'Label,Track ID,Source ID,Target ID',
    ',,,',
  ];
  for (const track of tracks) {
    for (const edge of track.edges) {
      lines.push([`ID${edge.sourceId} → ID${edge.targetId}`, edge.trackId, edge.sourceId, edge.targetId].join(','));
    }
  }
  return lines.join('\n') + '\n';
}

export function tracksCsv(trackIds: readonly number[]): string {
  return ['LABEL,TRACK_ID', 'Label,Track ID', ...trackIds.map((id) => `Track_${id},${id}`)].join('\n') + '\n';
}

export interface ExportOptions {
  readonly baseName?: string;
  /** Track ids for the tracks table; no tracks table when absent */
  readonly trackIds?: readonly number[];
  /** Write `<base>-spots.csv` instead of `<base>-all-spots.csv` */
  readonly plainSpotsName?: boolean;
  readonly withoutEdges?: boolean;
}

/**
 * Write `<location>/Tracking Result/` under `root` and return its path
 */
export async function writeTrackerExport(
  root: string,
  location: string,
  tracks: readonly BuiltTrack[],
  options: ExportOptions = {}
): Promise<string> {
  const folder = join(root, location, 'Tracking Result');
  const baseName = options.baseName ?? location.replace(/_cropped$/, '');
  await mkdir(folder, { recursive: true });

  const spotsName = options.plainSpotsName ? `${baseName}-spots.csv` : `${baseName}-all-spots.csv`;
  await writeFile(join(folder, spotsName), spotsCsv(tracks), 'utf8');
  if (!options.withoutEdges) {
    await writeFile(join(folder, `${baseName}-edges.csv`), edgesCsv(tracks), 'utf8');
  }
  if (options.trackIds) {
    await writeFile(join(folder, `${baseName}-tracks.csv`), tracksCsv(options.trackIds), 'utf8');
  }
  return folder;
}

export async function makeTempRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'subtrack-lineage-'));
}

export async function removeTempRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}
