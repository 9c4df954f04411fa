/**
 * Tracker Export Parsing
 *
 * Reads the spot, edge and track tables a tracker writes for one location.
 * Columns are located by header name. The exports carry extra label and unit
 * rows under the header; any row whose identifier cell is not a number is
 * skipped.
 */

import { LocationInputError } from '../core/errors.js';
import type { EdgeRecord } from '../core/types/edge.js';
import type { ChannelIntensity, ShapeDescriptorValue, Spot, TrackId } from '../core/types/spot.js';
import { SHAPE_DESCRIPTORS } from '../core/types/spot.js';
import type { HeaderedRows } from '../emit/csv.js';
import { numericCell, parseHeaderedTable } from '../emit/csv.js';

const SPOT_REQUIRED_COLUMNS = ['ID', 'TRACK_ID', 'FRAME', 'POSITION_X', 'POSITION_Y'] as const;
const EDGE_REQUIRED_COLUMNS = ['TRACK_ID', 'SPOT_SOURCE_ID', 'SPOT_TARGET_ID'] as const;

const INTENSITY_COLUMN = /^(MEAN|MEDIAN|MIN|MAX|TOTAL|STD)_INTENSITY_CH(\d+)$/;

function requireColumns(source: string, table: HeaderedRows, required: readonly string[]): void {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new LocationInputError(source, `missing columns ${missing.join(', ')}`);
  }
}

/**
 * Channel numbers with a mean intensity column, ascending
 */
export function intensityChannels(columns: readonly string[]): number[] {
  const channels = new Set<number>();
  for (const column of columns) {
    const match = INTENSITY_COLUMN.exec(column);
    if (match && match[1] === 'MEAN') {
      channels.add(Number(match[2]));
    }
  }
  return Array.from(channels).sort((a, b) => a - b);
}

function readIntensities(
  record: ReadonlyMap<string, string>,
  channels: readonly number[]
): ChannelIntensity[] {
  const intensities: ChannelIntensity[] = [];
  for (const channel of channels) {
    const mean = numericCell(record, `MEAN_INTENSITY_CH${channel}`);
    if (mean === undefined) continue;
    intensities.push({
      channel,
      mean,
      median: numericCell(record, `MEDIAN_INTENSITY_CH${channel}`),
      min: numericCell(record, `MIN_INTENSITY_CH${channel}`),
      max: numericCell(record, `MAX_INTENSITY_CH${channel}`),
      total: numericCell(record, `TOTAL_INTENSITY_CH${channel}`),
      std: numericCell(record, `STD_INTENSITY_CH${channel}`),
    });
  }
  return intensities;
}

function readShape(
  record: ReadonlyMap<string, string>,
  descriptors: readonly ShapeDescriptorValue[]
): Partial<Record<ShapeDescriptorValue, number>> {
  const shape: Partial<Record<ShapeDescriptorValue, number>> = {};
  for (const descriptor of descriptors) {
    const value = numericCell(record, descriptor);
    if (value !== undefined) shape[descriptor] = value;
  }
  return shape;
}

/**
 * Parse a spot table
 *
 * Spots without a track id are left out; they were never linked.
 *
 * @param source - file name used in error messages
 * @throws LocationInputError when a required column is missing or a linked
 * spot has no frame or position
 */
export function parseSpotTable(text: string, source: string): Spot[] {
  const table = parseHeaderedTable(text);
  requireColumns(source, table, SPOT_REQUIRED_COLUMNS);

  const channels = intensityChannels(table.columns);
  const descriptors = SHAPE_DESCRIPTORS.filter((d) => table.columns.includes(d));
  const spots: Spot[] = [];

  for (const record of table.records) {
    const id = numericCell(record, 'ID');
    const trackId = numericCell(record, 'TRACK_ID');
    if (id === undefined || trackId === undefined) continue;

    const frame = numericCell(record, 'FRAME');
    const x = numericCell(record, 'POSITION_X');
    const y = numericCell(record, 'POSITION_Y');
    if (frame === undefined || x === undefined || y === undefined) {
      throw new LocationInputError(source, `spot ${id} has no frame or position`);
    }

    spots.push({
      id,
      trackId,
      frame,
      position: { x, y, z: numericCell(record, 'POSITION_Z') ?? 0 },
      quality: numericCell(record, 'QUALITY'),
      intensities: readIntensities(record, channels),
      shape: readShape(record, descriptors),
    });
  }

  return spots;
}

/**
 * Parse an edge table
 *
 * @throws LocationInputError when a required column is missing or an edge has
 * no track id or target
 */
export function parseEdgeTable(text: string, source: string): EdgeRecord[] {
  const table = parseHeaderedTable(text);
  requireColumns(source, table, EDGE_REQUIRED_COLUMNS);

  const edges: EdgeRecord[] = [];
  for (const record of table.records) {
    const sourceId = numericCell(record, 'SPOT_SOURCE_ID');
    if (sourceId === undefined) continue;

    const targetId = numericCell(record, 'SPOT_TARGET_ID');
    const trackId = numericCell(record, 'TRACK_ID');
    if (targetId === undefined || trackId === undefined) {
      throw new LocationInputError(source, `edge from spot ${sourceId} has no target or track`);
    }

    edges.push({
      sourceId,
      targetId,
      trackId,
      displacement: numericCell(record, 'DISPLACEMENT'),
      speed: numericCell(record, 'SPEED'),
      directionalChangeRate: numericCell(record, 'DIRECTIONAL_CHANGE_RATE'),
    });
  }

  return edges;
}

/**
 * Parse a track table into the ids it lists, ascending and unique
 */
export function parseTrackTable(text: string, source: string): TrackId[] {
  const table = parseHeaderedTable(text);
  requireColumns(source, table, ['TRACK_ID']);

  const ids = new Set<TrackId>();
  for (const record of table.records) {
    const id = numericCell(record, 'TRACK_ID');
    if (id !== undefined) ids.add(id);
  }
  return Array.from(ids).sort((a, b) => a - b);
}
