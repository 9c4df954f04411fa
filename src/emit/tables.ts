/**
 * Lineage Table Emitter
 *
 * Serializes decomposed tracks into three normalized relations:
 * - subtrack statistics: one row per subtrack with every kinematic metric
 * - subtrack edges: every input edge with the subtrack it was assigned to
 * - subtrack lineage: one row per subtrack, enough to rebuild the tree
 *
 * Rows are produced per track and merged once per location. Column sets are
 * fixed, apart from the per-channel intensity and shape descriptor columns,
 * which follow the location's spot table.
 */

import { frameSpan } from '../core/time/frames.js';
import type { EdgeKindValue, MeasuredEdge } from '../core/types/edge.js';
import type { ShapeDescriptorValue, Spot, TrackId } from '../core/types/spot.js';
import { SHAPE_DESCRIPTORS } from '../core/types/spot.js';
import type { LineageDecomposition } from '../core/types/subtrack.js';
import { formatLineagePath, formatSubtrackId, parseLineagePath } from '../core/types/subtrack.js';
import type { SubtrackStatistics } from '../stats/kinematics.js';
import type { CellValue, Table } from './csv.js';
import { encodeTable, numericCell, parseHeaderedTable } from './csv.js';

/**
 * One row of the subtrack edges relation
 */
export interface EdgeRow {
  readonly subtrackId: string;
  readonly trackId: TrackId;
  readonly kind: EdgeKindValue;
  readonly edge: MeasuredEdge;
}

/**
 * One row of the subtrack lineage relation
 */
export interface LineageRow {
  readonly subtrackId: string;
  readonly trackId: TrackId;
  readonly subtrackIndex: number;
  readonly parentSubtrackId: string | undefined;
  readonly generation: number;
  readonly splitFrame: number | undefined;
  readonly startFrame: number;
  readonly endFrame: number;
  readonly duration: number;
  readonly numberSpots: number;
  readonly numberChildren: number;
  readonly pathFromRoot: readonly number[];
}

/**
 * The three relations of one track
 */
export interface TrackTables {
  readonly trackId: TrackId;
  readonly statistics: readonly SubtrackStatistics[];
  readonly edges: readonly EdgeRow[];
  readonly lineage: readonly LineageRow[];
}

/**
 * The three relations of one location
 */
export interface LocationTables {
  readonly statistics: readonly SubtrackStatistics[];
  readonly edges: readonly EdgeRow[];
  readonly lineage: readonly LineageRow[];
}

/**
 * Variable part of the statistics column set
 */
export interface TableLayout {
  /** Intensity channels, ascending */
  readonly channels: readonly number[];
  /** Shape descriptors, in canonical order */
  readonly shapeDescriptors: readonly ShapeDescriptorValue[];
}

/**
 * Encoded relations of one location
 */
export interface EncodedLocationTables {
  readonly statistics: string;
  readonly edges: string;
  readonly lineage: string;
}

interface ColumnSpec<Row> {
  readonly header: string;
  readonly value: (row: Row) => CellValue;
}

const STATISTICS_COLUMNS: readonly ColumnSpec<SubtrackStatistics>[] = [
  { header: 'SUBTRACK_ID', value: (s) => s.subtrackId },
  { header: 'TRACK_ID', value: (s) => s.trackId },
  { header: 'SUBTRACK_INDEX', value: (s) => s.subtrackIndex },
  { header: 'GENERATION', value: (s) => s.generation },
  { header: 'START_FRAME', value: (s) => s.startFrame },
  { header: 'END_FRAME', value: (s) => s.endFrame },
  { header: 'NUMBER_SPOTS', value: (s) => s.numberSpots },
  { header: 'NUMBER_EDGES', value: (s) => s.numberEdges },
  { header: 'SUBTRACK_DURATION', value: (s) => s.duration },
  { header: 'SUBTRACK_DISPLACEMENT', value: (s) => s.netDisplacement },
  { header: 'TOTAL_DISTANCE_TRAVELED', value: (s) => s.totalDistance },
  { header: 'MAX_DISTANCE_TRAVELED', value: (s) => s.maxDistance },
  { header: 'SUBTRACK_MEAN_SPEED', value: (s) => s.meanSpeed },
  { header: 'SUBTRACK_MIN_SPEED', value: (s) => s.minSpeed },
  { header: 'SUBTRACK_MAX_SPEED', value: (s) => s.maxSpeed },
  { header: 'SUBTRACK_MEDIAN_SPEED', value: (s) => s.medianSpeed },
  { header: 'SUBTRACK_STD_SPEED', value: (s) => s.stdSpeed },
  { header: 'CONFINEMENT_RATIO', value: (s) => s.confinementRatio },
  { header: 'LINEARITY_OF_FORWARD_PROGRESSION', value: (s) => s.linearityOfForwardProgression },
  { header: 'MEAN_STRAIGHT_LINE_SPEED', value: (s) => s.meanStraightLineSpeed },
  { header: 'MEAN_DIRECTIONAL_CHANGE_RATE', value: (s) => s.meanDirectionalChangeRate },
  { header: 'OUTREACH_RATIO', value: (s) => s.outreachRatio },
  { header: 'TORTUOSITY', value: (s) => s.tortuosity },
  { header: 'SUBTRACK_X_LOCATION', value: (s) => s.meanX },
  { header: 'SUBTRACK_Y_LOCATION', value: (s) => s.meanY },
  { header: 'SUBTRACK_Z_LOCATION', value: (s) => s.meanZ },
  { header: 'START_X', value: (s) => s.startX },
  { header: 'START_Y', value: (s) => s.startY },
  { header: 'END_X', value: (s) => s.endX },
  { header: 'END_Y', value: (s) => s.endY },
  { header: 'SUBTRACK_MEAN_QUALITY', value: (s) => s.meanQuality },
];

const EDGE_COLUMNS: readonly ColumnSpec<EdgeRow>[] = [
  { header: 'SUBTRACK_ID', value: (r) => r.subtrackId },
  { header: 'TRACK_ID', value: (r) => r.trackId },
  { header: 'SPOT_SOURCE_ID', value: (r) => r.edge.sourceId },
  { header: 'SPOT_TARGET_ID', value: (r) => r.edge.targetId },
  { header: 'EDGE_KIND', value: (r) => r.kind },
  { header: 'SOURCE_FRAME', value: (r) => r.edge.sourceFrame },
  { header: 'TARGET_FRAME', value: (r) => r.edge.targetFrame },
  { header: 'DISPLACEMENT', value: (r) => r.edge.displacement },
  { header: 'SPEED', value: (r) => r.edge.speed },
  { header: 'DIRECTIONAL_CHANGE_RATE', value: (r) => r.edge.directionalChangeRate },
];

const LINEAGE_COLUMNS: readonly ColumnSpec<LineageRow>[] = [
  { header: 'SUBTRACK_ID', value: (r) => r.subtrackId },
  { header: 'TRACK_ID', value: (r) => r.trackId },
  { header: 'SUBTRACK_INDEX', value: (r) => r.subtrackIndex },
  { header: 'PARENT_SUBTRACK_ID', value: (r) => r.parentSubtrackId },
  { header: 'GENERATION', value: (r) => r.generation },
  { header: 'SPLIT_FRAME', value: (r) => r.splitFrame },
  { header: 'START_FRAME', value: (r) => r.startFrame },
  { header: 'END_FRAME', value: (r) => r.endFrame },
  { header: 'DURATION', value: (r) => r.duration },
  { header: 'NUMBER_SPOTS', value: (r) => r.numberSpots },
  { header: 'NUMBER_CHILDREN', value: (r) => r.numberChildren },
  { header: 'PATH_FROM_ROOT', value: (r) => formatLineagePath(r.pathFromRoot) },
];

function statisticsColumns(layout: TableLayout): ColumnSpec<SubtrackStatistics>[] {
  return [
    ...STATISTICS_COLUMNS,
    ...layout.channels.map((channel) => ({
      header: `SUBTRACK_MEAN_INTENSITY_CH${channel}`,
      value: (s: SubtrackStatistics) => s.meanIntensityByChannel.get(channel),
    })),
    ...layout.shapeDescriptors.map((descriptor) => ({
      header: `SUBTRACK_MEAN_${descriptor}`,
      value: (s: SubtrackStatistics) => s.meanShape[descriptor],
    })),
  ];
}

function buildTable<Row>(specs: readonly ColumnSpec<Row>[], rows: readonly Row[]): Table {
  return {
    columns: specs.map((spec) => spec.header),
    rows: rows.map((row) => specs.map((spec) => spec.value(row))),
  };
}

export const EDGE_TABLE_COLUMNS: readonly string[] = EDGE_COLUMNS.map((c) => c.header);
export const LINEAGE_TABLE_COLUMNS: readonly string[] = LINEAGE_COLUMNS.map((c) => c.header);

/**
 * Header of the statistics relation for a layout
 */
export function statisticsTableColumns(layout: TableLayout): string[] {
  return statisticsColumns(layout).map((c) => c.header);
}

/**
 * Derive the variable columns from a location's spots
 */
export function layoutFromSpots(spots: readonly Spot[]): TableLayout {
  const channels = new Set<number>();
  const descriptors = new Set<ShapeDescriptorValue>();

  for (const spot of spots) {
    for (const intensity of spot.intensities) channels.add(intensity.channel);
    for (const descriptor of SHAPE_DESCRIPTORS) {
      if (spot.shape[descriptor] !== undefined) descriptors.add(descriptor);
    }
  }

  return {
    channels: Array.from(channels).sort((a, b) => a - b),
    shapeDescriptors: SHAPE_DESCRIPTORS.filter((d) => descriptors.has(d)),
  };
}

/**
 * Produce the three relations of one decomposed track
 *
 * @param statistics - one entry per subtrack, in decomposition order
 */
export function emitTrackTables(
  decomposition: LineageDecomposition,
  statistics: readonly SubtrackStatistics[]
): TrackTables {
  const { trackId } = decomposition;

  const edges: EdgeRow[] = decomposition.edges.map((assigned) => ({
    subtrackId: formatSubtrackId(trackId, assigned.subtrackIndex),
    trackId,
    kind: assigned.kind,
    edge: assigned.edge,
  }));

  const lineage: LineageRow[] = decomposition.subtracks.map((subtrack) => ({
    subtrackId: formatSubtrackId(trackId, subtrack.index),
    trackId,
    subtrackIndex: subtrack.index,
    parentSubtrackId:
      subtrack.parentIndex === undefined ? undefined : formatSubtrackId(trackId, subtrack.parentIndex),
    generation: subtrack.generation,
    splitFrame: subtrack.splitFrame,
    startFrame: subtrack.startFrame,
    endFrame: subtrack.endFrame,
    duration: frameSpan({ start: subtrack.startFrame, stop: subtrack.endFrame }),
    numberSpots: subtrack.spotIds.length,
    numberChildren: subtrack.childIndices.length,
    pathFromRoot: subtrack.pathFromRoot,
  }));

  return { trackId, statistics, edges, lineage };
}

/**
 * Combine per-track relations in ascending track id order
 */
export function mergeLocationTables(tracks: readonly TrackTables[]): LocationTables {
  const ordered = [...tracks].sort((a, b) => a.trackId - b.trackId);
  return {
    statistics: ordered.flatMap((t) => t.statistics),
    edges: ordered.flatMap((t) => t.edges),
    lineage: ordered.flatMap((t) => t.lineage),
  };
}

export function statisticsTable(rows: readonly SubtrackStatistics[], layout: TableLayout): Table {
  return buildTable(statisticsColumns(layout), rows);
}

export function edgesTable(rows: readonly EdgeRow[]): Table {
  return buildTable(EDGE_COLUMNS, rows);
}

export function lineageTable(rows: readonly LineageRow[]): Table {
  return buildTable(LINEAGE_COLUMNS, rows);
}

/**
 * Encode all three relations of a location
 *
 * @throws NumericPolicyError when a metric is NaN or infinite
 */
export function encodeLocationTables(
  tables: LocationTables,
  layout: TableLayout
): EncodedLocationTables {
  return {
    statistics: encodeTable(statisticsTable(tables.statistics, layout)),
    edges: encodeTable(edgesTable(tables.edges)),
    lineage: encodeTable(lineageTable(tables.lineage)),
  };
}

/**
 * Read an encoded lineage relation back into rows
 *
 * @throws Error when a required column is missing or a row is unreadable
 */
export function decodeLineageTable(text: string): LineageRow[] {
  const { columns, records } = parseHeaderedTable(text);
  const missing = LINEAGE_TABLE_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new Error(`Lineage table is missing columns: ${missing.join(', ')}`);
  }

  return records.map((record, i) => {
    const required = (column: string): number => {
      const value = numericCell(record, column);
      if (value === undefined) {
        throw new Error(`Lineage row ${i + 1} has no numeric ${column}`);
      }
      return value;
    };

    const pathFromRoot = parseLineagePath(record.get('PATH_FROM_ROOT') ?? '');
    if (!pathFromRoot) {
      throw new Error(`Lineage row ${i + 1} has an unreadable PATH_FROM_ROOT`);
    }

    const parentSubtrackId = record.get('PARENT_SUBTRACK_ID') ?? '';

    return {
      subtrackId: record.get('SUBTRACK_ID') ?? '',
      trackId: required('TRACK_ID'),
      subtrackIndex: required('SUBTRACK_INDEX'),
      parentSubtrackId: parentSubtrackId === '' ? undefined : parentSubtrackId,
      generation: required('GENERATION'),
      splitFrame: numericCell(record, 'SPLIT_FRAME'),
      startFrame: required('START_FRAME'),
      endFrame: required('END_FRAME'),
      duration: required('DURATION'),
      numberSpots: required('NUMBER_SPOTS'),
      numberChildren: required('NUMBER_CHILDREN'),
      pathFromRoot,
    };
  });
}

/**
 * Group lineage rows by track, tracks in ascending order
 */
export function groupLineageByTrack(rows: readonly LineageRow[]): Map<TrackId, LineageRow[]> {
  const groups = new Map<TrackId, LineageRow[]>();
  for (const row of [...rows].sort((a, b) => a.trackId - b.trackId)) {
    const list = groups.get(row.trackId) ?? [];
    list.push(row);
    groups.set(row.trackId, list);
  }
  return groups;
}
