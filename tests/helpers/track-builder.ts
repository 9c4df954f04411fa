/**
 * Builds spot and edge tables for tests.
 */

import type { EdgeRecord } from '../../src/core/types/edge.js';
import type { Position, Spot, SpotId, TrackId } from '../../src/core/types/spot.js';

export interface BuiltTrack {
  readonly trackId: TrackId;
  readonly spots: Spot[];
  readonly edges: EdgeRecord[];
}

type SpotExtras = Partial<Pick<Spot, 'quality' | 'intensities' | 'shape'>>;
type EdgeMeasurements = Partial<Pick<EdgeRecord, 'displacement' | 'speed' | 'directionalChangeRate'>>;

export class TrackBuilder {
  private spots: Spot[] = [];
  private edges: EdgeRecord[] = [];

  constructor(readonly trackId: TrackId = 1) {}

  spot(id: SpotId, frame: number, position: Partial<Position> = {}, extras: SpotExtras = {}): this {
    this.spots.push({
      id,
      trackId: this.trackId,
      frame,
      position: { x: position.x ?? 0, y: position.y ?? 0, z: position.z ?? 0 },
      quality: extras.quality,
      intensities: extras.intensities ?? [],
      shape: extras.shape ?? {},
    });
    return this;
  }

  link(sourceId: SpotId, targetId: SpotId, measurements: EdgeMeasurements = {}): this {
    this.edges.push({ sourceId, targetId, trackId: this.trackId, ...measurements });
    return this;
  }

  /**
   * Add `count` consecutive spots starting at `firstId`, one per frame, each
   * linked to the next. Spot i sits at x = startFrame + i unless `place` says otherwise.
   */
  chain(
    firstId: SpotId,
    startFrame: number,
    count: number,
    place: (i: number) => Partial<Position> = (i) => ({ x: startFrame + i })
  ): this {
    for (let i = 0; i < count; i++) {
      this.spot(firstId + i, startFrame + i, place(i));
      if (i > 0) this.link(firstId + i - 1, firstId + i);
    }
    return this;
  }

  build(): BuiltTrack {
    return { trackId: this.trackId, spots: [...this.spots], edges: [...this.edges] };
  }
}

/**
 * Two-level division tree:
 *
 *   Sub_1 (1..11, frames 0-10) ──┬── Sub_2 (100..182, frames 11-93)
 *                                └── Sub_3 (200..203, frames 11-14) ──┬── Sub_4 (300..315, frames 15-30)
 *                                                                      └── Sub_5 (400..405, frames 15-20)
 */
export function twoLevelDivision(trackId: TrackId = 1): BuiltTrack {
  return new TrackBuilder(trackId)
    .chain(1, 0, 11)
    .chain(100, 11, 83)
    .chain(200, 11, 4)
    .chain(300, 15, 16)
    .chain(400, 15, 6)
    .link(11, 100)
    .link(11, 200)
    .link(203, 300)
    .link(203, 400)
    .build();
}

/**
 * Straight line of `count` spots, one frame apart and one unit apart on x
 */
export function straightTrack(trackId: TrackId, firstId: SpotId, count: number): BuiltTrack {
  return new TrackBuilder(trackId).chain(firstId, 0, count, (i) => ({ x: i })).build();
}
