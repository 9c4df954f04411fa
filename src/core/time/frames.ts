/**
 * Frame Arithmetic
 *
 * Time in this library is measured in frame indices. A range is inclusive at
 * both ends, so a single-frame range has a span of one.
 */

/**
 * Inclusive frame range
 */
export interface FrameRange {
  readonly start: number;
  readonly stop: number;
}

/**
 * Number of frames covered by a range (stop - start + 1)
 */
export function frameSpan(range: FrameRange): number {
  return range.stop - range.start + 1;
}

/**
 * Frames elapsed between two timepoints
 */
export function framesElapsed(from: number, to: number): number {
  return to - from;
}

/**
 * Smallest range containing every frame; null for an empty input
 */
export function frameRangeOf(frames: Iterable<number>): FrameRange | null {
  let start = Number.POSITIVE_INFINITY;
  let stop = Number.NEGATIVE_INFINITY;

  for (const frame of frames) {
    if (frame < start) start = frame;
    if (frame > stop) stop = frame;
  }

  return start <= stop ? { start, stop } : null;
}

/**
 * Check if a value is a usable frame index
 */
export function isValidFrame(frame: number): boolean {
  return Number.isInteger(frame) && frame >= 0;
}
