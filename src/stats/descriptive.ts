/**
 * Descriptive statistics over plain number lists.
 *
 * Every function returns undefined for an empty input instead of NaN.
 */

export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

export function minimum(values: readonly number[]): number | undefined {
  let lowest: number | undefined;
  for (const value of values) {
    if (lowest === undefined || value < lowest) lowest = value;
  }
  return lowest;
}

export function maximum(values: readonly number[]): number | undefined {
  let highest: number | undefined;
  for (const value of values) {
    if (highest === undefined || value > highest) highest = value;
  }
  return highest;
}

export function median(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle];
  const lower = sorted[middle - 1];
  if (upper === undefined) return undefined;
  return sorted.length % 2 === 1 || lower === undefined ? upper : (lower + upper) / 2;
}

/**
 * Population standard deviation (divides by n)
 */
export function standardDeviation(values: readonly number[]): number | undefined {
  const center = mean(values);
  if (center === undefined) return undefined;
  let squares = 0;
  for (const value of values) squares += (value - center) ** 2;
  return Math.sqrt(squares / values.length);
}

export interface DescriptiveSummary {
  readonly mean: number;
  readonly min: number;
  readonly max: number;
  readonly median: number;
  readonly std: number;
}

/**
 * All five summaries at once; undefined for an empty input
 */
export function summarizeValues(values: readonly number[]): DescriptiveSummary | undefined {
  const avg = mean(values);
  const min = minimum(values);
  const max = maximum(values);
  const mid = median(values);
  const std = standardDeviation(values);

  if (avg === undefined || min === undefined || max === undefined || mid === undefined || std === undefined) {
    return undefined;
  }

  return { mean: avg, min, max, median: mid, std };
}

/**
 * Divide, mapping a zero denominator to a caller-chosen fallback
 */
export function safeRatio<T extends number | undefined>(
  numerator: number,
  denominator: number,
  whenZero: T
): number | T {
  return denominator === 0 ? whenZero : numerator / denominator;
}
