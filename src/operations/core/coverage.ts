/**
 * Interval coverage for assembled objects
 *
 * Every record of an object claims a 0-based half-open interval
 * `[objectBegin - 1, objectEnd)`. The object is covered when the intervals,
 * sorted by start, abut exactly: no position missing, none claimed twice.
 *
 * @module coverage
 */

/**
 * 0-based half-open interval on an object
 */
export type Interval = readonly [start: number, end: number];

/**
 * Where sorted intervals first fail to abut
 */
export interface CoverageDefect {
  readonly kind: "gap" | "overlap";
  /** 1-based first object position of the defect */
  readonly position: number;
  /** 1-based inclusive length of the gap or overlap */
  readonly length: number;
}

/**
 * Convert 1-based inclusive object coordinates to an interval
 */
export function toInterval(begin: number, end: number): Interval {
  return [begin - 1, end];
}

function compareIntervals(a: Interval, b: Interval): number {
  return a[0] - b[0] || a[1] - b[1];
}

/**
 * Find the first gap or overlap between adjacent intervals
 *
 * @returns undefined when the intervals tile their span exactly
 *
 * @example
 * ```typescript
 * findCoverageDefect([[0, 10], [12, 20]]); // { kind: "gap", position: 11, length: 2 }
 * findCoverageDefect([[0, 10], [10, 20]]); // undefined
 * ```
 */
export function findCoverageDefect(intervals: readonly Interval[]): CoverageDefect | undefined {
  const sorted = [...intervals].sort(compareIntervals);

  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (previous === undefined || current === undefined) continue;

    const [, previousEnd] = previous;
    const [currentStart] = current;

    if (previousEnd < currentStart) {
      return { kind: "gap", position: previousEnd + 1, length: currentStart - previousEnd };
    }
    if (previousEnd > currentStart) {
      return { kind: "overlap", position: currentStart + 1, length: previousEnd - currentStart };
    }
  }

  return undefined;
}

/**
 * Whether the intervals partition their span exactly once
 *
 * An empty or single-interval set is covered.
 */
export function isCovered(intervals: readonly Interval[]): boolean {
  return findCoverageDefect(intervals) === undefined;
}
