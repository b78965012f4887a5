import type { TelemetrySample } from '@kinetrace/domain';

/**
 * Nearest-neighbour lookup over cumulative distance.
 *
 * Ties resolve to the earliest index. The key is non-decreasing unless the log
 * contains negative increments, in which case lookups fall back to a linear scan.
 */
export class CumulativeDistanceIndex {
  private readonly keys: readonly number[];
  readonly monotonic: boolean;

  constructor(samples: readonly TelemetrySample[]) {
    this.keys = samples.map((s) => s.cumulativeDistanceKm);
    this.monotonic = this.keys.every((key, i) => i === 0 || key >= this.keys[i - 1]);
  }

  get size(): number {
    return this.keys.length;
  }

  /** Index in `0..lastIndex` whose cumulative distance is closest to `targetKm`. */
  nearest(targetKm: number, lastIndex: number): number {
    if (!Number.isInteger(lastIndex) || lastIndex < 0 || lastIndex >= this.keys.length) {
      throw new RangeError(`lastIndex ${lastIndex} outside 0..${this.keys.length - 1}`);
    }
    return this.monotonic ? this.searchSorted(targetKm, lastIndex) : this.scan(targetKm, lastIndex);
  }

  private searchSorted(targetKm: number, lastIndex: number): number {
    const above = this.lowerBound(targetKm, lastIndex);
    if (above > lastIndex) return this.lowerBound(this.keys[lastIndex], lastIndex);
    if (above === 0) return 0;

    const below = this.lowerBound(this.keys[above - 1], above - 1);
    const belowGap = Math.abs(this.keys[below] - targetKm);
    const aboveGap = Math.abs(this.keys[above] - targetKm);
    return belowGap <= aboveGap ? below : above;
  }

  /** First index in `0..lastIndex` with key >= value, or `lastIndex + 1`. */
  private lowerBound(value: number, lastIndex: number): number {
    let lo = 0;
    let hi = lastIndex + 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.keys[mid] < value) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  private scan(targetKm: number, lastIndex: number): number {
    let best = 0;
    let bestGap = Math.abs(this.keys[0] - targetKm);
    for (let i = 1; i <= lastIndex; i++) {
      const gap = Math.abs(this.keys[i] - targetKm);
      if (gap < bestGap) {
        best = i;
        bestGap = gap;
      }
    }
    return best;
  }
}
