import type { DecelerationPoint, StopEvent, TelemetrySample } from '@kinetrace/domain';
import type { CumulativeDistanceIndex } from './nearest-sample.js';

/**
 * Samples from roughly `windowM` meters before the stop (or the trip start) through
 * the stop, with distance re-based so the window's lowest cumulative distance is 0.
 * Returns null for an empty window.
 */
export function extractDecelerationWindow(
  samples: readonly TelemetrySample[],
  index: CumulativeDistanceIndex,
  stop: StopEvent,
  windowM: number,
): DecelerationPoint[] | null {
  if (!Number.isFinite(windowM) || windowM <= 0) {
    throw new RangeError(`deceleration window must be positive, got ${windowM}`);
  }

  const windowStart = index.nearest(stop.distanceKm - windowM / 1000, stop.index);
  const window = samples.slice(windowStart, stop.index + 1);
  if (window.length === 0) return null;

  const baseKm = window.reduce((min, s) => Math.min(min, s.cumulativeDistanceKm), Infinity);
  return window.map((s) => ({
    relativeDistanceM: (s.cumulativeDistanceKm - baseKm) * 1000,
    speedKph: s.speedKph,
  }));
}
