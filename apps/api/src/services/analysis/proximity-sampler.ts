import type { ProximitySample, StopEvent, TelemetrySample } from '@kinetrace/domain';
import type { CumulativeDistanceIndex } from './nearest-sample.js';

/** Ascending, de-duplicated offsets; rejects anything that is not a positive finite number. */
export function normalizeOffsets(offsetsM: readonly number[]): number[] {
  for (const offset of offsetsM) {
    if (!Number.isFinite(offset) || offset <= 0) {
      throw new RangeError(`offset must be a positive number of meters, got ${offset}`);
    }
  }
  return [...new Set(offsetsM)].sort((a, b) => a - b);
}

/**
 * For each offset, the sample up to and including the stop that lies closest to
 * `offset` meters before it. Offsets reaching back past the trip start are skipped.
 */
export function sampleProximity(
  samples: readonly TelemetrySample[],
  index: CumulativeDistanceIndex,
  stop: StopEvent,
  offsetsM: readonly number[],
): ProximitySample[] {
  const found: ProximitySample[] = [];
  for (const offsetM of normalizeOffsets(offsetsM)) {
    const targetKm = stop.distanceKm - offsetM / 1000;
    if (targetKm <= 0) continue;

    const matchedIndex = index.nearest(targetKm, stop.index);
    const matched = samples[matchedIndex];
    found.push({
      stop,
      offsetM,
      matchedIndex,
      matchedDistanceKm: matched.cumulativeDistanceKm,
      matchedSpeedKph: matched.speedKph,
      matchedTimestamp: matched.timestamp,
    });
  }
  return found;
}
