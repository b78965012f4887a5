import type { DistanceSpeedPoint, TelemetrySample, TripMetrics } from '@kinetrace/domain';

export function summarizeTrip(samples: readonly TelemetrySample[]): TripMetrics {
  if (samples.length === 0) {
    throw new RangeError('cannot summarize an empty trip');
  }

  // Strict comparison keeps the first index on ties.
  let maxIndex = 0;
  for (let i = 1; i < samples.length; i++) {
    if (samples[i].speedKph > samples[maxIndex].speedKph) maxIndex = i;
  }

  const peak = samples[maxIndex];
  return {
    totalDistanceKm: samples[samples.length - 1].cumulativeDistanceKm,
    maxSpeedKph: peak.speedKph,
    maxSpeedIndex: maxIndex,
    maxSpeedDistanceKm: peak.cumulativeDistanceKm,
    maxSpeedTimestamp: peak.timestamp,
  };
}

export function speedByDistance(samples: readonly TelemetrySample[]): DistanceSpeedPoint[] {
  return samples.map((s) => ({ cumulativeDistanceKm: s.cumulativeDistanceKm, speedKph: s.speedKph }));
}
