import type { StopEvent, TelemetrySample } from '@kinetrace/domain';

/** Falling edges only: a run of zero-speed samples yields one event at its first sample. */
export function detectStops(samples: readonly TelemetrySample[]): StopEvent[] {
  const stops: StopEvent[] = [];
  for (let index = 1; index < samples.length; index++) {
    const current = samples[index];
    if (current.speedKph === 0 && samples[index - 1].speedKph > 0) {
      stops.push({ index, distanceKm: current.cumulativeDistanceKm, timestamp: current.timestamp });
    }
  }
  return stops;
}
