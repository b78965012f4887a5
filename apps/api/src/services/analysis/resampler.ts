import type { ResampledPoint, TelemetrySample } from '@kinetrace/domain';

interface Bucket {
  count: number;
  speedSum: number;
  incrementSum: number;
  cumulativeSum: number;
}

/**
 * Averages samples into fixed-width time buckets aligned to the Unix epoch.
 * Display only: nothing else in the pipeline reads the output.
 */
export function resample(samples: readonly TelemetrySample[], intervalS: number): ResampledPoint[] {
  if (!Number.isFinite(intervalS) || intervalS <= 0) {
    throw new RangeError(`resample interval must be positive, got ${intervalS}`);
  }
  const widthMs = intervalS * 1000;
  const buckets = new Map<number, Bucket>();

  for (const sample of samples) {
    const start = Math.floor(sample.timestamp.getTime() / widthMs) * widthMs;
    const bucket = buckets.get(start) ?? { count: 0, speedSum: 0, incrementSum: 0, cumulativeSum: 0 };
    bucket.count++;
    bucket.speedSum += sample.speedKph;
    bucket.incrementSum += sample.distanceIncrementM;
    bucket.cumulativeSum += sample.cumulativeDistanceKm;
    buckets.set(start, bucket);
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([start, bucket]) => ({
      bucketStart: new Date(start),
      sampleCount: bucket.count,
      meanSpeedKph: bucket.speedSum / bucket.count,
      meanDistanceIncrementM: bucket.incrementSum / bucket.count,
      meanCumulativeDistanceKm: bucket.cumulativeSum / bucket.count,
    }));
}
