export interface ResampledPoint {
  readonly bucketStart: Date;
  readonly sampleCount: number;
  readonly meanSpeedKph: number;
  readonly meanDistanceIncrementM: number;
  readonly meanCumulativeDistanceKm: number;
}
