export interface TripMetrics {
  readonly totalDistanceKm: number;
  readonly maxSpeedKph: number;
  /** First sample index attaining the maximum. */
  readonly maxSpeedIndex: number;
  readonly maxSpeedDistanceKm: number;
  readonly maxSpeedTimestamp: Date;
}
