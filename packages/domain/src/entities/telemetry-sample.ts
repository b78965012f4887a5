export interface TelemetrySample {
  /** Position of the source row in the raw table. */
  readonly rowIndex: number;
  readonly timestamp: Date;
  /** Distance covered since the previous reading, in meters. May be negative on sensor glitches. */
  readonly distanceIncrementM: number;
  readonly speedKph: number;
  readonly cumulativeDistanceKm: number;
}

export interface DistanceSpeedPoint {
  readonly cumulativeDistanceKm: number;
  readonly speedKph: number;
}
