export interface StopEvent {
  /** Position in the sample sequence (not the raw table row). */
  readonly index: number;
  readonly distanceKm: number;
  readonly timestamp: Date;
}

export interface ProximitySample {
  readonly stop: StopEvent;
  readonly offsetM: number;
  readonly matchedIndex: number;
  readonly matchedDistanceKm: number;
  readonly matchedSpeedKph: number;
  readonly matchedTimestamp: Date;
}

export interface StopAnalysis {
  readonly stop: StopEvent;
  /** Ordered by ascending offset. */
  readonly proximity: readonly ProximitySample[];
}
