import type { DecelerationProfile } from './deceleration-profile.js';
import type { ResampledPoint } from './resampled-point.js';
import type { StopAnalysis } from './stop-event.js';
import type { DistanceSpeedPoint } from './telemetry-sample.js';
import type { TripMetrics } from './trip-metrics.js';

export type AnalysisErrorKind = 'UnreadableTable' | 'NoDataStartFound' | 'EmptyAfterCleaning';

export interface AnalysisError {
  readonly kind: AnalysisErrorKind;
  readonly message: string;
  /** Underlying decoder or parser detail, surfaced verbatim. */
  readonly cause?: string;
}

export interface AnalysisResult {
  readonly dataStartIndex: number;
  readonly sampleCount: number;
  readonly droppedRowCount: number;
  readonly metrics: TripMetrics;
  readonly stops: readonly StopAnalysis[];
  readonly decelerationProfiles: readonly DecelerationProfile[];
  readonly resampled: readonly ResampledPoint[];
  readonly speedByDistance: readonly DistanceSpeedPoint[];
}

export type AnalysisOutcome =
  | { readonly ok: true; readonly result: AnalysisResult }
  | { readonly ok: false; readonly error: AnalysisError };
