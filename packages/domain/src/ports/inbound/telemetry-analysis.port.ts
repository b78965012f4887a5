import type { RawTable } from '../../entities/raw-table.js';
import type { AnalysisOutcome } from '../../entities/analysis-result.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** How an ambiguous `01/02/2024` is read: day-first means 1 February. */
export type DateOrder = 'day-first' | 'month-first';

export interface AnalysisOptions {
  dateOrder: DateOrder;
  /** Offsets (meters before each stop) reported in the stop summary. */
  stopSummaryOffsetsM: readonly number[];
  /** Offsets marked on each deceleration profile. */
  decelerationOffsetsM: readonly number[];
  decelerationWindowM: number;
  resampleIntervalS: number;
}

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  dateOrder: 'day-first',
  stopSummaryOffsetsM: [50, 100],
  decelerationOffsetsM: [1, 10, 50, 100],
  decelerationWindowM: 1000,
  resampleIntervalS: 10,
};

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface TelemetryAnalysisPort {
  analyze(table: RawTable): AnalysisOutcome;
}
