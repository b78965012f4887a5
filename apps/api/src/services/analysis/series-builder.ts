import { RAW_COLUMNS } from '@kinetrace/domain';
import type { AnalysisError, RawTable, TelemetrySample } from '@kinetrace/domain';
import type { CellParser } from './cell-parser.js';

export const EMPTY_AFTER_CLEANING_MESSAGE = 'No valid data rows found after cleaning.';

export type SeriesBuildOutcome =
  | { ok: true; samples: readonly TelemetrySample[]; droppedRowCount: number }
  | { ok: false; error: AnalysisError };

/**
 * Cleans the rows from `dataStart` onwards into an ordered, frozen sample sequence.
 * Rows with a missing or unparseable field are dropped without imputation; the
 * remaining rows keep their original order.
 */
export function buildSeries(table: RawTable, dataStart: number, parser: CellParser): SeriesBuildOutcome {
  const samples: TelemetrySample[] = [];
  let droppedRowCount = 0;
  let cumulativeM = 0;

  for (let rowIndex = Math.max(dataStart, 0); rowIndex < table.length; rowIndex++) {
    const row = table[rowIndex];
    const distance = parser.parseNumber(row[RAW_COLUMNS.distanceIncrement]);
    const speed = parser.parseNumber(row[RAW_COLUMNS.speed]);
    const timestamp = parser.parseTimestamp(row[RAW_COLUMNS.date], row[RAW_COLUMNS.time]);

    if (!distance.ok || !speed.ok || !timestamp.ok) {
      droppedRowCount++;
      continue;
    }

    cumulativeM += distance.value;
    samples.push(
      Object.freeze({
        rowIndex,
        timestamp: timestamp.value,
        distanceIncrementM: distance.value,
        speedKph: speed.value,
        cumulativeDistanceKm: cumulativeM / 1000,
      }),
    );
  }

  if (samples.length === 0) {
    return {
      ok: false,
      error: {
        kind: 'EmptyAfterCleaning',
        message: EMPTY_AFTER_CLEANING_MESSAGE,
        cause: `${droppedRowCount} row(s) after the data start were missing a date, time, distance or speed`,
      },
    };
  }

  return { ok: true, samples: Object.freeze(samples), droppedRowCount };
}
