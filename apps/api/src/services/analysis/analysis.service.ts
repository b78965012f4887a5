import { DEFAULT_ANALYSIS_OPTIONS } from '@kinetrace/domain';
import type {
  AnalysisOptions,
  AnalysisOutcome,
  DecelerationProfile,
  RawTable,
  StopAnalysis,
  TelemetryAnalysisPort,
} from '@kinetrace/domain';
import { createCellParser } from './cell-parser.js';
import type { CellParser } from './cell-parser.js';
import { findDataStart } from './table-sniffer.js';
import { buildSeries } from './series-builder.js';
import { detectStops } from './stop-detector.js';
import { CumulativeDistanceIndex } from './nearest-sample.js';
import { normalizeOffsets, sampleProximity } from './proximity-sampler.js';
import { extractDecelerationWindow } from './deceleration-extractor.js';
import { speedByDistance, summarizeTrip } from './metrics-summarizer.js';
import { resample } from './resampler.js';

export const NO_DATA_START_MESSAGE = 'Could not find a valid data start row (with a date) in the file.';

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Straight-line trip analysis over one raw table.
 *
 * Holds only immutable options, so a single instance can serve concurrent
 * requests. Expected failures come back as `{ ok: false }`; nothing is thrown
 * for bad input.
 */
export class TelemetryAnalysisService implements TelemetryAnalysisPort {
  readonly options: Readonly<AnalysisOptions>;
  private readonly parser: CellParser;

  constructor(options: Partial<AnalysisOptions> = {}) {
    const defaults = DEFAULT_ANALYSIS_OPTIONS;
    this.options = Object.freeze({
      dateOrder: options.dateOrder ?? defaults.dateOrder,
      stopSummaryOffsetsM: normalizeOffsets(options.stopSummaryOffsetsM ?? defaults.stopSummaryOffsetsM),
      decelerationOffsetsM: normalizeOffsets(options.decelerationOffsetsM ?? defaults.decelerationOffsetsM),
      decelerationWindowM: options.decelerationWindowM ?? defaults.decelerationWindowM,
      resampleIntervalS: options.resampleIntervalS ?? defaults.resampleIntervalS,
    });
    const { decelerationWindowM, resampleIntervalS } = this.options;
    if (!isPositiveFinite(decelerationWindowM) || !isPositiveFinite(resampleIntervalS)) {
      throw new RangeError('decelerationWindowM and resampleIntervalS must be positive and finite');
    }
    this.parser = createCellParser(this.options.dateOrder);
  }

  /** Same analysis with some options replaced. */
  withOptions(overrides: Partial<AnalysisOptions>): TelemetryAnalysisService {
    return new TelemetryAnalysisService({
      dateOrder: overrides.dateOrder ?? this.options.dateOrder,
      stopSummaryOffsetsM: overrides.stopSummaryOffsetsM ?? this.options.stopSummaryOffsetsM,
      decelerationOffsetsM: overrides.decelerationOffsetsM ?? this.options.decelerationOffsetsM,
      decelerationWindowM: overrides.decelerationWindowM ?? this.options.decelerationWindowM,
      resampleIntervalS: overrides.resampleIntervalS ?? this.options.resampleIntervalS,
    });
  }

  analyze(table: RawTable): AnalysisOutcome {
    const start = findDataStart(table, this.parser);
    if (!start.found) {
      return {
        ok: false,
        error: {
          kind: 'NoDataStartFound',
          message: NO_DATA_START_MESSAGE,
          cause: `none of ${start.scannedRows} row(s) starts with a ${this.options.dateOrder} date`,
        },
      };
    }

    const series = buildSeries(table, start.index, this.parser);
    if (!series.ok) return series;

    const { samples } = series;
    const index = new CumulativeDistanceIndex(samples);
    const stopEvents = detectStops(samples);

    const stops: StopAnalysis[] = stopEvents.map((stop) => ({
      stop,
      proximity: sampleProximity(samples, index, stop, this.options.stopSummaryOffsetsM),
    }));

    const decelerationProfiles: DecelerationProfile[] = [];
    for (const stop of stopEvents) {
      const points = extractDecelerationWindow(samples, index, stop, this.options.decelerationWindowM);
      if (!points) continue;
      decelerationProfiles.push({
        stop,
        points,
        markers: sampleProximity(samples, index, stop, this.options.decelerationOffsetsM),
      });
    }

    return {
      ok: true,
      result: {
        dataStartIndex: start.index,
        sampleCount: samples.length,
        droppedRowCount: series.droppedRowCount,
        metrics: summarizeTrip(samples),
        stops,
        decelerationProfiles,
        resampled: resample(samples, this.options.resampleIntervalS),
        speedByDistance: speedByDistance(samples),
      },
    };
  }
}
