/**
 * Port Interface Contract Tests
 *
 * Ports have no runtime artifact; these tests build mock implementations
 * that satisfy each port. A compilation failure here means the port shape changed.
 */

import { describe, it, expect, jest } from '@jest/globals';

import type {
  TelemetryAnalysisPort,
  AnalysisOptions,
  DateOrder,
} from '../ports/inbound/telemetry-analysis.port.js';
import type { TableDecoderPort, TableDecodeOutcome } from '../ports/outbound/table-decoder.port.js';
import type { AnalysisOutcome } from '../entities/analysis-result.js';
import type { RawTable } from '../entities/raw-table.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Inbound Ports
// ═══════════════════════════════════════════════════════════════════════════════

describe('TelemetryAnalysisPort', () => {
  it('analyzes a raw table synchronously', () => {
    const failure: AnalysisOutcome = {
      ok: false,
      error: { kind: 'NoDataStartFound', message: 'no date' },
    };
    const analyze = jest.fn((_table: RawTable): AnalysisOutcome => failure);
    const port: TelemetryAnalysisPort = { analyze };

    expect(port.analyze([['header']])).toBe(failure);
    expect(analyze).toHaveBeenCalledWith([['header']]);
  });

  it('AnalysisOptions accepts both date orders', () => {
    const orders: DateOrder[] = ['day-first', 'month-first'];
    const options: AnalysisOptions = {
      dateOrder: orders[1],
      stopSummaryOffsetsM: [50],
      decelerationOffsetsM: [10],
      decelerationWindowM: 500,
      resampleIntervalS: 5,
    };
    expect(options.dateOrder).toBe('month-first');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Outbound Ports
// ═══════════════════════════════════════════════════════════════════════════════

describe('TableDecoderPort', () => {
  it('defines decode and mediaTypes', () => {
    const decode = jest.fn((source: string): TableDecodeOutcome => ({ ok: true, table: [source.split(',')] }));
    const port: TableDecoderPort = { mediaTypes: ['text/csv'], decode };

    const outcome = port.decode('a,b');
    expect(outcome).toEqual({ ok: true, table: [['a', 'b']] });
    expect(port.mediaTypes).toEqual(['text/csv']);
  });

  it('reports UnreadableTable as a value', () => {
    const port: TableDecoderPort = {
      mediaTypes: [],
      decode: () => ({ ok: false, error: { kind: 'UnreadableTable', message: 'bad', cause: 'empty' } }),
    };
    const outcome = port.decode('');
    expect(!outcome.ok && outcome.error.kind).toBe('UnreadableTable');
  });
});
