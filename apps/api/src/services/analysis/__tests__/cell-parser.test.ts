/**
 * Cell coercion rules shared by the table sniffer and the series builder.
 */

import { describe, it, expect } from '@jest/globals';
import { createCellParser } from '../cell-parser.js';

const dayFirst = createCellParser('day-first');
const monthFirst = createCellParser('month-first');

function dayStart(cell: Parameters<typeof dayFirst.parseDate>[0]) {
  const parsed = dayFirst.parseDate(cell);
  return parsed.ok ? parsed.value.dayStartMs : null;
}

// ─── Dates ────────────────────────────────────────────────────────────────────

describe('parseDate', () => {
  it('reads an ambiguous slash date day-first', () => {
    expect(dayFirst.parseDate('01/02/2024')).toEqual({
      ok: true,
      value: { dayStartMs: Date.UTC(2024, 1, 1), timeOfDayMs: null },
    });
  });

  it('reads the same text month-first when configured', () => {
    const parsed = monthFirst.parseDate('01/02/2024');
    expect(parsed.ok && parsed.value.dayStartMs).toBe(Date.UTC(2024, 0, 2));
  });

  it('defaults to day-first', () => {
    expect(createCellParser().dateOrder).toBe('day-first');
  });

  it('accepts dash and dot separators and two-digit years', () => {
    expect(dayStart('15-03-2024')).toBe(Date.UTC(2024, 2, 15));
    expect(dayStart('05.03.99')).toBe(Date.UTC(1999, 2, 5));
    expect(dayStart('05/03/24')).toBe(Date.UTC(2024, 2, 5));
  });

  it('accepts ISO and named-month dates', () => {
    expect(dayStart('2024-02-01')).toBe(Date.UTC(2024, 1, 1));
    expect(dayStart('1-Feb-24')).toBe(Date.UTC(2024, 1, 1));
    expect(dayStart('01 February 2024')).toBe(Date.UTC(2024, 1, 1));
  });

  it('keeps a trailing time of day', () => {
    expect(dayFirst.parseDate('2024-02-01 10:15:30')).toEqual({
      ok: true,
      value: { dayStartMs: Date.UTC(2024, 1, 1), timeOfDayMs: 36_930_000 },
    });
  });

  it('rejects impossible calendar days', () => {
    expect(dayFirst.parseDate('31/02/2024').ok).toBe(false);
    expect(dayFirst.parseDate('01/13/2024').ok).toBe(false);
    expect(monthFirst.parseDate('13/01/2024').ok).toBe(false);
  });

  it('rejects header text, blanks and non-date types', () => {
    expect(dayFirst.parseDate('DATE').ok).toBe(false);
    expect(dayFirst.parseDate('Vehicle No: TEST-01').ok).toBe(false);
    expect(dayFirst.parseDate('   ').ok).toBe(false);
    expect(dayFirst.parseDate(null).ok).toBe(false);
    expect(dayFirst.parseDate(undefined).ok).toBe(false);
    expect(dayFirst.parseDate(true).ok).toBe(false);
    expect(dayFirst.parseDate('10:00:00').ok).toBe(false);
  });

  it('treats positive numbers as spreadsheet serial dates', () => {
    expect(dayFirst.parseDate(45323.25)).toEqual({
      ok: true,
      value: { dayStartMs: Date.UTC(2024, 1, 1), timeOfDayMs: 6 * 3_600_000 },
    });
    expect(dayFirst.parseDate(0).ok).toBe(false);
    expect(dayFirst.parseDate(Number.NaN).ok).toBe(false);
  });

  it('rejects serial numbers past the range of Date', () => {
    expect(dayFirst.parseDate(1e9).ok).toBe(false);
    expect(dayFirst.parseDate(100_025_569)).toEqual({
      ok: true,
      value: { dayStartMs: 8.64e15, timeOfDayMs: 0 },
    });
  });

  it('splits Date cells on UTC fields', () => {
    expect(dayFirst.parseDate(new Date(Date.UTC(2024, 1, 1, 8, 30)))).toEqual({
      ok: true,
      value: { dayStartMs: Date.UTC(2024, 1, 1), timeOfDayMs: 8.5 * 3_600_000 },
    });
    expect(dayFirst.parseDate(new Date(Number.NaN)).ok).toBe(false);
  });
});

// ─── Times ────────────────────────────────────────────────────────────────────

describe('parseTimeOfDay', () => {
  it('parses 24-hour clock text', () => {
    expect(dayFirst.parseTimeOfDay('10:00')).toEqual({ ok: true, value: 36_000_000 });
    expect(dayFirst.parseTimeOfDay(' 10:00:00.250 ')).toEqual({ ok: true, value: 36_000_250 });
  });

  it('parses AM/PM', () => {
    expect(dayFirst.parseTimeOfDay('7:05:09 PM')).toEqual({ ok: true, value: 68_709_000 });
    expect(dayFirst.parseTimeOfDay('12:00:00 AM')).toEqual({ ok: true, value: 0 });
  });

  it('rejects out-of-range clock values', () => {
    expect(dayFirst.parseTimeOfDay('24:00').ok).toBe(false);
    expect(dayFirst.parseTimeOfDay('10:61').ok).toBe(false);
    expect(dayFirst.parseTimeOfDay('13:00 PM').ok).toBe(false);
  });

  it('takes the time part of a full date-time string', () => {
    expect(dayFirst.parseTimeOfDay('01/02/2024 06:30:00')).toEqual({ ok: true, value: 23_400_000 });
    expect(dayFirst.parseTimeOfDay('01/02/2024').ok).toBe(false);
  });

  it('reads numbers as a fraction of a day', () => {
    expect(dayFirst.parseTimeOfDay(0.5)).toEqual({ ok: true, value: 43_200_000 });
    expect(dayFirst.parseTimeOfDay(-0.5).ok).toBe(false);
  });
});

// ─── Numbers ──────────────────────────────────────────────────────────────────

describe('parseNumber', () => {
  it('accepts finite numbers and decimal text', () => {
    expect(dayFirst.parseNumber(42)).toEqual({ ok: true, value: 42 });
    expect(dayFirst.parseNumber(' 12.5 ')).toEqual({ ok: true, value: 12.5 });
    expect(dayFirst.parseNumber('1e3')).toEqual({ ok: true, value: 1000 });
    expect(dayFirst.parseNumber('-3')).toEqual({ ok: true, value: -3 });
    expect(dayFirst.parseNumber('.5')).toEqual({ ok: true, value: 0.5 });
  });

  it('rejects text, grouping separators and non-finite values', () => {
    for (const cell of ['abc', '1,234', '', '12 km', Number.NaN, Number.POSITIVE_INFINITY, true, null]) {
      expect(dayFirst.parseNumber(cell).ok).toBe(false);
    }
  });
});

// ─── Timestamps ───────────────────────────────────────────────────────────────

describe('parseTimestamp', () => {
  it('combines the date cell with the time cell in UTC', () => {
    const parsed = dayFirst.parseTimestamp('01/02/2024', '10:00:05');
    expect(parsed.ok && parsed.value.toISOString()).toBe('2024-02-01T10:00:05.000Z');
  });

  it('uses the time cell even when the date cell carries its own time', () => {
    const parsed = dayFirst.parseTimestamp('2024-02-01 23:59:59', '08:00:00');
    expect(parsed.ok && parsed.value.toISOString()).toBe('2024-02-01T08:00:00.000Z');
  });

  it('fails when either half fails', () => {
    expect(dayFirst.parseTimestamp('01/02/2024', 'noon').ok).toBe(false);
    expect(dayFirst.parseTimestamp('yesterday', '10:00').ok).toBe(false);
  });

  it('fails when the combined instant is past the range of Date', () => {
    expect(dayFirst.parseTimestamp(1e9, '10:00:00').ok).toBe(false);
    expect(dayFirst.parseTimestamp(100_025_569, '00:00:00').ok).toBe(true);
    expect(dayFirst.parseTimestamp(100_025_569, '12:00:00').ok).toBe(false);
  });
});
