import type { DateOrder, RawCell } from '@kinetrace/domain';

export type Parsed<T> = { ok: true; value: T } | { ok: false };

export interface CalendarDate {
  /** UTC midnight of the calendar day, epoch ms. */
  dayStartMs: number;
  /** Time of day carried by the same cell, when it had one. */
  timeOfDayMs: number | null;
}

export interface CellParser {
  readonly dateOrder: DateOrder;
  parseDate(cell: RawCell): Parsed<CalendarDate>;
  parseTimeOfDay(cell: RawCell): Parsed<number>;
  parseNumber(cell: RawCell): Parsed<number>;
  parseTimestamp(dateCell: RawCell, timeCell: RawCell): Parsed<Date>;
}

const MS_PER_DAY = 86_400_000;
/** Day zero of spreadsheet serial dates (1900 system, Lotus leap-year bug included). */
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
/** Largest epoch offset a `Date` can hold, either side of 1970. */
const MAX_TIME_MS = 8.64e15;

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T]+(.+))?$/;
const NUMERIC_DATE = /^(\d{1,2})([/.-])(\d{1,2})\2(\d{4}|\d{2})(?:[ T]+(.+))?$/;
const NAMED_MONTH_DATE = /^(\d{1,2})[ /-]([A-Za-z]{3,9})\.?[ /-](\d{4}|\d{2})(?:[ T]+(.+))?$/;
const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?\s*([AaPp][Mm])?Z?$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const FAILED = { ok: false } as const;

function ok<T>(value: T): Parsed<T> {
  return { ok: true, value };
}

function expandYear(text: string): number {
  const year = Number(text);
  if (text.length > 2) return year;
  return year < 70 ? 2000 + year : 1900 + year;
}

function isRepresentable(ms: number): boolean {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_TIME_MS;
}

function utcDayStart(year: number, month: number, day: number): number | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return Date.UTC(year, month - 1, day);
}

function parseTimeText(text: string): number | null {
  const match = TIME_OF_DAY.exec(text.trim());
  if (!match) return null;
  const [, hh, mm, ss, frac, meridiem] = match;
  let hours = Number(hh);
  const minutes = Number(mm);
  const seconds = ss === undefined ? 0 : Number(ss);
  if (minutes > 59 || seconds > 59) return null;
  if (meridiem !== undefined) {
    if (hours < 1 || hours > 12) return null;
    hours = (hours % 12) + (meridiem.toLowerCase() === 'pm' ? 12 : 0);
  } else if (hours > 23) {
    return null;
  }
  const millis = frac === undefined ? 0 : Math.round(Number(`0.${frac}`) * 1000);
  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis;
}

function withTrailingTime(dayStartMs: number | null, timeText: string | undefined): Parsed<CalendarDate> {
  if (dayStartMs === null) return FAILED;
  if (timeText === undefined) return ok({ dayStartMs, timeOfDayMs: null });
  const timeOfDayMs = parseTimeText(timeText);
  return timeOfDayMs === null ? FAILED : ok({ dayStartMs, timeOfDayMs });
}

function splitSerial(serial: number): CalendarDate | null {
  const days = Math.floor(serial);
  const dayStartMs = SERIAL_EPOCH_MS + days * MS_PER_DAY;
  const timeOfDayMs = Math.round((serial - days) * MS_PER_DAY);
  return isRepresentable(dayStartMs + timeOfDayMs) ? { dayStartMs, timeOfDayMs } : null;
}

function splitDate(date: Date): CalendarDate | null {
  const ms = date.getTime();
  if (Number.isNaN(ms)) return null;
  const dayStartMs = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  return { dayStartMs, timeOfDayMs: ms - dayStartMs };
}

/**
 * Builds the cell coercion rules used by the sniffer and the series builder.
 * All calendar arithmetic is UTC; the only locale-like input is `dateOrder`.
 */
export function createCellParser(dateOrder: DateOrder = 'day-first'): CellParser {
  function parseDateText(text: string): Parsed<CalendarDate> {
    const iso = ISO_DATE.exec(text);
    if (iso) {
      const [, y, m, d, time] = iso;
      return withTrailingTime(utcDayStart(Number(y), Number(m), Number(d)), time);
    }

    const numeric = NUMERIC_DATE.exec(text);
    if (numeric) {
      const [, first, , second, y, time] = numeric;
      const [day, month] = dateOrder === 'day-first' ? [first, second] : [second, first];
      return withTrailingTime(utcDayStart(expandYear(y), Number(month), Number(day)), time);
    }

    const named = NAMED_MONTH_DATE.exec(text);
    if (named) {
      const [, d, monthName, y, time] = named;
      const month = MONTHS[monthName.slice(0, 3).toLowerCase()];
      if (month === undefined) return FAILED;
      return withTrailingTime(utcDayStart(expandYear(y), month, Number(d)), time);
    }

    return FAILED;
  }

  function parseDate(cell: RawCell): Parsed<CalendarDate> {
    if (cell instanceof Date) {
      const split = splitDate(cell);
      return split ? ok(split) : FAILED;
    }
    if (typeof cell === 'number') {
      const split = Number.isFinite(cell) && cell > 0 ? splitSerial(cell) : null;
      return split ? ok(split) : FAILED;
    }
    if (typeof cell === 'string') {
      const text = cell.trim();
      return text === '' ? FAILED : parseDateText(text);
    }
    return FAILED;
  }

  function parseTimeOfDay(cell: RawCell): Parsed<number> {
    if (cell instanceof Date) {
      const split = splitDate(cell);
      return split && split.timeOfDayMs !== null ? ok(split.timeOfDayMs) : FAILED;
    }
    if (typeof cell === 'number') {
      if (!Number.isFinite(cell) || cell < 0) return FAILED;
      return ok(Math.round((cell - Math.floor(cell)) * MS_PER_DAY));
    }
    if (typeof cell !== 'string') return FAILED;

    const text = cell.trim();
    const timeOfDayMs = parseTimeText(text);
    if (timeOfDayMs !== null) return ok(timeOfDayMs);

    // Some exports repeat the full date-time in the time column.
    const dated = text === '' ? FAILED : parseDateText(text);
    return dated.ok && dated.value.timeOfDayMs !== null ? ok(dated.value.timeOfDayMs) : FAILED;
  }

  function parseNumber(cell: RawCell): Parsed<number> {
    if (typeof cell === 'number') return Number.isFinite(cell) ? ok(cell) : FAILED;
    if (typeof cell !== 'string') return FAILED;
    const text = cell.trim();
    return DECIMAL.test(text) ? ok(Number(text)) : FAILED;
  }

  function parseTimestamp(dateCell: RawCell, timeCell: RawCell): Parsed<Date> {
    const date = parseDate(dateCell);
    if (!date.ok) return FAILED;
    const time = parseTimeOfDay(timeCell);
    if (!time.ok) return FAILED;
    const ms = date.value.dayStartMs + time.value;
    return isRepresentable(ms) ? ok(new Date(ms)) : FAILED;
  }

  return { dateOrder, parseDate, parseTimeOfDay, parseNumber, parseTimestamp };
}
