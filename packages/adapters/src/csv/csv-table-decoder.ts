import { parse } from 'papaparse';
import type { ParseError } from 'papaparse';
import type { RawRow, TableDecodeOutcome, TableDecoderPort } from '@kinetrace/domain';

const UNREADABLE = 'The uploaded file could not be read as a table.';

function unreadable(cause: string): TableDecodeOutcome {
  return { ok: false, error: { kind: 'UnreadableTable', message: UNREADABLE, cause } };
}

function describeError(error: ParseError): string {
  return error.row === undefined ? error.message : `${error.message} (row ${error.row})`;
}

/**
 * Delimited-text exports (comma, semicolon, tab or pipe). Cells stay strings;
 * typing is left to the analysis pipeline.
 */
export class CsvTableDecoder implements TableDecoderPort {
  readonly mediaTypes = ['text/csv', 'text/plain', 'text/tab-separated-values'] as const;

  decode(source: string): TableDecodeOutcome {
    if (source.trim() === '') return unreadable('file is empty');
    if (source.includes('\u0000')) return unreadable('binary content; expected delimited text');

    const result = parse<string[]>(source.replace(/^\uFEFF/, ''), {
      header: false,
      dynamicTyping: false,
      skipEmptyLines: 'greedy',
      delimitersToGuess: [',', ';', '\t', '|'],
    });

    // Delimiter and field-count warnings are expected from ragged report headers.
    const fatal = result.errors.find((e) => e.type === 'Quotes');
    if (fatal) return unreadable(describeError(fatal));
    if (result.data.length === 0) return unreadable('no rows found');

    const table: RawRow[] = result.data.map((row) => row.map((cell) => cell.trim()));
    return { ok: true, table };
  }
}
