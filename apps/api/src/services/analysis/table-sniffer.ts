import { RAW_COLUMNS } from '@kinetrace/domain';
import type { RawTable } from '@kinetrace/domain';
import type { CellParser } from './cell-parser.js';

export type DataStartScan =
  | { found: true; index: number }
  | { found: false; scannedRows: number };

/**
 * Exported logs carry a variable-length metadata block before the readings.
 * The first row whose date column parses is taken as the start of the data;
 * a header cell that happens to look like a date is accepted as a false positive.
 */
export function findDataStart(table: RawTable, parser: CellParser): DataStartScan {
  for (let index = 0; index < table.length; index++) {
    if (parser.parseDate(table[index][RAW_COLUMNS.date]).ok) {
      return { found: true, index };
    }
  }
  return { found: false, scannedRows: table.length };
}
