import type { RawTable } from '../../entities/raw-table.js';
import type { AnalysisError } from '../../entities/analysis-result.js';

export type TableDecodeOutcome =
  | { readonly ok: true; readonly table: RawTable }
  | { readonly ok: false; readonly error: AnalysisError };

/** Turns an uploaded document into a raw cell grid. */
export interface TableDecoderPort {
  readonly mediaTypes: readonly string[];
  decode(source: string): TableDecodeOutcome;
}
