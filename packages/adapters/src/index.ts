// ─── Table Decoders ───────────────────────────────────────────────────────────
export { CsvTableDecoder } from './csv/csv-table-decoder.js';
