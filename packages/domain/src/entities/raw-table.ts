/** A single untyped cell as handed over by a table decoder. */
export type RawCell = string | number | boolean | Date | null | undefined;

export type RawRow = readonly RawCell[];

export type RawTable = readonly RawRow[];

/** Column positions of a genuine data row. */
export const RAW_COLUMNS = {
  date: 0,
  time: 1,
  distanceIncrement: 2,
  speed: 3,
} as const;
