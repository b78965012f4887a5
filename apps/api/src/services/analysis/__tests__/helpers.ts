import type { RawRow, TelemetrySample } from '@kinetrace/domain';

export const TRIP_START = Date.UTC(2024, 1, 1, 10, 0, 0);

/** One sample per second from TRIP_START, cumulative distance summed in meters. */
export function makeSamples(speeds: number[], incrementsM: number[]): TelemetrySample[] {
  let cumulativeM = 0;
  return speeds.map((speedKph, i) => {
    cumulativeM += incrementsM[i];
    return {
      rowIndex: i,
      timestamp: new Date(TRIP_START + i * 1000),
      distanceIncrementM: incrementsM[i],
      speedKph,
      cumulativeDistanceKm: cumulativeM / 1000,
    };
  });
}

/** Data rows for 01/02/2024 starting at 10:00:00, one per second. */
export function dataRows(speeds: number[], incrementsM: number[]): RawRow[] {
  return speeds.map((speed, i) => [
    '01/02/2024',
    `10:00:${String(i).padStart(2, '0')}`,
    String(incrementsM[i]),
    String(speed),
  ]);
}

export const HEADER_ROWS: RawRow[] = [
  ['Vehicle Trip Report', null, null, null],
  ['Vehicle No: TEST-01', '', '', ''],
  ['DATE', 'TIME', 'DISTANCE', 'SPEED'],
];
