import type { AnalysisResult, ProximitySample, StopAnalysis } from '@kinetrace/domain';

export interface AnalysisView {
  metrics: {
    totalDistance: string;
    maxSpeed: string;
    maxSpeedDetails: string;
  };
  stopAnalysis: string[];
  stops: Array<{
    index: number;
    distanceKm: number;
    ts: string;
    proximity: MarkerView[];
  }>;
  decelerationProfiles: Array<{
    name: string;
    points: Array<{ distanceM: number; speedKph: number }>;
    markers: MarkerView[];
  }>;
  resampledSeries: Array<{ ts: string; meanSpeedKph: number }>;
  speedByDistance: Array<{ distanceKm: number; speedKph: number }>;
  summary: {
    dataStartIndex: number;
    sampleCount: number;
    droppedRowCount: number;
    stopCount: number;
  };
}

export interface MarkerView {
  offsetM: number;
  distanceKm: number;
  speedKph: number;
  ts: string;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** HH:MM:SS in UTC. */
export function formatClock(ts: Date): string {
  return `${pad2(ts.getUTCHours())}:${pad2(ts.getUTCMinutes())}:${pad2(ts.getUTCSeconds())}`;
}

export function formatKm(km: number): string {
  return km.toFixed(2);
}

function toMarker(sample: ProximitySample): MarkerView {
  return {
    offsetM: sample.offsetM,
    distanceKm: sample.matchedDistanceKm,
    speedKph: sample.matchedSpeedKph,
    ts: sample.matchedTimestamp.toISOString(),
  };
}

function stopLines({ stop, proximity }: StopAnalysis): string[] {
  return [
    `Stop detected at ${formatKm(stop.distanceKm)} km.`,
    ...proximity.map(
      (p) => `  - Speed ~${p.offsetM}m before: ${p.matchedSpeedKph} Kmph (at ${formatKm(p.matchedDistanceKm)} km)`,
    ),
  ];
}

export function presentAnalysis(result: AnalysisResult): AnalysisView {
  const { metrics } = result;
  return {
    metrics: {
      totalDistance: `${formatKm(metrics.totalDistanceKm)} km`,
      maxSpeed: `${metrics.maxSpeedKph} Kmph`,
      maxSpeedDetails: `(at ${formatKm(metrics.maxSpeedDistanceKm)} km, time ${formatClock(metrics.maxSpeedTimestamp)})`,
    },
    stopAnalysis: result.stops.flatMap(stopLines),
    stops: result.stops.map(({ stop, proximity }) => ({
      index: stop.index,
      distanceKm: stop.distanceKm,
      ts: stop.timestamp.toISOString(),
      proximity: proximity.map(toMarker),
    })),
    decelerationProfiles: result.decelerationProfiles.map((profile) => ({
      name: `Stop at ${formatClock(profile.stop.timestamp)}`,
      points: profile.points.map((p) => ({ distanceM: p.relativeDistanceM, speedKph: p.speedKph })),
      markers: profile.markers.map(toMarker),
    })),
    resampledSeries: result.resampled.map((p) => ({
      ts: p.bucketStart.toISOString(),
      meanSpeedKph: p.meanSpeedKph,
    })),
    speedByDistance: result.speedByDistance.map((p) => ({
      distanceKm: p.cumulativeDistanceKm,
      speedKph: p.speedKph,
    })),
    summary: {
      dataStartIndex: result.dataStartIndex,
      sampleCount: result.sampleCount,
      droppedRowCount: result.droppedRowCount,
      stopCount: result.stops.length,
    },
  };
}
