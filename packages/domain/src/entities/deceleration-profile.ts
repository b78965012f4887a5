import type { ProximitySample, StopEvent } from './stop-event.js';

export interface DecelerationPoint {
  readonly relativeDistanceM: number;
  readonly speedKph: number;
}

export interface DecelerationProfile {
  readonly stop: StopEvent;
  readonly points: readonly DecelerationPoint[];
  readonly markers: readonly ProximitySample[];
}
