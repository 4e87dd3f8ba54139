import { LaneClass } from './types';
import type { LaneDescriptor } from './types';

export const CONFIG_PATH = 'config.json';

// Durations are in ticks (seconds), SIM_LENGTH in hours
export const DEFAULTS = {
  GREEN_CARS: 30,
  GREEN_BIKES: 10,
  RED_TIME_ALL: 10,
  SIM_LENGTH: 0.1,
};

export const SECONDS_PER_HOUR = 3600;

export const DISCHARGE_RATE: Record<LaneClass, number> = {
  [LaneClass.CAR]: 1,
  [LaneClass.BIKE]: 2, // bikes clear in pairs
};

export const DEFAULT_LANES: readonly LaneDescriptor[] = [
  { laneClass: LaneClass.CAR, arrivalRate: 0.4 },
  { laneClass: LaneClass.CAR, arrivalRate: 0.3 },
  { laneClass: LaneClass.BIKE, arrivalRate: 0.2 },
  { laneClass: LaneClass.BIKE, arrivalRate: 0.1 },
];

export const CHART = {
  Y_MAX: 25,
};

export const PLAYBACK = {
  TICKS_PER_SECOND: 20,
};

export const COLORS = {
  GREEN: '#4ade80',  // Green 400
  RED: '#ef4444',    // Red 500
  LANE_EMPTY: '#334155', // Slate 700
  BIKE_LINES: ['#facc15', '#fb923c', '#f472b6', '#c084fc'],
  CAR_LINES: ['#3b82f6', '#22d3ee', '#2dd4bf', '#a3e635'],
};
