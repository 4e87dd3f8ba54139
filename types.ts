export enum LaneClass {
  CAR = 'CAR',
  BIKE = 'BIKE'
}

export type SignalPhase =
  | 'BIKE_GREEN'
  | 'CLEARANCE_TO_CAR'
  | 'CAR_GREEN'
  | 'CLEARANCE_TO_BIKE';

export interface CycleConfig {
  readonly bikeGreenDuration: number;
  readonly carGreenDuration: number;
  readonly allRedDuration: number; // applied twice per cycle
  readonly cycleLength: number;
}

export interface LaneDescriptor {
  readonly laneClass: LaneClass;
  readonly arrivalRate: number; // Poisson mean per tick
}

export interface SimulationConfig {
  readonly cycle: CycleConfig;
  readonly simulatedHours: number;
  readonly totalTicks: number;
  readonly lanes: readonly LaneDescriptor[];
}

export interface SignalTransition {
  laneClass: LaneClass;
  green: boolean;
}

export interface ClassObservation {
  signalGreen: boolean | null; // first lane of the class, null if none
  queues: number[];
}

export interface ObservationRow {
  tick: number;
  bike: ClassObservation;
  car: ClassObservation;
}

export interface LaneSnapshot {
  laneClass: LaneClass;
  arrivalRate: number;
  queueLength: number;
  totalArrivals: number;
  totalDepartures: number;
}

// Run totals across all lanes
export interface SimulationStats {
  arrivals: number;
  departures: number;
  queuedVehicles: number;
}

export interface SimulationSnapshot {
  lanes: LaneSnapshot[];
  stats: SimulationStats;
}

export interface LaneSummary {
  label: string;
  laneClass: LaneClass;
  maxQueue: number;
  meanQueue: number;
}

export interface LaneReport extends LaneSummary {
  arrivals: number;
  departures: number;
}

export type TableCell = number | boolean;

export interface ObservationTable {
  columns: string[];
  records: Array<Record<string, TableCell>>;
}
