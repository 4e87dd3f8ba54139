import { LaneClass } from '../types';
import type { ClassObservation, ObservationRow, SimulationConfig, SimulationSnapshot } from '../types';
import { Lane } from './Lane';
import { createLogger } from './logger';
import { PhaseScheduler } from './PhaseScheduler';
import { poissonSampler } from './random';
import type { ArrivalSampler } from './random';

const log = createLogger('simulation');

function observeClass(lanes: readonly Lane[], laneClass: LaneClass): ClassObservation {
  const ofClass = lanes.filter(l => l.laneClass === laneClass);
  return {
    signalGreen: ofClass.length > 0 ? ofClass[0].signalGreen : null,
    queues: ofClass.map(l => l.queueLength),
  };
}

function observe(tick: number, lanes: readonly Lane[]): ObservationRow {
  return {
    tick,
    bike: observeClass(lanes, LaneClass.BIKE),
    car: observeClass(lanes, LaneClass.CAR),
  };
}

// One tick: signals first, since departures depend on them
function advance(tick: number, lanes: readonly Lane[], scheduler: PhaseScheduler): ObservationRow {
  scheduler.apply(tick, lanes);
  for (const lane of lanes) {
    lane.advanceQueue();
  }
  return observe(tick, lanes);
}

export function run(lanes: readonly Lane[], scheduler: PhaseScheduler, totalTicks: number): ObservationRow[] {
  const rows: ObservationRow[] = [];
  for (let t = 0; t < totalTicks; t++) {
    rows.push(advance(t, lanes, scheduler));
  }
  return rows;
}

export interface EngineOptions {
  sampler?: ArrivalSampler;
}

export class SimulationEngine {
  readonly config: SimulationConfig;
  readonly lanes: Lane[];
  readonly scheduler: PhaseScheduler;

  constructor(config: SimulationConfig, { sampler = poissonSampler() }: EngineOptions = {}) {
    this.config = config;
    this.scheduler = new PhaseScheduler(config.cycle);
    this.lanes = config.lanes.map(d => new Lane(d.laneClass, d.arrivalRate, sampler));
  }

  // Lanes carry their state forward, so an engine runs once
  public run(): ObservationRow[] {
    log.info('Running simulation...');
    const rows = run(this.lanes, this.scheduler, this.config.totalTicks);
    log.info(`Simulated ${rows.length} ticks across ${this.lanes.length} lanes`);
    return rows;
  }

  public getSnapshot(): SimulationSnapshot {
    const lanes = this.lanes.map(l => l.snapshot());

    return {
      lanes,
      stats: {
        arrivals: lanes.reduce((sum, l) => sum + l.totalArrivals, 0),
        departures: lanes.reduce((sum, l) => sum + l.totalDepartures, 0),
        queuedVehicles: lanes.reduce((sum, l) => sum + l.queueLength, 0),
      },
    };
  }
}
