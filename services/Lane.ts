import { DISCHARGE_RATE } from '../constants';
import { LaneClass } from '../types';
import type { LaneSnapshot } from '../types';
import { InvalidConfiguration } from './errors';
import { poissonSampler } from './random';
import type { ArrivalSampler } from './random';

export class Lane {
  readonly laneClass: LaneClass;
  readonly arrivalRate: number;
  signalGreen: boolean = false; // written only by the scheduler
  queueLength: number;

  totalArrivals: number = 0;
  totalDepartures: number = 0;

  private sampler: ArrivalSampler;

  constructor(laneClass: LaneClass, arrivalRate: number, sampler: ArrivalSampler = poissonSampler(), initialQueue = 0) {
    if (!Number.isFinite(arrivalRate) || arrivalRate <= 0) {
      throw new InvalidConfiguration('arrivalRate', `must be a positive number, got ${arrivalRate}`);
    }
    if (!Number.isInteger(initialQueue) || initialQueue < 0) {
      throw new InvalidConfiguration('initialQueue', `must be a non-negative integer, got ${initialQueue}`);
    }
    this.laneClass = laneClass;
    this.arrivalRate = arrivalRate;
    this.sampler = sampler;
    this.queueLength = initialQueue;
  }

  get dischargeRate(): number {
    return DISCHARGE_RATE[this.laneClass];
  }

  advanceQueue() {
    // Arrivals join the queue whatever the signal shows
    const arrivals = this.sampler(this.arrivalRate);
    this.totalArrivals += arrivals;
    this.queueLength += arrivals;

    if (!this.signalGreen || this.queueLength === 0) return;

    // A lone bike leaves on its own; otherwise the full discharge rate applies
    const departing = this.laneClass === LaneClass.BIKE && this.queueLength === 1
      ? 1
      : this.dischargeRate;

    this.queueLength -= departing;
    this.totalDepartures += departing;
  }

  snapshot(): LaneSnapshot {
    return {
      laneClass: this.laneClass,
      arrivalRate: this.arrivalRate,
      queueLength: this.queueLength,
      totalArrivals: this.totalArrivals,
      totalDepartures: this.totalDepartures,
    };
  }
}
