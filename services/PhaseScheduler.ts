import { LaneClass } from '../types';
import type { CycleConfig, SignalPhase, SignalTransition } from '../types';

interface SignalTarget {
  readonly laneClass: LaneClass;
  signalGreen: boolean;
}

interface Boundary {
  offset: number;
  transitions: SignalTransition[];
}

/**
 * Fixed four-phase cycle. Everything is a function of `tick % cycleLength`,
 * so the scheduler holds no state beyond the cycle it was built with.
 *
 *   0                              car red, bike green
 *   bikeGreen                      bike red
 *   bikeGreen + allRed             car green
 *   bikeGreen + allRed + carGreen  car red
 *
 * Boundaries that coincide (a zero-length phase) are applied in that order.
 */
export class PhaseScheduler {
  readonly cycle: CycleConfig;
  private boundaries: Boundary[];

  constructor(cycle: CycleConfig) {
    this.cycle = cycle;
    const { bikeGreenDuration, allRedDuration, carGreenDuration } = cycle;
    this.boundaries = [
      {
        offset: 0,
        transitions: [
          { laneClass: LaneClass.CAR, green: false },
          { laneClass: LaneClass.BIKE, green: true },
        ],
      },
      {
        offset: bikeGreenDuration,
        transitions: [{ laneClass: LaneClass.BIKE, green: false }],
      },
      {
        offset: bikeGreenDuration + allRedDuration,
        transitions: [{ laneClass: LaneClass.CAR, green: true }],
      },
      {
        offset: bikeGreenDuration + allRedDuration + carGreenDuration,
        transitions: [{ laneClass: LaneClass.CAR, green: false }],
      },
    ];
  }

  phaseTick(tick: number): number {
    return tick % this.cycle.cycleLength;
  }

  transitionsAt(tick: number): SignalTransition[] {
    const phaseTick = this.phaseTick(tick);
    return this.boundaries
      .filter(b => b.offset === phaseTick)
      .flatMap(b => b.transitions);
  }

  apply(tick: number, lanes: readonly SignalTarget[]) {
    for (const { laneClass, green } of this.transitionsAt(tick)) {
      for (const lane of lanes) {
        if (lane.laneClass === laneClass) lane.signalGreen = green;
      }
    }
  }

  phaseAt(tick: number): SignalPhase {
    const phaseTick = this.phaseTick(tick);
    const { bikeGreenDuration, allRedDuration, carGreenDuration } = this.cycle;
    if (phaseTick < bikeGreenDuration) return 'BIKE_GREEN';
    if (phaseTick < bikeGreenDuration + allRedDuration) return 'CLEARANCE_TO_CAR';
    if (phaseTick < bikeGreenDuration + allRedDuration + carGreenDuration) return 'CAR_GREEN';
    return 'CLEARANCE_TO_BIKE';
  }
}
