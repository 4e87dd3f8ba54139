import { describe, it, expect, vi } from 'vitest';
import { Lane } from './Lane';
import { InvalidConfiguration } from './errors';
import { createSeededRandom, poissonSampler } from './random';
import type { ArrivalSampler } from './random';
import { LaneClass } from '../types';

const noArrivals: ArrivalSampler = () => 0;

describe('Lane', () => {
  describe('constructor', () => {
    it('starts red with an empty queue', () => {
      const lane = new Lane(LaneClass.CAR, 0.4, noArrivals);
      expect(lane.signalGreen).toBe(false);
      expect(lane.queueLength).toBe(0);
    });

    it.each([0, -0.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects arrival rate %s', (rate) => {
      expect(() => new Lane(LaneClass.BIKE, rate)).toThrow(InvalidConfiguration);
    });

    it.each([-1, 1.5])('rejects initial queue %s', (initial) => {
      expect(() => new Lane(LaneClass.CAR, 0.4, noArrivals, initial)).toThrow(InvalidConfiguration);
    });

    it('looks up discharge rate by class', () => {
      expect(new Lane(LaneClass.CAR, 1, noArrivals).dischargeRate).toBe(1);
      expect(new Lane(LaneClass.BIKE, 1, noArrivals).dischargeRate).toBe(2);
    });
  });

  describe('advanceQueue', () => {
    it('drains a green car lane one vehicle per tick', () => {
      const lane = new Lane(LaneClass.CAR, 0.5, noArrivals, 5);
      lane.signalGreen = true;

      const seen: number[] = [];
      for (let i = 0; i < 5; i++) {
        lane.advanceQueue();
        seen.push(lane.queueLength);
      }

      expect(seen).toEqual([4, 3, 2, 1, 0]);
      expect(lane.totalDepartures).toBe(5);
    });

    it('lets a single waiting bike leave alone', () => {
      const lane = new Lane(LaneClass.BIKE, 0.5, noArrivals, 1);
      lane.signalGreen = true;
      lane.advanceQueue();
      expect(lane.queueLength).toBe(0);
      expect(lane.totalDepartures).toBe(1);
    });

    it('releases bikes in pairs otherwise', () => {
      const lane = new Lane(LaneClass.BIKE, 0.5, noArrivals, 4);
      lane.signalGreen = true;
      lane.advanceQueue();
      expect(lane.queueLength).toBe(2);
    });

    it('still takes two from an odd bike queue above one', () => {
      const lane = new Lane(LaneClass.BIKE, 0.5, noArrivals, 3);
      lane.signalGreen = true;
      lane.advanceQueue();
      expect(lane.queueLength).toBe(1);
    });

    it('counts arrivals before deciding departures', () => {
      // 1 waiting + 1 arriving makes a pair
      const lane = new Lane(LaneClass.BIKE, 0.5, () => 1, 1);
      lane.signalGreen = true;
      lane.advanceQueue();
      expect(lane.queueLength).toBe(0);
      expect(lane.totalArrivals).toBe(1);
    });

    it('queues arrivals on red without departures', () => {
      const lane = new Lane(LaneClass.CAR, 2, () => 3, 1);
      lane.advanceQueue();
      expect(lane.queueLength).toBe(4);
      expect(lane.totalArrivals).toBe(3);
      expect(lane.totalDepartures).toBe(0);
    });

    it('does nothing on green with an empty queue', () => {
      const lane = new Lane(LaneClass.CAR, 0.5, noArrivals);
      lane.signalGreen = true;
      lane.advanceQueue();
      expect(lane.queueLength).toBe(0);
      expect(lane.totalDepartures).toBe(0);
    });

    it('samples with the lane arrival rate', () => {
      const sampler = vi.fn((_rate: number) => 0);
      const lane = new Lane(LaneClass.BIKE, 0.25, sampler);
      lane.advanceQueue();
      expect(sampler).toHaveBeenCalledWith(0.25);
    });

    it('never goes negative under random arrivals', () => {
      const sampler = poissonSampler(createSeededRandom(7));
      const lanes = [
        new Lane(LaneClass.CAR, 0.4, sampler),
        new Lane(LaneClass.BIKE, 0.3, sampler),
      ];
      for (let t = 0; t < 2000; t++) {
        for (const lane of lanes) {
          lane.signalGreen = t % 3 !== 0;
          lane.advanceQueue();
          expect(lane.queueLength).toBeGreaterThanOrEqual(0);
        }
      }
    });
  });

  it('snapshots its state', () => {
    const lane = new Lane(LaneClass.CAR, 0.4, () => 2);
    lane.advanceQueue();
    expect(lane.snapshot()).toEqual({
      laneClass: LaneClass.CAR,
      arrivalRate: 0.4,
      queueLength: 2,
      totalArrivals: 2,
      totalDepartures: 0,
    });
  });
});
