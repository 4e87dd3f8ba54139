import { describe, it, expect } from 'vitest';
import { buildTable, laneReports, laneStates, summarize, toCsv } from './report';
import { LaneClass } from '../types';
import type { LaneSnapshot, ObservationRow } from '../types';

const rows: ObservationRow[] = [
  { tick: 0, bike: { signalGreen: true, queues: [1, 0] }, car: { signalGreen: false, queues: [2] } },
  { tick: 1, bike: { signalGreen: true, queues: [0, 3] }, car: { signalGreen: false, queues: [4] } },
];

describe('buildTable', () => {
  it('names columns by class and lane number', () => {
    const table = buildTable(rows);
    expect(table.columns).toEqual(['bikelight', 'Bikes 1', 'Bikes 2', 'carlight', 'Cars 1']);
    expect(table.records[0]).toEqual({
      tick: 0,
      bikelight: true,
      'Bikes 1': 1,
      'Bikes 2': 0,
      carlight: false,
      'Cars 1': 2,
    });
  });

  it('leaves out a class without lanes', () => {
    const table = buildTable([{ tick: 0, bike: { signalGreen: null, queues: [] }, car: { signalGreen: true, queues: [1] } }]);
    expect(table.columns).toEqual(['carlight', 'Cars 1']);
    expect(table.records).toEqual([{ tick: 0, carlight: true, 'Cars 1': 1 }]);
  });

  it('is empty for an empty run', () => {
    expect(buildTable([])).toEqual({ columns: [], records: [] });
  });
});

describe('toCsv', () => {
  it('writes lights as 1/0', () => {
    expect(toCsv(buildTable(rows))).toBe(
      'tick,bikelight,Bikes 1,Bikes 2,carlight,Cars 1\n' +
      '0,1,1,0,0,2\n' +
      '1,1,0,3,0,4\n'
    );
  });
});

describe('summarize', () => {
  it('reports max and mean queue per lane', () => {
    expect(summarize(rows)).toEqual([
      { label: 'Bikes 1', laneClass: LaneClass.BIKE, maxQueue: 1, meanQueue: 0.5 },
      { label: 'Bikes 2', laneClass: LaneClass.BIKE, maxQueue: 3, meanQueue: 1.5 },
      { label: 'Cars 1', laneClass: LaneClass.CAR, maxQueue: 4, meanQueue: 3 },
    ]);
  });
});

describe('laneReports', () => {
  it('matches lanes to summaries by class and position', () => {
    const lanes: LaneSnapshot[] = [
      { laneClass: LaneClass.CAR, arrivalRate: 0.4, queueLength: 4, totalArrivals: 9, totalDepartures: 5 },
      { laneClass: LaneClass.BIKE, arrivalRate: 0.1, queueLength: 0, totalArrivals: 2, totalDepartures: 2 },
      { laneClass: LaneClass.BIKE, arrivalRate: 0.2, queueLength: 3, totalArrivals: 7, totalDepartures: 4 },
    ];
    expect(laneReports(summarize(rows), lanes)).toEqual([
      { label: 'Bikes 1', laneClass: LaneClass.BIKE, maxQueue: 1, meanQueue: 0.5, arrivals: 2, departures: 2 },
      { label: 'Bikes 2', laneClass: LaneClass.BIKE, maxQueue: 3, meanQueue: 1.5, arrivals: 7, departures: 4 },
      { label: 'Cars 1', laneClass: LaneClass.CAR, maxQueue: 4, meanQueue: 3, arrivals: 9, departures: 5 },
    ]);
  });
});

describe('laneStates', () => {
  it('expands a row into one entry per lane', () => {
    expect(laneStates(rows[1])).toEqual([
      { label: 'Bikes 1', laneClass: LaneClass.BIKE, signalGreen: true, queueLength: 0 },
      { label: 'Bikes 2', laneClass: LaneClass.BIKE, signalGreen: true, queueLength: 3 },
      { label: 'Cars 1', laneClass: LaneClass.CAR, signalGreen: false, queueLength: 4 },
    ]);
  });
});
