import { describe, it, expect } from 'vitest';
import { toChartData } from './Charts';
import { buildTable } from '../services/report';

describe('toChartData', () => {
  it('plots signals as 0/1 and stops at the given tick', () => {
    const table = buildTable([
      { tick: 0, bike: { signalGreen: true, queues: [2] }, car: { signalGreen: false, queues: [1] } },
      { tick: 1, bike: { signalGreen: false, queues: [0] }, car: { signalGreen: false, queues: [2] } },
      { tick: 2, bike: { signalGreen: false, queues: [1] }, car: { signalGreen: true, queues: [1] } },
    ]);

    expect(toChartData(table, 1)).toEqual([
      { tick: 0, bikelight: 1, 'Bikes 1': 2, carlight: 0, 'Cars 1': 1 },
      { tick: 1, bikelight: 0, 'Bikes 1': 0, carlight: 0, 'Cars 1': 2 },
    ]);
  });
});
