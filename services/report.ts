import { LaneClass } from '../types';
import type {
  ClassObservation,
  LaneReport,
  LaneSnapshot,
  LaneSummary,
  ObservationRow,
  ObservationTable,
  TableCell,
} from '../types';

export const BIKE_LIGHT = 'bikelight';
export const CAR_LIGHT = 'carlight';
export const bikeColumn = (i: number) => `Bikes ${i + 1}`;
export const carColumn = (i: number) => `Cars ${i + 1}`;

function classColumns(obs: ClassObservation, light: string, name: (i: number) => string): string[] {
  if (obs.signalGreen === null) return [];
  return [light, ...obs.queues.map((_, i) => name(i))];
}

function fillClass(
  record: Record<string, TableCell>,
  obs: ClassObservation,
  light: string,
  name: (i: number) => string
) {
  if (obs.signalGreen === null) return;
  record[light] = obs.signalGreen;
  obs.queues.forEach((q, i) => { record[name(i)] = q; });
}

/**
 * Lays the rows out as a table: bike light, each bike lane, car light, each
 * car lane. Lane counts are fixed for a run, so the first row decides the
 * columns.
 */
export function buildTable(rows: readonly ObservationRow[]): ObservationTable {
  if (rows.length === 0) return { columns: [], records: [] };

  const first = rows[0];
  const columns = [
    ...classColumns(first.bike, BIKE_LIGHT, bikeColumn),
    ...classColumns(first.car, CAR_LIGHT, carColumn),
  ];

  const records = rows.map(row => {
    const record: Record<string, TableCell> = { tick: row.tick };
    fillClass(record, row.bike, BIKE_LIGHT, bikeColumn);
    fillClass(record, row.car, CAR_LIGHT, carColumn);
    return record;
  });

  return { columns, records };
}

const formatCell = (cell: TableCell | undefined) => {
  if (cell === undefined) return '';
  if (typeof cell === 'boolean') return cell ? '1' : '0';
  return String(cell);
};

export function toCsv(table: ObservationTable): string {
  const header = ['tick', ...table.columns].join(',');
  const lines = table.records.map(r => ['tick', ...table.columns].map(c => formatCell(r[c])).join(','));
  return [header, ...lines].join('\n') + '\n';
}

export function summarize(rows: readonly ObservationRow[]): LaneSummary[] {
  if (rows.length === 0) return [];

  const summaries: LaneSummary[] = [];
  const add = (laneClass: LaneClass, pick: (row: ObservationRow) => number[], name: (i: number) => string) => {
    pick(rows[0]).forEach((_, i) => {
      let max = 0;
      let total = 0;
      for (const row of rows) {
        const q = pick(row)[i];
        max = Math.max(max, q);
        total += q;
      }
      summaries.push({ label: name(i), laneClass, maxQueue: max, meanQueue: total / rows.length });
    });
  };

  add(LaneClass.BIKE, r => r.bike.queues, bikeColumn);
  add(LaneClass.CAR, r => r.car.queues, carColumn);
  return summaries;
}

// Summaries list lanes by class in configured order, so the nth summary of a
// class belongs to the nth snapshot lane of that class
export function laneReports(summaries: readonly LaneSummary[], lanes: readonly LaneSnapshot[]): LaneReport[] {
  const seen = new Map<LaneClass, number>();
  return summaries.map(summary => {
    const index = seen.get(summary.laneClass) ?? 0;
    seen.set(summary.laneClass, index + 1);
    const lane = lanes.filter(l => l.laneClass === summary.laneClass)[index];
    return {
      ...summary,
      arrivals: lane ? lane.totalArrivals : 0,
      departures: lane ? lane.totalDepartures : 0,
    };
  });
}

export interface LaneState {
  label: string;
  laneClass: LaneClass;
  signalGreen: boolean;
  queueLength: number;
}

// Every lane of a class shows the same signal
export function laneStates(row: ObservationRow): LaneState[] {
  const expand = (obs: ClassObservation, laneClass: LaneClass, name: (i: number) => string) =>
    obs.queues.map((queueLength, i) => ({
      label: name(i),
      laneClass,
      signalGreen: obs.signalGreen === true,
      queueLength,
    }));
  return [
    ...expand(row.bike, LaneClass.BIKE, bikeColumn),
    ...expand(row.car, LaneClass.CAR, carColumn),
  ];
}
