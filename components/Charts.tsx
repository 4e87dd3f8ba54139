import React from 'react';
import { LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, Legend, Label } from 'recharts';
import type { ObservationTable } from '../types';
import { CHART, COLORS } from '../constants';
import { BIKE_LIGHT, CAR_LIGHT } from '../services/report';

interface ChartsProps {
  table: ObservationTable;
  totalTicks: number;
  currentTick: number;
}

type ChartPoint = Record<string, number>;

// Signals are drawn as 1 (green) / 0 (red)
export const toChartData = (table: ObservationTable, upToTick: number): ChartPoint[] =>
  table.records
    .filter(r => Number(r.tick) <= upToTick)
    .map(r => {
      const point: ChartPoint = {};
      for (const [key, value] of Object.entries(r)) {
        point[key] = typeof value === 'boolean' ? Number(value) : value;
      }
      return point;
    });

const tooltipStyle = {
  contentStyle: { backgroundColor: '#1e293b', borderColor: '#475569', color: '#f1f5f9' },
  itemStyle: { color: '#f1f5f9' },
};

const Charts: React.FC<ChartsProps> = ({ table, totalTicks, currentTick }) => {
  const chartData = toChartData(table, currentTick);
  const queueColumns = table.columns.filter(c => c !== BIKE_LIGHT && c !== CAR_LIGHT);
  // Colour by lane number within its class ("Bikes 2" -> second bike colour)
  const lineColor = (column: string) => {
    const palette = column.startsWith('Bikes') ? COLORS.BIKE_LINES : COLORS.CAR_LINES;
    const n = Number(column.split(' ')[1]) - 1;
    return palette[n % palette.length];
  };

  return (
    <div className="grid grid-cols-1 lg:grid-cols-3 gap-4">

      {/* 1. Queue lengths */}
      <div className="lg:col-span-2 bg-slate-800 p-4 rounded-xl border border-slate-700 shadow-lg flex flex-col h-80">
        <h3 className="text-slate-200 text-sm font-semibold mb-2">Length of the queue</h3>
        <div className="flex-1 min-h-0">
          <ResponsiveContainer width="100%" height="100%">
            <LineChart data={chartData}>
              <CartesianGrid strokeDasharray="3 3" stroke="#334155" />
              <XAxis dataKey="tick" type="number" domain={[0, totalTicks]} stroke="#94a3b8" fontSize={10}>
                <Label value="Amount of time passed since beginning" position="insideBottom" offset={-2} fill="#94a3b8" fontSize={10} />
              </XAxis>
              <YAxis stroke="#94a3b8" fontSize={10} domain={[0, CHART.Y_MAX]} allowDataOverflow>
                <Label value="Number of vehicles waiting" angle={-90} position="insideLeft" fill="#94a3b8" fontSize={10} />
              </YAxis>
              <Tooltip {...tooltipStyle} />
              <Legend verticalAlign="top" height={36} iconType="circle" />
              {queueColumns.map(column => (
                <Line key={column} name={column} type="monotone" dataKey={column} stroke={lineColor(column)} strokeWidth={2} dot={false} animationDuration={0} />
              ))}
            </LineChart>
          </ResponsiveContainer>
        </div>
      </div>

      {/* 2. Signal states */}
      <div className="bg-slate-800 p-4 rounded-xl border border-slate-700 shadow-lg flex flex-col h-80">
        <h3 className="text-slate-200 text-sm font-semibold mb-2">Signal (1 = green)</h3>
        <div className="flex-1 min-h-0">
          <ResponsiveContainer width="100%" height="100%">
            <LineChart data={chartData}>
              <CartesianGrid strokeDasharray="3 3" stroke="#334155" />
              <XAxis dataKey="tick" type="number" domain={[0, totalTicks]} stroke="#94a3b8" fontSize={10} />
              <YAxis stroke="#94a3b8" fontSize={10} domain={[0, 1]} ticks={[0, 1]} />
              <Tooltip {...tooltipStyle} />
              <Legend verticalAlign="top" height={36} iconType="circle" />
              {table.columns.includes(BIKE_LIGHT) && (
                <Line name="Bike light" type="stepAfter" dataKey={BIKE_LIGHT} stroke={COLORS.BIKE_LINES[0]} strokeWidth={2} dot={false} animationDuration={0} />
              )}
              {table.columns.includes(CAR_LIGHT) && (
                <Line name="Car light" type="stepAfter" dataKey={CAR_LIGHT} stroke={COLORS.CAR_LINES[0]} strokeWidth={2} dot={false} animationDuration={0} />
              )}
            </LineChart>
          </ResponsiveContainer>
        </div>
      </div>

    </div>
  );
};

export default Charts;
