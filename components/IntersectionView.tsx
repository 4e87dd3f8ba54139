import React from 'react';
import { LaneClass } from '../types';
import { CHART, COLORS } from '../constants';
import type { LaneState } from '../services/report';

interface IntersectionViewProps {
  lanes: LaneState[];
}

const LANE_WIDTH = 36;
const LANE_GAP = 10;
const QUEUE_HEIGHT = 200;
const PADDING = 20;
const HEAD_RADIUS = 9;

const IntersectionView: React.FC<IntersectionViewProps> = ({ lanes }) => {
  const width = lanes.length * (LANE_WIDTH + LANE_GAP) - LANE_GAP + PADDING * 2;
  const height = QUEUE_HEIGHT + PADDING * 2 + HEAD_RADIUS * 2 + 24;
  const stopLine = PADDING + HEAD_RADIUS * 2 + 8;

  // Queue bar grows away from the stop line, clipped at the chart ceiling
  const barHeight = (queue: number) => (Math.min(queue, CHART.Y_MAX) / CHART.Y_MAX) * QUEUE_HEIGHT;

  const drawLane = (lane: LaneState, i: number) => {
    const x = PADDING + i * (LANE_WIDTH + LANE_GAP);
    const isBike = lane.laneClass === LaneClass.BIKE;

    return (
      <g key={lane.label} data-testid={`lane-${lane.label}`}>
        {/* Lane surface */}
        <rect x={x} y={stopLine} width={LANE_WIDTH} height={QUEUE_HEIGHT} fill={COLORS.LANE_EMPTY} rx={3} />

        {/* Queue */}
        <rect
          x={x + 4}
          y={stopLine}
          width={LANE_WIDTH - 8}
          height={barHeight(lane.queueLength)}
          fill={isBike ? COLORS.BIKE_LINES[0] : COLORS.CAR_LINES[0]}
          opacity={0.8}
          rx={2}
        />

        {/* Signal head */}
        <circle
          cx={x + LANE_WIDTH / 2}
          cy={PADDING + HEAD_RADIUS}
          r={HEAD_RADIUS}
          fill={lane.signalGreen ? COLORS.GREEN : COLORS.RED}
          stroke="#475569"
          strokeWidth="1.5"
        />

        <text x={x + LANE_WIDTH / 2} y={stopLine + QUEUE_HEIGHT + 16} textAnchor="middle" fontSize={10} fill="#94a3b8">
          {lane.queueLength}
        </text>
      </g>
    );
  };

  return (
    <div className="overflow-hidden flex justify-center items-center bg-slate-950 rounded-xl">
      <svg width={width} height={height} viewBox={`0 0 ${width} ${height}`} style={{ maxWidth: '100%', height: 'auto' }}>
        {/* Stop line */}
        <line x1={PADDING} y1={stopLine} x2={width - PADDING} y2={stopLine} stroke="#f1f5f9" strokeWidth={2} />
        {lanes.map(drawLane)}
      </svg>
    </div>
  );
};

export default IntersectionView;
