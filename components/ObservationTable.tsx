import React from 'react';
import type { ObservationTable as Table, TableCell } from '../types';

interface ObservationTableProps {
  table: Table;
  currentTick: number;
  visibleRows?: number;
}

const renderCell = (cell: TableCell | undefined) => {
  if (typeof cell === 'boolean') {
    return <span className={cell ? 'text-emerald-400' : 'text-red-400'}>{cell ? 'GREEN' : 'RED'}</span>;
  }
  return cell ?? '';
};

// Trailing window of rows ending at the current tick
const ObservationTable: React.FC<ObservationTableProps> = ({ table, currentTick, visibleRows = 10 }) => {
  const upTo = table.records.filter(r => Number(r.tick) <= currentTick);
  const rows = upTo.slice(-visibleRows);

  return (
    <div className="bg-slate-800 p-4 rounded-xl border border-slate-700 shadow-lg overflow-x-auto">
      <h3 className="text-slate-200 text-sm font-semibold mb-2">Observations</h3>
      <table className="w-full text-xs font-mono text-slate-300">
        <thead>
          <tr className="text-slate-400 uppercase text-[10px]">
            <th className="text-left px-2 py-1">tick</th>
            {table.columns.map(c => <th key={c} className="text-right px-2 py-1">{c}</th>)}
          </tr>
        </thead>
        <tbody>
          {rows.map(r => (
            <tr key={String(r.tick)} className="border-t border-slate-700">
              <td className="px-2 py-1">{r.tick}</td>
              {table.columns.map(c => <td key={c} className="text-right px-2 py-1">{renderCell(r[c])}</td>)}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};

export default ObservationTable;
