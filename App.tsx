import React, { useState, useEffect, useRef, useCallback, useMemo } from 'react';
import { Play, Pause, RotateCcw, SkipForward, Download, Bike, Car, AlertTriangle, LogIn, LogOut, Hourglass } from 'lucide-react';
import { loadConfig } from './services/config';
import type { ConfigSource, LoadedConfig } from './services/config';
import { PhaseScheduler } from './services/PhaseScheduler';
import { SimulationEngine } from './services/SimulationEngine';
import { createSeededRandom, poissonSampler } from './services/random';
import { buildTable, laneReports, laneStates, summarize, toCsv } from './services/report';
import IntersectionView from './components/IntersectionView';
import Charts from './components/Charts';
import ObservationTable from './components/ObservationTable';
import { PLAYBACK } from './constants';
import type { ClassObservation, ObservationRow, SignalPhase, SimulationSnapshot } from './types';

const PHASE_LABEL: Record<SignalPhase, string> = {
  BIKE_GREEN: 'Bikes green',
  CLEARANCE_TO_CAR: 'All red',
  CAR_GREEN: 'Cars green',
  CLEARANCE_TO_BIKE: 'All red',
};

const newSeed = () => Math.floor(Math.random() * 2 ** 32);

const queued = (obs: ClassObservation | undefined) => obs ? obs.queues.reduce((a, b) => a + b, 0) : 0;

interface AppProps {
  configSource?: ConfigSource;
}

const App: React.FC<AppProps> = ({ configSource }) => {
  // State
  const [loaded, setLoaded] = useState<LoadedConfig | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [seed, setSeed] = useState<number>(newSeed);
  const [currentTick, setCurrentTick] = useState(0);
  const [isPlaying, setIsPlaying] = useState(false);

  const animationRef = useRef<number>(0);
  const lastTickTime = useRef<number>(0);

  // Configuration is read once at startup
  useEffect(() => {
    let cancelled = false;
    loadConfig(configSource)
      .then(result => { if (!cancelled) setLoaded(result); })
      .catch((err: unknown) => {
        if (!cancelled) setError(err instanceof Error ? err.message : String(err));
      });
    return () => { cancelled = true; };
  }, [configSource]);

  // Whole run up front; playback only reads the rows
  const result = useMemo<{ rows: ObservationRow[]; snapshot: SimulationSnapshot | null }>(() => {
    if (!loaded) return { rows: [], snapshot: null };
    const engine = new SimulationEngine(loaded.config, { sampler: poissonSampler(createSeededRandom(seed)) });
    const rows = engine.run();
    return { rows, snapshot: engine.getSnapshot() };
  }, [loaded, seed]);

  const { rows, snapshot } = result;
  const table = useMemo(() => buildTable(rows), [rows]);
  const reports = useMemo(
    () => laneReports(summarize(rows), snapshot ? snapshot.lanes : []),
    [rows, snapshot]
  );
  const scheduler = useMemo(() => loaded ? new PhaseScheduler(loaded.config.cycle) : null, [loaded]);

  const lastTick = Math.max(0, rows.length - 1);
  const row = rows[Math.min(currentTick, lastTick)];

  // Animation Loop
  const tick = useCallback((timestamp: number) => {
    if (!lastTickTime.current) lastTickTime.current = timestamp;
    const elapsed = timestamp - lastTickTime.current;

    if (elapsed > 1000 / PLAYBACK.TICKS_PER_SECOND) {
      setCurrentTick(prev => Math.min(prev + 1, lastTick));
      lastTickTime.current = timestamp;
    }

    if (isPlaying) {
      animationRef.current = requestAnimationFrame(tick);
    }
  }, [isPlaying, lastTick]);

  useEffect(() => {
    if (isPlaying) {
      lastTickTime.current = 0;
      animationRef.current = requestAnimationFrame(tick);
    }
    return () => {
      if (animationRef.current) cancelAnimationFrame(animationRef.current);
    };
  }, [isPlaying, tick]);

  useEffect(() => {
    if (currentTick >= lastTick) setIsPlaying(false);
  }, [currentTick, lastTick]);

  // Handlers
  const handleReset = () => {
    setIsPlaying(false);
    setCurrentTick(0);
    setSeed(newSeed());
  };

  const handleSkip = () => {
    setIsPlaying(false);
    setCurrentTick(lastTick);
  };

  const handleDownload = () => {
    const blob = new Blob([toCsv(table)], { type: 'text/csv;charset=utf-8;' });
    const url = URL.createObjectURL(blob);
    const link = document.createElement('a');
    link.href = url;
    link.download = `queues-seed-${seed}.csv`;
    link.click();
    URL.revokeObjectURL(url);
  };

  if (error) {
    return (
      <div className="min-h-screen bg-slate-900 text-slate-100 flex items-center justify-center p-6">
        <div role="alert" className="bg-slate-800 border border-red-500/40 rounded-xl p-4 max-w-lg">
          <div className="flex items-center gap-2 text-red-400 font-bold mb-1">
            <AlertTriangle size={16} /> Invalid configuration
          </div>
          <div className="text-sm text-slate-300">{error}</div>
        </div>
      </div>
    );
  }

  if (loaded && rows.length === 0) {
    return (
      <div className="min-h-screen bg-slate-900 text-slate-400 flex items-center justify-center">
        SIM_LENGTH is too short to simulate a single tick.
      </div>
    );
  }

  if (!loaded || !row || !scheduler || !snapshot) {
    return (
      <div className="min-h-screen bg-slate-900 text-slate-600 flex items-center justify-center">
        Initializing...
      </div>
    );
  }

  const { cycle, totalTicks } = loaded.config;
  const { stats } = snapshot;

  return (
    <div className="min-h-screen bg-slate-900 text-slate-100 font-sans flex flex-col overflow-hidden">
      {/* Header */}
      <header className="bg-slate-950 border-b border-slate-800 p-3 shrink-0">
        <div className="max-w-7xl mx-auto flex flex-col md:flex-row justify-between items-center gap-3">
          <div>
            <h1 className="text-lg md:text-xl font-bold bg-gradient-to-r from-emerald-400 to-blue-400 bg-clip-text text-transparent">
              Intersection Queue Simulator
            </h1>
            <div className="text-[10px] text-slate-500 font-mono">
              cycle {cycle.cycleLength}s · bikes {cycle.bikeGreenDuration}s · cars {cycle.carGreenDuration}s · all red {cycle.allRedDuration}s ×2
            </div>
          </div>

          <div className="flex gap-2">
            <button
              onClick={() => setIsPlaying(!isPlaying)}
              disabled={currentTick >= lastTick}
              className={`flex items-center gap-2 px-4 py-1.5 rounded-lg font-bold transition-colors shadow-lg text-sm disabled:opacity-40 ${
                isPlaying
                  ? 'bg-amber-500 hover:bg-amber-600 text-white shadow-amber-900/20'
                  : 'bg-emerald-500 hover:bg-emerald-600 text-white shadow-emerald-900/20'
              }`}
            >
              {isPlaying ? <Pause size={16} /> : <Play size={16} />}
              {isPlaying ? "PAUSE" : "PLAY"}
            </button>
            <button onClick={handleSkip} className="p-1.5 bg-slate-800 hover:bg-slate-700 text-slate-300 rounded-lg transition-colors border border-slate-700" title="Skip to end">
              <SkipForward size={16} />
            </button>
            <button onClick={handleReset} className="p-1.5 bg-slate-800 hover:bg-slate-700 text-slate-300 rounded-lg transition-colors border border-slate-700" title="Reset">
              <RotateCcw size={16} />
            </button>
            <button onClick={handleDownload} className="p-1.5 bg-slate-800 hover:bg-slate-700 text-slate-300 rounded-lg transition-colors border border-slate-700" title="Download CSV">
              <Download size={16} />
            </button>
          </div>
        </div>
      </header>

      <main className="flex-1 max-w-7xl mx-auto p-4 w-full flex flex-col gap-4 overflow-auto">
        {loaded.warnings.length > 0 && (
          <div className="bg-amber-500/10 border border-amber-500/30 text-amber-300 text-xs rounded-lg p-2 flex items-start gap-2">
            <AlertTriangle size={14} className="mt-0.5 shrink-0" />
            <ul>{loaded.warnings.map(w => <li key={w}>{w}</li>)}</ul>
          </div>
        )}

        <div className="grid grid-cols-1 md:grid-cols-2 gap-4 items-start">
          <div className="flex flex-col gap-2">
            <div className="flex items-center justify-between bg-slate-950/50 p-2 rounded-t-xl border-b border-slate-700">
              <h2 className="font-bold text-sm">Tick {row.tick} / {totalTicks}</h2>
              <div className="text-[10px] text-slate-400 uppercase" data-testid="phase">{PHASE_LABEL[scheduler.phaseAt(row.tick)]}</div>
            </div>
            <IntersectionView lanes={laneStates(row)} />
            <div className="grid grid-cols-2 gap-2">
              <div className="bg-slate-800 p-2 rounded-lg border border-slate-700">
                <div className="text-slate-400 text-[10px] uppercase tracking-wider flex items-center gap-1"><Bike size={12} /> Bikes queued</div>
                <div className="text-xl font-mono font-bold text-amber-300">{queued(row.bike)}</div>
              </div>
              <div className="bg-slate-800 p-2 rounded-lg border border-slate-700">
                <div className="text-slate-400 text-[10px] uppercase tracking-wider flex items-center gap-1"><Car size={12} /> Cars queued</div>
                <div className="text-xl font-mono font-bold text-blue-400">{queued(row.car)}</div>
              </div>
            </div>
          </div>

          <div className="bg-slate-800 p-4 rounded-xl border border-slate-700 shadow-lg">
            <h3 className="text-slate-200 text-sm font-semibold mb-2">Run summary</h3>
            <table className="w-full text-xs font-mono text-slate-300">
              <thead>
                <tr className="text-slate-400 uppercase text-[10px]">
                  <th className="text-left px-2 py-1">lane</th>
                  <th className="text-right px-2 py-1">max queue</th>
                  <th className="text-right px-2 py-1">mean queue</th>
                  <th className="text-right px-2 py-1">arrived</th>
                  <th className="text-right px-2 py-1">departed</th>
                </tr>
              </thead>
              <tbody>
                {reports.map(s => (
                  <tr key={s.label} className="border-t border-slate-700">
                    <td className="px-2 py-1">{s.label}</td>
                    <td className="text-right px-2 py-1">{s.maxQueue}</td>
                    <td className="text-right px-2 py-1">{s.meanQueue.toFixed(2)}</td>
                    <td className="text-right px-2 py-1">{s.arrivals}</td>
                    <td className="text-right px-2 py-1">{s.departures}</td>
                  </tr>
                ))}
              </tbody>
            </table>
            <div className="grid grid-cols-3 gap-2 mt-3">
              <div className="bg-slate-900/60 p-2 rounded-lg border border-slate-700">
                <div className="text-slate-400 text-[10px] uppercase tracking-wider flex items-center gap-1"><LogIn size={12} /> Arrived</div>
                <div className="text-lg font-mono font-bold text-emerald-400" data-testid="stat-arrivals">{stats.arrivals}</div>
              </div>
              <div className="bg-slate-900/60 p-2 rounded-lg border border-slate-700">
                <div className="text-slate-400 text-[10px] uppercase tracking-wider flex items-center gap-1"><LogOut size={12} /> Departed</div>
                <div className="text-lg font-mono font-bold text-blue-400" data-testid="stat-departures">{stats.departures}</div>
              </div>
              <div className="bg-slate-900/60 p-2 rounded-lg border border-slate-700">
                <div className="text-slate-400 text-[10px] uppercase tracking-wider flex items-center gap-1"><Hourglass size={12} /> Still queued</div>
                <div className="text-lg font-mono font-bold text-amber-300" data-testid="stat-queued">{stats.queuedVehicles}</div>
              </div>
            </div>
          </div>
        </div>

        <Charts table={table} totalTicks={totalTicks} currentTick={row.tick} />

        <ObservationTable table={table} currentTick={row.tick} />
      </main>
    </div>
  );
};

export default App;
