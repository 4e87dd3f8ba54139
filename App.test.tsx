import React from 'react';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { render, screen, cleanup } from '@testing-library/react';
import App from './App';

// ResponsiveContainer observes its parent; jsdom has no ResizeObserver
class ResizeObserverStub {
  observe() {}
  unobserve() {}
  disconnect() {}
}

describe('App', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    cleanup();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('runs on defaults when the configuration cannot be read', async () => {
    vi.stubGlobal('ResizeObserver', ResizeObserverStub);
    render(<App configSource={async () => 'not json'} />);

    expect(await screen.findByText('Tick 0 / 360')).toBeTruthy();
    expect(screen.getByText('Using default configuration for simulation')).toBeTruthy();
    expect(screen.getByTestId('phase').textContent).toBe('Bikes green');
  });

  it('reports run totals that balance', async () => {
    vi.stubGlobal('ResizeObserver', ResizeObserverStub);
    render(<App configSource={async () => '{}'} />);

    const arrivals = Number((await screen.findByTestId('stat-arrivals')).textContent);
    const departures = Number(screen.getByTestId('stat-departures').textContent);
    const queued = Number(screen.getByTestId('stat-queued').textContent);
    expect(arrivals).toBeGreaterThan(0);
    expect(arrivals - departures).toBe(queued);
    expect(screen.getByText('arrived')).toBeTruthy();
  });

  it('shows why an invalid configuration was rejected', async () => {
    vi.stubGlobal('ResizeObserver', ResizeObserverStub);
    render(<App configSource={async () => '{"GREEN_CARS": -5}'} />);

    expect(await screen.findByText('GREEN_CARS: must be a non-negative whole number of ticks, got -5')).toBeTruthy();
    expect(screen.getByRole('alert')).toBeTruthy();
  });
});
