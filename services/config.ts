import { CONFIG_PATH, DEFAULTS, DEFAULT_LANES, SECONDS_PER_HOUR } from '../constants';
import { LaneClass } from '../types';
import type { CycleConfig, LaneDescriptor, SimulationConfig } from '../types';
import { ConfigurationUnreadable, InvalidConfiguration } from './errors';
import { createLogger } from './logger';

const log = createLogger('config');

export interface CycleDurations {
  bikeGreenDuration: number;
  carGreenDuration: number;
  allRedDuration: number;
}

export interface LoadedConfig {
  config: SimulationConfig;
  warnings: string[];
  usedDefaults: boolean;
}

// Yields the raw text of the configuration file
export type ConfigSource = () => Promise<string>;

const checkDuration = (field: string, value: number) => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidConfiguration(field, `must be a non-negative whole number of ticks, got ${value}`);
  }
};

export function createCycleConfig({ bikeGreenDuration, carGreenDuration, allRedDuration }: CycleDurations): CycleConfig {
  checkDuration('GREEN_BIKES', bikeGreenDuration);
  checkDuration('GREEN_CARS', carGreenDuration);
  checkDuration('RED_TIME_ALL', allRedDuration);

  const cycleLength = bikeGreenDuration + carGreenDuration + 2 * allRedDuration;
  if (cycleLength === 0) {
    throw new InvalidConfiguration('cycleLength', 'at least one duration must be non-zero');
  }

  return Object.freeze({ bikeGreenDuration, carGreenDuration, allRedDuration, cycleLength });
}

export function createSimulationConfig(
  cycle: CycleConfig,
  simulatedHours: number,
  lanes: readonly LaneDescriptor[]
): SimulationConfig {
  if (!Number.isFinite(simulatedHours) || simulatedHours < 0) {
    throw new InvalidConfiguration('SIM_LENGTH', `must be a non-negative number of hours, got ${simulatedHours}`);
  }
  lanes.forEach((lane, i) => {
    if (!Number.isFinite(lane.arrivalRate) || lane.arrivalRate <= 0) {
      throw new InvalidConfiguration(`lanes[${i}].business`, `arrival rate must be positive, got ${lane.arrivalRate}`);
    }
  });

  return Object.freeze({
    cycle,
    simulatedHours,
    totalTicks: Math.floor(SECONDS_PER_HOUR * simulatedHours),
    lanes: Object.freeze(lanes.map(l => Object.freeze({ ...l }))),
  });
}

export function defaultConfig(): SimulationConfig {
  const cycle = createCycleConfig({
    bikeGreenDuration: DEFAULTS.GREEN_BIKES,
    carGreenDuration: DEFAULTS.GREEN_CARS,
    allRedDuration: DEFAULTS.RED_TIME_ALL,
  });
  return createSimulationConfig(cycle, DEFAULTS.SIM_LENGTH, DEFAULT_LANES);
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (json: Record<string, unknown>, key: string, fallback: number): number => {
  const value = json[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number') {
    throw new ConfigurationUnreadable(`"${key}" is not a number`);
  }
  return value;
};

const readLaneClass = (value: unknown, index: number): LaneClass => {
  if (typeof value === 'string') {
    const name = value.toLowerCase();
    if (name === 'car') return LaneClass.CAR;
    if (name === 'bike') return LaneClass.BIKE;
  }
  throw new ConfigurationUnreadable(`lanes[${index}].type must be "car" or "bike"`);
};

const readLanes = (value: unknown): LaneDescriptor[] => {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ConfigurationUnreadable('"lanes" is not a list');
  }
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry)) {
      throw new ConfigurationUnreadable(`lanes[${i}] is not an object`);
    }
    if (typeof entry.business !== 'number') {
      throw new ConfigurationUnreadable(`lanes[${i}].business is not a number`);
    }
    return { laneClass: readLaneClass(entry.type, i), arrivalRate: entry.business };
  });
};

/**
 * Turns the text of a configuration file into a validated config.
 * Throws ConfigurationUnreadable for text that is not a usable document and
 * InvalidConfiguration for a document whose values are out of range.
 */
export function parseConfig(text: string): LoadedConfig {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationUnreadable('Configuration file is not properly formatted', err);
  }
  if (!isRecord(json)) {
    throw new ConfigurationUnreadable('Configuration file must hold a JSON object');
  }

  const cycle = createCycleConfig({
    bikeGreenDuration: readNumber(json, 'GREEN_BIKES', DEFAULTS.GREEN_BIKES),
    carGreenDuration: readNumber(json, 'GREEN_CARS', DEFAULTS.GREEN_CARS),
    allRedDuration: readNumber(json, 'RED_TIME_ALL', DEFAULTS.RED_TIME_ALL),
  });
  const simulatedHours = readNumber(json, 'SIM_LENGTH', DEFAULTS.SIM_LENGTH);

  const warnings: string[] = [];
  let lanes = readLanes(json.lanes);
  if (lanes.length === 0) {
    warnings.push('No lanes configured, using the default lane set');
    lanes = [...DEFAULT_LANES];
  }

  return {
    config: createSimulationConfig(cycle, simulatedHours, lanes),
    warnings,
    usedDefaults: false,
  };
}

export const fetchConfigSource = (url: string = CONFIG_PATH): ConfigSource => async () => {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (err) {
    throw new ConfigurationUnreadable(`File '${url}' could not be fetched`, err);
  }
  if (!response.ok) {
    throw new ConfigurationUnreadable(`File '${url}' was not found (HTTP ${response.status})`);
  }
  return response.text();
};

/**
 * Reads the configuration once at startup. An unreadable source falls back
 * to the built-in defaults; invalid values propagate to the caller.
 */
export async function loadConfig(source: ConfigSource = fetchConfigSource()): Promise<LoadedConfig> {
  log.info('Reading configuration file');
  try {
    const loaded = parseConfig(await source());
    loaded.warnings.forEach(w => log.warn(w));
    return loaded;
  } catch (err) {
    if (!(err instanceof ConfigurationUnreadable)) throw err;
    log.warn(err.message);
    log.warn('Using default configuration for simulation');
    return {
      config: defaultConfig(),
      warnings: [err.message, 'Using default configuration for simulation'],
      usedDefaults: true,
    };
  }
}
