import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { createTableLoader } from '../dataService';
import { collectLoadWarnings, hasComparisonData, loadScenario, unusableSimulationFiles } from '../scenarioService';
import { getScenarioFiles } from '../../config';
import { Scenario, TextReader } from '../../types';

const SIM_CSV = 'time,Pl/t,Ppv/t,Pload,Ppv,Vload:1,Vpv,Iload,Ipv\n0,0,0,0,0,0,0,0,0\n3600,40,42,96,100,48,32,2,3.125\n';
const WEATHER_CSV = 'Time_Seconds,Temperature,GHI,DNI,DHI\n0,20,0,0,0\n3600,24,600,700,90\n';

const readerFor = (files: Record<string, string>): TextReader => {
  const store = new Map(Object.entries(files));
  return async (path) => store.get(path) ?? null;
};

afterEach(() => {
  jest.restoreAllMocks();
});

describe('loadScenario', () => {
  const clear = getScenarioFiles(Scenario.CLEAR);

  test('loads the tracking, fixed and weather tables for a scenario', async () => {
    const loader = createTableLoader(readerFor({
      [clear.tracking]: SIM_CSV,
      [clear.fixed]: SIM_CSV,
      [clear.weather]: WEATHER_CSV,
    }));

    const data = await loadScenario(loader, Scenario.CLEAR);
    expect(data.scenario).toBe(Scenario.CLEAR);
    expect(data.tracking.status).toBe('loaded');
    expect(data.fixed.status).toBe('loaded');
    expect(data.weather.status).toBe('loaded');
    expect(collectLoadWarnings(data)).toEqual([]);
    expect(unusableSimulationFiles(data)).toEqual([]);
  });

  test('narrows both simulation runs to loaded tables', async () => {
    const loader = createTableLoader(readerFor({ [clear.tracking]: SIM_CSV, [clear.fixed]: SIM_CSV }));

    const data = await loadScenario(loader, Scenario.CLEAR);
    if (!hasComparisonData(data)) throw new Error('expected both runs to load');
    expect(data.tracking.table.rows).toHaveLength(2);
    expect(data.fixed.table.columns).toContain('Energy_Load');
  });

  test('lists the simulation files that are missing', async () => {
    const loader = createTableLoader(readerFor({ [clear.tracking]: SIM_CSV }));

    const data = await loadScenario(loader, Scenario.CLEAR);
    expect(data.fixed).toEqual({ status: 'absent', path: './Data/clear_1_fix_33.csv' });
    expect(hasComparisonData(data)).toBe(false);
    expect(unusableSimulationFiles(data)).toEqual(['./Data/clear_1_fix_33.csv']);
    expect(collectLoadWarnings(data)).toEqual([]);
  });

  test('warns once per malformed file and keeps the rest', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => {});
    const cloudy = getScenarioFiles(Scenario.CLOUDY);
    const loader = createTableLoader(readerFor({
      [cloudy.tracking]: SIM_CSV,
      [cloudy.fixed]: SIM_CSV,
      [cloudy.weather]: 'Time_Seconds,GHI\n0,1,2\n',
    }));

    const data = await loadScenario(loader, Scenario.CLOUDY);
    expect(hasComparisonData(data)).toBe(true);
    expect(collectLoadWarnings(data)).toEqual([
      'Error loading ./Data/phoenix_cloudy_1s.csv: Expected 2 fields in line 2, saw 3',
    ]);
  });
});
