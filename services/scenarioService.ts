import { ComparisonData, LoadResult, Scenario, ScenarioData } from '../types';
import { getScenarioFiles } from '../config';
import { isUsable, TableLoader } from './dataService';

export const loadScenario = async (loader: TableLoader, scenario: Scenario): Promise<ScenarioData> => {
  const files = getScenarioFiles(scenario);
  const [tracking, fixed, weather] = await Promise.all([
    loader.load(files.tracking),
    loader.load(files.fixed),
    loader.load(files.weather),
  ]);
  return { scenario, tracking, fixed, weather };
};

// One message per file that exists but failed to parse
export const collectLoadWarnings = (data: ScenarioData): string[] =>
  [data.tracking, data.fixed, data.weather].flatMap(result =>
    result.status === 'error' ? [result.message] : [],
  );

export const hasComparisonData = (data: ScenarioData): data is ComparisonData =>
  isUsable(data.tracking) && isUsable(data.fixed);

// Paths of the required simulation tables that could not be used
export const unusableSimulationFiles = (data: ScenarioData): string[] =>
  [data.tracking, data.fixed]
    .filter((result: LoadResult) => !isUsable(result))
    .map(result => result.path);
