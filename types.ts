export type CellValue = number | string | null;

export type TableRow = Record<string, CellValue>;

export interface DataTable {
  columns: string[];
  rows: TableRow[];
}

export type LoadResult =
  | { status: 'loaded'; path: string; table: DataTable }
  | { status: 'absent'; path: string }
  | { status: 'error'; path: string; message: string };

export type LoadedResult = Extract<LoadResult, { status: 'loaded' }>;

// Resolves to the file text, or null when nothing exists at the path
export type TextReader = (path: string) => Promise<string | null>;

export enum Scenario {
  CLEAR = 'Clear Day',
  CLOUDY = 'Cloudy Day',
}

export enum MountMode {
  TRACKING = 'Tracking',
  FIXED = 'Fixed',
}

export enum AnalysisTab {
  INPUT = 'Input Data',
  POWER = 'Power & Energy',
  LOSSES = 'Converter Losses',
  MPPT = 'MPPT Diagnostics',
}

export interface ScenarioFiles {
  tracking: string;
  fixed: string;
  weather: string;
}

export interface ScenarioData {
  scenario: Scenario;
  tracking: LoadResult;
  fixed: LoadResult;
  weather: LoadResult;
}

// Scenario whose tracking and fixed runs both loaded with rows
export interface ComparisonData extends ScenarioData {
  tracking: LoadedResult;
  fixed: LoadedResult;
}

export interface EnergySummary {
  trackingTotal: number; // Wh
  fixedTotal: number; // Wh
  gainPct: number;
}

export interface EfficiencyPoint {
  time: number; // h
  efficiency: number; // %
}

export interface SeriesPoint {
  x: number;
  y: number;
}

export interface OperatingPoint {
  voltage: number;
  current: number;
  power: number;
  color: string;
}
