import { MountMode, Scenario, ScenarioFiles } from './types';

export const APP_TITLE = 'Solar Tracker & MPPT Performance Analysis';

// Simulation exports, served beside the page
export const SIMULATION_FILES: Record<Scenario, Record<MountMode, string>> = {
  [Scenario.CLEAR]: {
    [MountMode.TRACKING]: './Data/clear_0.csv',
    [MountMode.FIXED]: './Data/clear_1_fix_33.csv',
  },
  [Scenario.CLOUDY]: {
    [MountMode.TRACKING]: './Data/cloudy_0.csv',
    [MountMode.FIXED]: './Data/cloudy_1.csv',
  },
};

export const WEATHER_FILES: Record<Scenario, string> = {
  [Scenario.CLEAR]: './Data/phoenix_clear_1s.csv',
  [Scenario.CLOUDY]: './Data/phoenix_cloudy_1s.csv',
};

export const MODEL_IMAGE_PATH = './Data/MODEL.png';

export const DEFAULT_SCENARIO = Scenario.CLEAR;

export const FIXED_TILT_DEG = 33;

export const SECONDS_PER_HOUR = 3600;

// Panel power (W) at or below which converter efficiency is not computed
export const EFFICIENCY_NOISE_FLOOR_W = 1.0;

export const EFFICIENCY_AXIS_RANGE: [number, number] = [90, 100];

export const MAX_CHART_POINTS = 2000;

export const getScenarioFiles = (scenario: Scenario): ScenarioFiles => ({
  tracking: SIMULATION_FILES[scenario][MountMode.TRACKING],
  fixed: SIMULATION_FILES[scenario][MountMode.FIXED],
  weather: WEATHER_FILES[scenario],
});
