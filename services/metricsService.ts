import { DataTable, EfficiencyPoint, EnergySummary } from '../types';
import { EFFICIENCY_NOISE_FLOOR_W } from '../config';
import { hasColumns, numericColumn } from './dataService';

export const ENERGY_COLUMN = 'Energy_Load';

// Cumulative energy only grows, so the peak value is the run total
export const totalEnergy = (table: DataTable, column: string = ENERGY_COLUMN): number | null => {
  const values = numericColumn(table, column);
  if (values.length === 0) return null;
  return values.reduce((max, v) => (v > max ? v : max), -Infinity);
};

export const efficiencyGain = (trackingTotal: number, fixedTotal: number): number => {
  if (fixedTotal <= 0) return 0;
  return ((trackingTotal - fixedTotal) / fixedTotal) * 100;
};

export const summarizeEnergy = (tracking: DataTable, fixed: DataTable): EnergySummary | null => {
  const trackingTotal = totalEnergy(tracking);
  const fixedTotal = totalEnergy(fixed);
  if (trackingTotal === null || fixedTotal === null) return null;
  return {
    trackingTotal,
    fixedTotal,
    gainPct: efficiencyGain(trackingTotal, fixedTotal),
  };
};

/**
 * Instantaneous converter efficiency (load power over panel power, in %).
 * Rows with panel power at or below the noise floor are dropped; near zero
 * they only produce night-time spikes.
 */
export const converterEfficiency = (
  table: DataTable,
  noiseFloor: number = EFFICIENCY_NOISE_FLOOR_W,
): EfficiencyPoint[] => {
  if (!hasColumns(table, ['Time', 'Pload', 'Ppv'])) return [];

  const points: EfficiencyPoint[] = [];
  for (const row of table.rows) {
    const time = row['Time'];
    const pLoad = row['Pload'];
    const pPv = row['Ppv'];
    if (typeof time !== 'number' || typeof pLoad !== 'number' || typeof pPv !== 'number') continue;
    if (pPv <= noiseFloor) continue;
    points.push({ time, efficiency: (pLoad / pPv) * 100 });
  }
  return points;
};
