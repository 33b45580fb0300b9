import { DataTable, OperatingPoint, SeriesPoint } from '../types';

export const toSeries = (table: DataTable, x: string, y: string): SeriesPoint[] =>
  table.rows.flatMap(row => {
    const xv = row[x];
    const yv = row[y];
    return typeof xv === 'number' && typeof yv === 'number' ? [{ x: xv, y: yv }] : [];
  });

// Downsampling for chart performance; the final point is always kept
export const decimate = <T>(points: T[], maxPoints: number): T[] => {
  if (maxPoints <= 0) return [];
  if (points.length <= maxPoints) return points;

  const factor = Math.ceil(points.length / maxPoints);
  const kept = points.filter((_, i) => i % factor === 0);
  if ((points.length - 1) % factor !== 0) kept.push(points[points.length - 1]);
  return kept;
};

const VIRIDIS_STOPS: [number, number, number][] = [
  [0x44, 0x01, 0x54],
  [0x3b, 0x52, 0x8b],
  [0x21, 0x91, 0x8c],
  [0x5e, 0xc9, 0x62],
  [0xfd, 0xe7, 0x25],
];

const toHex = (channel: number) => Math.round(channel).toString(16).padStart(2, '0');

export const viridis = (t: number): string => {
  const clamped = Number.isFinite(t) ? Math.min(1, Math.max(0, t)) : 0;
  const scaled = clamped * (VIRIDIS_STOPS.length - 1);
  const idx = Math.min(Math.floor(scaled), VIRIDIS_STOPS.length - 2);
  const frac = scaled - idx;
  const from = VIRIDIS_STOPS[idx];
  const to = VIRIDIS_STOPS[idx + 1];
  return '#' + from.map((c, k) => toHex(c + (to[k] - c) * frac)).join('');
};

/**
 * V-I operating points colored by power, for plotting where the MPPT
 * settled (and hunted) during the run.
 */
export const toOperatingPoints = (
  table: DataTable,
  voltageCol: string,
  currentCol: string,
  powerCol: string,
): OperatingPoint[] => {
  const raw = table.rows.flatMap(row => {
    const voltage = row[voltageCol];
    const current = row[currentCol];
    const power = row[powerCol];
    return typeof voltage === 'number' && typeof current === 'number' && typeof power === 'number'
      ? [{ voltage, current, power }]
      : [];
  });
  if (raw.length === 0) return [];

  let min = Infinity;
  let max = -Infinity;
  raw.forEach(p => {
    min = Math.min(min, p.power);
    max = Math.max(max, p.power);
  });
  const span = max - min;

  return raw.map(p => ({
    ...p,
    color: viridis(span > 0 ? (p.power - min) / span : 0),
  }));
};

export const powerRange = (points: OperatingPoint[]): [number, number] | null => {
  if (points.length === 0) return null;
  return points.reduce<[number, number]>(
    ([min, max], p) => [Math.min(min, p.power), Math.max(max, p.power)],
    [Infinity, -Infinity],
  );
};
