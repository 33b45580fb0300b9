import { describe, test, expect } from '@jest/globals';
import { decimate, powerRange, toOperatingPoints, toSeries, viridis } from '../chartService';
import { DataTable } from '../../types';

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

describe('toSeries', () => {
  test('pairs numeric cells and drops incomplete rows', () => {
    const table: DataTable = {
      columns: ['Time', 'Pload'],
      rows: [{ Time: 0, Pload: 1 }, { Time: 0.5, Pload: null }, { Time: 'x', Pload: 2 }, { Time: 1, Pload: 3 }],
    };
    expect(toSeries(table, 'Time', 'Pload')).toEqual([{ x: 0, y: 1 }, { x: 1, y: 3 }]);
  });
});

describe('decimate', () => {
  test('returns short inputs untouched', () => {
    const points = range(5);
    expect(decimate(points, 5)).toBe(points);
  });

  test('keeps every k-th point', () => {
    expect(decimate(range(10), 4)).toEqual([0, 3, 6, 9]);
  });

  test('always keeps the final point', () => {
    expect(decimate(range(11), 4)).toEqual([0, 3, 6, 9, 10]);
  });

  test('returns nothing for a non-positive limit', () => {
    expect(decimate(range(3), 0)).toEqual([]);
  });
});

describe('viridis', () => {
  test('hits the scale stops', () => {
    expect(viridis(0)).toBe('#440154');
    expect(viridis(0.5)).toBe('#21918c');
    expect(viridis(1)).toBe('#fde725');
  });

  test('interpolates between stops', () => {
    expect(viridis(0.125)).toBe('#402a70');
  });

  test('clamps out-of-range input', () => {
    expect(viridis(-1)).toBe('#440154');
    expect(viridis(2)).toBe('#fde725');
    expect(viridis(Number.NaN)).toBe('#440154');
  });
});

describe('toOperatingPoints', () => {
  const table: DataTable = {
    columns: ['Vpv', 'Ipv', 'Ppv'],
    rows: [
      { Vpv: 30, Ipv: 1, Ppv: 10 },
      { Vpv: 31, Ipv: 2, Ppv: 20 },
      { Vpv: null, Ipv: 2, Ppv: 25 },
      { Vpv: 32, Ipv: 3, Ppv: 30 },
    ],
  };

  test('colors points across the power range', () => {
    expect(toOperatingPoints(table, 'Vpv', 'Ipv', 'Ppv')).toEqual([
      { voltage: 30, current: 1, power: 10, color: '#440154' },
      { voltage: 31, current: 2, power: 20, color: '#21918c' },
      { voltage: 32, current: 3, power: 30, color: '#fde725' },
    ]);
  });

  test('uses the low end of the scale when power is flat', () => {
    const flat: DataTable = { columns: table.columns, rows: [{ Vpv: 1, Ipv: 1, Ppv: 5 }, { Vpv: 2, Ipv: 1, Ppv: 5 }] };
    expect(toOperatingPoints(flat, 'Vpv', 'Ipv', 'Ppv').map(p => p.color)).toEqual(['#440154', '#440154']);
  });

  test('is empty without matching columns', () => {
    expect(toOperatingPoints(table, 'Vload', 'Iload', 'Pload')).toEqual([]);
  });
});

describe('powerRange', () => {
  test('spans the plotted power values', () => {
    const points = toOperatingPoints(
      { columns: ['V', 'I', 'P'], rows: [{ V: 1, I: 1, P: 7 }, { V: 1, I: 1, P: -2 }, { V: 1, I: 1, P: 3 }] },
      'V', 'I', 'P',
    );
    expect(powerRange(points)).toEqual([-2, 7]);
    expect(powerRange([])).toBeNull();
  });
});
