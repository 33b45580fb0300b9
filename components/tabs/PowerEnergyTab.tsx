import React, { useMemo } from 'react';
import { DataTable } from '../../types';
import { MAX_CHART_POINTS } from '../../config';
import { decimate, toSeries } from '../../services/chartService';
import TimeSeriesChart from '../charts/TimeSeriesChart';
import RequireColumns from '../RequireColumns';

interface PowerEnergyTabProps {
  tracking: DataTable;
  fixed: DataTable;
  trackingSource: string;
  fixedSource: string;
}

const TRACKING_COLOR = '#00CC96';
const FIXED_COLOR = '#EF553B';

const PowerEnergyTab: React.FC<PowerEnergyTabProps> = ({ tracking, fixed, trackingSource, fixedSource }) => {
  const series = useMemo(() => {
    const pick = (table: DataTable, y: string) => decimate(toSeries(table, 'Time', y), MAX_CHART_POINTS);
    return {
      trackingPower: pick(tracking, 'Pload'),
      fixedPower: pick(fixed, 'Pload'),
      trackingEnergy: pick(tracking, 'Energy_Load'),
      fixedEnergy: pick(fixed, 'Energy_Load'),
    };
  }, [tracking, fixed]);

  const power = ['Time', 'Pload'];
  const energy = ['Time', 'Energy_Load'];

  return (
    <div className="space-y-4">
      <h2 className="text-xl font-semibold text-gray-800">Tracking vs. Fixed Performance</h2>
      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <RequireColumns table={tracking} columns={power} source={trackingSource}>
          <RequireColumns table={fixed} columns={power} source={fixedSource}>
            <TimeSeriesChart
              title="Instantaneous Power Output at Load"
              yLabel="Power (W)"
              series={[
                { name: 'Tracking Output', points: series.trackingPower, color: TRACKING_COLOR },
                { name: 'Fixed Output', points: series.fixedPower, color: FIXED_COLOR, dashed: true },
              ]}
            />
          </RequireColumns>
        </RequireColumns>

        <RequireColumns table={tracking} columns={energy} source={trackingSource}>
          <RequireColumns table={fixed} columns={energy} source={fixedSource}>
            <TimeSeriesChart
              title="Cumulative Energy Harvest"
              yLabel="Energy (Wh)"
              series={[
                { name: 'Tracking Energy', points: series.trackingEnergy, color: TRACKING_COLOR },
                { name: 'Fixed Energy', points: series.fixedEnergy, color: FIXED_COLOR },
              ]}
            />
          </RequireColumns>
        </RequireColumns>
      </div>
    </div>
  );
};

export default PowerEnergyTab;
