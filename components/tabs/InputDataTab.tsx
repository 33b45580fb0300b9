import React, { useMemo } from 'react';
import { LoadResult } from '../../types';
import { MAX_CHART_POINTS } from '../../config';
import { hasColumns, isUsable } from '../../services/dataService';
import { decimate, toSeries } from '../../services/chartService';
import TimeSeriesChart from '../charts/TimeSeriesChart';
import StatusBanner from '../StatusBanner';

export const WEATHER_UNAVAILABLE = 'Weather data (Temperature, GHI) not available or input data file not found.';

interface InputDataTabProps {
  weather: LoadResult;
}

const InputDataTab: React.FC<InputDataTabProps> = ({ weather }) => {
  const table = isUsable(weather) && hasColumns(weather.table, ['Time', 'Temperature', 'GHI']) ? weather.table : null;

  const charts = useMemo(() => {
    if (!table) return null;
    const series = (y: string) => decimate(toSeries(table, 'Time', y), MAX_CHART_POINTS);
    return {
      temperature: series('Temperature'),
      ghi: series('GHI'),
      dni: series('DNI'),
      dhi: series('DHI'),
    };
  }, [table]);

  return (
    <div className="space-y-4">
      <h2 className="text-xl font-semibold text-gray-800">Input Weather Data</h2>
      {charts ? (
        <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
          <TimeSeriesChart
            title="Ambient Temperature (°C)"
            yLabel="Temperature (°C)"
            series={[{ name: 'Temperature', points: charts.temperature, color: '#2563eb' }]}
          />
          <TimeSeriesChart
            title="Solar Irradiance (W/m²)"
            yLabel="Irradiance (W/m²)"
            series={[
              { name: 'GHI', points: charts.ghi, color: '#FFC107' },
              { name: 'DNI', points: charts.dni, color: '#FF5722' },
              { name: 'DHI', points: charts.dhi, color: '#03A9F4' },
            ]}
          />
        </div>
      ) : (
        <StatusBanner kind="info" message={WEATHER_UNAVAILABLE} />
      )}
    </div>
  );
};

export default InputDataTab;
