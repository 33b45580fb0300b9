import React, { useMemo } from 'react';
import { DataTable } from '../../types';
import { EFFICIENCY_AXIS_RANGE, MAX_CHART_POINTS } from '../../config';
import { decimate, toSeries } from '../../services/chartService';
import { converterEfficiency } from '../../services/metricsService';
import TimeSeriesChart from '../charts/TimeSeriesChart';
import RequireColumns from '../RequireColumns';

interface ConverterLossesTabProps {
  tracking: DataTable;
  source: string;
}

const ConverterLossesTab: React.FC<ConverterLossesTabProps> = ({ tracking, source }) => {
  const series = useMemo(() => ({
    panel: decimate(toSeries(tracking, 'Time', 'Ppv'), MAX_CHART_POINTS),
    load: decimate(toSeries(tracking, 'Time', 'Pload'), MAX_CHART_POINTS),
    efficiency: decimate(
      converterEfficiency(tracking).map(p => ({ x: p.time, y: p.efficiency })),
      MAX_CHART_POINTS,
    ),
  }), [tracking]);

  return (
    <div className="space-y-4">
      <h2 className="text-xl font-semibold text-gray-800">Electrical Losses due to Converter</h2>
      <RequireColumns table={tracking} columns={['Time', 'Ppv', 'Pload']} source={source}>
        <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
          <TimeSeriesChart
            title="Power Conversion: Input vs Output"
            yLabel="Power (W)"
            series={[
              { name: 'Panel Power (Input)', points: series.panel, color: '#636EFA' },
              { name: 'Load Power (Output)', points: series.load, color: '#EF553B' },
            ]}
          />
          <TimeSeriesChart
            title="Converter Efficiency (%)"
            yLabel="Efficiency (%)"
            yDomain={EFFICIENCY_AXIS_RANGE}
            series={[{ name: 'Efficiency', points: series.efficiency, color: '#636EFA' }]}
          />
        </div>
      </RequireColumns>
    </div>
  );
};

export default ConverterLossesTab;
