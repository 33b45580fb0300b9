import React, { useMemo } from 'react';
import { DataTable } from '../../types';
import { MAX_CHART_POINTS } from '../../config';
import { decimate, toOperatingPoints } from '../../services/chartService';
import OperatingPointChart from '../charts/OperatingPointChart';
import RequireColumns from '../RequireColumns';

interface MpptDiagnosticsTabProps {
  tracking: DataTable;
  source: string;
}

const MpptDiagnosticsTab: React.FC<MpptDiagnosticsTabProps> = ({ tracking, source }) => {
  // Colors are assigned over the full run before thinning out the points
  const panel = useMemo(() => decimate(toOperatingPoints(tracking, 'Vpv', 'Ipv', 'Ppv'), MAX_CHART_POINTS), [tracking]);
  const load = useMemo(() => decimate(toOperatingPoints(tracking, 'Vload', 'Iload', 'Pload'), MAX_CHART_POINTS), [tracking]);

  return (
    <div className="space-y-6">
      <h2 className="text-xl font-semibold text-gray-800">MPPT Operating Point Analysis</h2>
      <RequireColumns table={tracking} columns={['Vpv', 'Ipv', 'Ppv']} source={source}>
        <OperatingPointChart
          title="MPPT Trajectory at Panel (V vs I)"
          points={panel}
          voltageLabel="Panel Voltage (V)"
          currentLabel="Panel Current (A)"
          powerLabel="Power (W)"
        />
      </RequireColumns>
      <RequireColumns table={tracking} columns={['Vload', 'Iload', 'Pload']} source={source}>
        <OperatingPointChart
          title="MPPT Trajectory at Load (V vs I)"
          points={load}
          voltageLabel="Load Voltage (V)"
          currentLabel="Load Current (A)"
          powerLabel="Load Power (W)"
        />
      </RequireColumns>
    </div>
  );
};

export default MpptDiagnosticsTab;
