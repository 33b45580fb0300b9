import React, { useMemo, useState } from 'react';
import { AnalysisTab, DataTable, LoadResult } from '../types';
import { summarizeEnergy } from '../services/metricsService';
import MetricsRow from './MetricsRow';
import StatusBanner from './StatusBanner';
import InputDataTab from './tabs/InputDataTab';
import PowerEnergyTab from './tabs/PowerEnergyTab';
import ConverterLossesTab from './tabs/ConverterLossesTab';
import MpptDiagnosticsTab from './tabs/MpptDiagnosticsTab';

interface DashboardProps {
  tracking: DataTable;
  fixed: DataTable;
  weather: LoadResult;
  trackingSource: string;
  fixedSource: string;
}

const Dashboard: React.FC<DashboardProps> = ({ tracking, fixed, weather, trackingSource, fixedSource }) => {
  const [tab, setTab] = useState<AnalysisTab>(AnalysisTab.INPUT);

  // Totals come from the full tables, never the decimated chart series
  const summary = useMemo(() => summarizeEnergy(tracking, fixed), [tracking, fixed]);

  return (
    <div className="space-y-6">
      {summary ? (
        <MetricsRow summary={summary} />
      ) : (
        <StatusBanner kind="info" message="Energy totals unavailable: Energy_Load has no values in one of the simulation files." />
      )}

      <hr className="border-gray-200" />

      <div className="flex space-x-1 bg-gray-100 p-1 rounded-lg w-fit" role="tablist">
        {Object.values(AnalysisTab).map((t) => (
          <button
            key={t}
            type="button"
            role="tab"
            aria-selected={tab === t}
            onClick={() => setTab(t)}
            className={`px-3 py-1.5 rounded text-sm font-medium transition-colors ${
              tab === t ? 'bg-white text-blue-700 shadow' : 'text-gray-500 hover:text-gray-800'
            }`}
          >
            {t}
          </button>
        ))}
      </div>

      {tab === AnalysisTab.INPUT && <InputDataTab weather={weather} />}
      {tab === AnalysisTab.POWER && (
        <PowerEnergyTab tracking={tracking} fixed={fixed} trackingSource={trackingSource} fixedSource={fixedSource} />
      )}
      {tab === AnalysisTab.LOSSES && <ConverterLossesTab tracking={tracking} source={trackingSource} />}
      {tab === AnalysisTab.MPPT && <MpptDiagnosticsTab tracking={tracking} source={trackingSource} />}
    </div>
  );
};

export default Dashboard;
