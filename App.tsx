import React, { useMemo, useState } from 'react';
import { Scenario, ScenarioData } from './types';
import { APP_TITLE, DEFAULT_SCENARIO } from './config';
import { createFetchReader, createTableLoader, TableLoader } from './services/dataService';
import { collectLoadWarnings, hasComparisonData, unusableSimulationFiles } from './services/scenarioService';
import { useScenarioData } from './hooks/useScenarioData';
import Dashboard from './components/Dashboard';
import ModelOverview from './components/ModelOverview';
import ScenarioSelector from './components/ScenarioSelector';
import StatusBanner from './components/StatusBanner';

export const dataUnavailableMessage = (missing: string[]) =>
  `Data could not be loaded. Please ensure the Data folder exists and contains the simulation CSV files (missing or unreadable: ${missing.join(', ')}).`;

export const ScenarioBody: React.FC<{ data: ScenarioData }> = ({ data }) => (
  <>
    {collectLoadWarnings(data).map(w => <StatusBanner key={w} kind="warning" message={w} />)}
    {hasComparisonData(data) ? (
      <Dashboard
        tracking={data.tracking.table}
        fixed={data.fixed.table}
        weather={data.weather}
        trackingSource={data.tracking.path}
        fixedSource={data.fixed.path}
      />
    ) : (
      <StatusBanner kind="error" message={dataUnavailableMessage(unusableSimulationFiles(data))} />
    )}
  </>
);

interface AppProps {
  loader?: TableLoader;
}

const App: React.FC<AppProps> = ({ loader: injected }) => {
  const [scenario, setScenario] = useState<Scenario>(DEFAULT_SCENARIO);
  const loader = useMemo(() => injected ?? createTableLoader(createFetchReader()), [injected]);
  const { data, loading, error } = useScenarioData(loader, scenario);

  return (
    <div className="min-h-screen flex flex-col bg-gray-50 text-slate-800 font-sans">
      <header className="bg-slate-900 text-white shadow-lg sticky top-0 z-40">
        <div className="container mx-auto px-4 py-3">
          <h1 className="text-xl font-bold tracking-wider">{APP_TITLE}</h1>
          <p className="text-[10px] text-gray-400">Tracking vs. fixed mount simulation results</p>
        </div>
      </header>

      <main className="flex-grow container mx-auto px-4 py-8 space-y-6">
        <ModelOverview />

        <div className="bg-white p-4 rounded-lg shadow flex flex-col md:flex-row justify-between items-center gap-4">
          <ScenarioSelector value={scenario} onChange={setScenario} disabled={loading} />
          {loading && (
            <div className="flex items-center space-x-3 text-sm text-gray-600">
              <div className="w-4 h-4 border-t-2 border-b-2 border-blue-600 rounded-full animate-spin"></div>
              <span>Loading simulation data...</span>
            </div>
          )}
        </div>

        {error && <StatusBanner kind="error" message={`Failed to load scenario data: ${error}`} />}

        {data && !loading && <ScenarioBody data={data} />}
      </main>
    </div>
  );
};

export default App;
