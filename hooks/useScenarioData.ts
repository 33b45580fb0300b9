import { useEffect, useState } from 'react';
import { Scenario, ScenarioData } from '../types';
import { TableLoader } from '../services/dataService';
import { loadScenario } from '../services/scenarioService';

interface ScenarioDataState {
  data: ScenarioData | null;
  loading: boolean;
  error: string | null;
}

export function useScenarioData(loader: TableLoader, scenario: Scenario): ScenarioDataState {
  const [data, setData] = useState<ScenarioData | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    setLoading(true);
    setError(null);

    void loadScenario(loader, scenario)
      .then(result => {
        if (!cancelled) setData(result);
      })
      .catch((err: unknown) => {
        console.error(`Failed to load scenario "${scenario}":`, err);
        if (!cancelled) {
          setData(null);
          setError(err instanceof Error ? err.message : String(err));
        }
      })
      .finally(() => {
        if (!cancelled) setLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, [loader, scenario]);

  return { data, loading, error };
}
