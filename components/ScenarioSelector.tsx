import React from 'react';
import { Scenario } from '../types';

interface ScenarioSelectorProps {
  value: Scenario;
  onChange: (scenario: Scenario) => void;
  disabled?: boolean;
}

const ScenarioSelector: React.FC<ScenarioSelectorProps> = ({ value, onChange, disabled }) => (
  <div className="flex items-center gap-4">
    <span className="text-sm font-semibold text-gray-700">Weather Scenario</span>
    <div className="flex space-x-1 bg-gray-100 p-1 rounded-lg">
      {Object.values(Scenario).map((s) => (
        <button
          key={s}
          type="button"
          disabled={disabled}
          aria-pressed={value === s}
          onClick={() => onChange(s)}
          className={`px-3 py-1.5 rounded text-sm font-medium transition-colors ${
            value === s ? 'bg-white text-blue-700 shadow' : 'text-gray-500 hover:text-gray-800'
          }`}
        >
          {s}
        </button>
      ))}
    </div>
  </div>
);

export default ScenarioSelector;
