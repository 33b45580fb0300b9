import React from 'react';
import { ResponsiveContainer, ScatterChart, Scatter, Cell, XAxis, YAxis, CartesianGrid, Tooltip } from 'recharts';
import { OperatingPoint } from '../../types';
import { powerRange, viridis } from '../../services/chartService';

interface OperatingPointChartProps {
  title: string;
  points: OperatingPoint[];
  voltageLabel: string;
  currentLabel: string;
  powerLabel: string;
}

const OperatingPointChart: React.FC<OperatingPointChartProps> = ({ title, points, voltageLabel, currentLabel, powerLabel }) => {
  const range = powerRange(points);

  return (
    <div className="bg-white p-6 rounded-lg shadow border border-gray-100 h-[480px] flex flex-col">
      <div className="flex justify-between items-center mb-4">
        <h3 className="text-lg font-semibold text-gray-700">{title}</h3>
        {range && (
          <div className="flex items-center gap-2 text-xs text-gray-500 font-mono">
            <span>{range[0].toFixed(1)}</span>
            <span
              className="inline-block w-32 h-3 rounded"
              style={{ background: `linear-gradient(to right, ${[0, 0.25, 0.5, 0.75, 1].map(viridis).join(', ')})` }}
            />
            <span>{range[1].toFixed(1)}</span>
            <span>{powerLabel}</span>
          </div>
        )}
      </div>
      <div className="flex-grow">
        <ResponsiveContainer width="100%" height="100%">
          <ScatterChart margin={{ top: 5, right: 30, left: 20, bottom: 25 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" />
            <XAxis
              dataKey="voltage"
              type="number"
              name={voltageLabel}
              domain={['auto', 'auto']}
              fontSize={12}
              stroke="#9ca3af"
              label={{ value: voltageLabel, position: 'insideBottom', offset: -15 }}
            />
            <YAxis
              dataKey="current"
              type="number"
              name={currentLabel}
              domain={['auto', 'auto']}
              fontSize={12}
              stroke="#9ca3af"
              label={{ value: currentLabel, angle: -90, position: 'insideLeft' }}
            />
            <Tooltip cursor={{ strokeDasharray: '3 3' }} />
            <Scatter data={points} isAnimationActive={false}>
              {points.map((p, i) => (
                <Cell key={i} fill={p.color} />
              ))}
            </Scatter>
          </ScatterChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default OperatingPointChart;
