import React from 'react';
import { EnergySummary } from '../types';
import { FIXED_TILT_DEG } from '../config';

export const formatEnergy = (wh: number) => `${wh.toFixed(2)} Wh`;

export const formatPercent = (pct: number) => `${pct.toFixed(2)}%`;

export const formatDelta = (pct: number) => `${pct >= 0 ? '+' : '-'}${Math.abs(pct).toFixed(2)}%`;

interface MetricCardProps {
  label: string;
  value: string;
  delta?: number;
}

const MetricCard: React.FC<MetricCardProps> = ({ label, value, delta }) => (
  <div className="bg-white p-4 rounded-lg shadow border border-gray-100">
    <p className="text-sm text-gray-500">{label}</p>
    <p className="font-mono font-bold text-2xl text-gray-800">{value}</p>
    {delta !== undefined && (
      <span
        className={`inline-block mt-1 px-2 py-0.5 rounded text-xs font-bold ${
          delta >= 0 ? 'bg-green-100 text-green-700' : 'bg-red-100 text-red-700'
        }`}
      >
        {formatDelta(delta)}
      </span>
    )}
  </div>
);

interface MetricsRowProps {
  summary: EnergySummary;
}

const MetricsRow: React.FC<MetricsRowProps> = ({ summary }) => (
  <div className="grid grid-cols-1 md:grid-cols-3 gap-6">
    <MetricCard label="Total Energy (Tracking)" value={formatEnergy(summary.trackingTotal)} />
    <MetricCard label={`Total Energy (Fixed ${FIXED_TILT_DEG}°)`} value={formatEnergy(summary.fixedTotal)} />
    <MetricCard label="Efficiency Gain" value={formatPercent(summary.gainPct)} delta={summary.gainPct} />
  </div>
);

export default MetricsRow;
