import React from 'react';
import { ResponsiveContainer, LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, Legend } from 'recharts';
import { SeriesPoint } from '../../types';

export interface ChartSeries {
  name: string;
  points: SeriesPoint[];
  color: string;
  dashed?: boolean;
}

interface TimeSeriesChartProps {
  title: string;
  series: ChartSeries[];
  xLabel?: string;
  yLabel: string;
  yDomain?: [number, number];
}

const TimeSeriesChart: React.FC<TimeSeriesChartProps> = ({ title, series, xLabel = 'Time (h)', yLabel, yDomain }) => (
  <div className="bg-white p-6 rounded-lg shadow border border-gray-100 h-[420px] flex flex-col">
    <h3 className="text-lg font-semibold text-gray-700 mb-4">{title}</h3>
    <div className="flex-grow">
      <ResponsiveContainer width="100%" height="100%">
        <LineChart margin={{ top: 5, right: 30, left: 20, bottom: 25 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e5e7eb" />
          <XAxis
            dataKey="x"
            type="number"
            domain={['dataMin', 'dataMax']}
            tickFormatter={(h: number) => h.toFixed(1)}
            fontSize={12}
            stroke="#9ca3af"
            allowDuplicatedCategory={false}
            label={{ value: xLabel, position: 'insideBottom', offset: -15 }}
          />
          <YAxis
            fontSize={12}
            stroke="#9ca3af"
            domain={yDomain ?? ['auto', 'auto']}
            allowDataOverflow={yDomain !== undefined}
            label={{ value: yLabel, angle: -90, position: 'insideLeft' }}
          />
          <Tooltip
            labelFormatter={(h) => `${Number(h).toFixed(2)} h`}
            contentStyle={{ borderRadius: '8px', border: 'none', boxShadow: '0 4px 6px -1px rgb(0 0 0 / 0.1)' }}
            labelStyle={{ color: '#374151', fontWeight: 'bold' }}
          />
          <Legend verticalAlign="top" />
          {series.map(s => (
            <Line
              key={s.name}
              data={s.points}
              dataKey="y"
              name={s.name}
              type="monotone"
              stroke={s.color}
              strokeWidth={2}
              strokeDasharray={s.dashed ? '6 4' : undefined}
              dot={false}
              activeDot={{ r: 4 }}
              isAnimationActive={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </div>
  </div>
);

export default TimeSeriesChart;
