'use client';

import React from 'react';
import { CartesianGrid, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { SeriesPoint } from '@/lib/logAnalysis';
import { formatTimestampShort } from '@/utils/date';

interface TimeSeriesChartProps {
    title: string;
    data: SeriesPoint[];
    color: string;
}

interface ChartTooltipProps {
    active?: boolean;
    payload?: { value?: number | string }[];
    label?: number;
}

const ChartTooltip = ({ active, payload, label }: ChartTooltipProps) => {
    if (active && payload && payload.length && label !== undefined) {
        return (
            <div className="bg-zinc-900 border border-zinc-800 p-3 rounded-xl shadow-xl">
                <p className="text-zinc-400 text-xs mb-1">{formatTimestampShort(label)}</p>
                <p className="text-zinc-100 text-sm font-bold">{payload[0].value} h</p>
            </div>
        );
    }
    return null;
};

export default function TimeSeriesChart({ title, data, color }: TimeSeriesChartProps) {
    return (
        <div className="space-y-3">
            <h4 className="text-sm font-medium text-zinc-400">{title}</h4>
            <div className="h-56 w-full">
                <ResponsiveContainer width="100%" height="100%">
                    <LineChart data={data} margin={{ top: 10, right: 10, left: -20, bottom: 0 }}>
                        <CartesianGrid stroke="#3f3f46" strokeDasharray="3 3" vertical={false} opacity={0.4} />
                        <XAxis
                            dataKey="timestamp"
                            type="number"
                            scale="time"
                            domain={['dataMin', 'dataMax']}
                            tickFormatter={formatTimestampShort}
                            axisLine={false}
                            tickLine={false}
                            tick={{ fill: '#71717a', fontSize: 10 }}
                            dy={10}
                        />
                        <YAxis
                            axisLine={false}
                            tickLine={false}
                            tick={{ fill: '#71717a', fontSize: 10 }}
                            label={{ value: 'Hours', angle: -90, position: 'insideLeft', fill: '#52525b', fontSize: 10 }}
                        />
                        <Tooltip content={<ChartTooltip />} />
                        <Line
                            type="monotone"
                            dataKey="hours"
                            stroke={color}
                            strokeWidth={3}
                            dot={{ r: 3, strokeWidth: 0, fill: color }}
                            activeDot={{ r: 6, strokeWidth: 0 }}
                            name={title}
                        />
                    </LineChart>
                </ResponsiveContainer>
            </div>
        </div>
    );
}
