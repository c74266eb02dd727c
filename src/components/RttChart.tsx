'use client';
import React, { useMemo } from 'react';
import {
    CartesianGrid,
    Legend,
    Line,
    LineChart,
    ResponsiveContainer,
    Tooltip,
    XAxis,
    YAxis,
} from 'recharts';
import { chartRows, seriesKey } from '@/lib/trace/aggregate';
import type { SampleSeries } from '@/lib/trace/types';

const COLORS = ['#2563eb', '#f97316', '#16a34a', '#dc2626', '#9333ea', '#0891b2', '#ca8a04', '#db2777'];

export default function RttChart({ series }: { series: SampleSeries[] }) {
    const rows = useMemo(() => chartRows(series), [series]);

    return (
        <div className="h-[360px]">
            <ResponsiveContainer width="100%" height="100%">
                <LineChart data={rows} margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
                    <CartesianGrid strokeDasharray="3 3" />
                    <XAxis
                        dataKey="hop"
                        type="number"
                        domain={['dataMin', 'dataMax']}
                        allowDecimals={false}
                        label={{ value: 'Hop Number', position: 'insideBottom', offset: -10 }}
                    />
                    <YAxis
                        label={{ value: 'Average Round Trip Time (ms)', angle: -90, position: 'insideLeft', style: { textAnchor: 'middle' } }}
                    />
                    <Tooltip />
                    <Legend verticalAlign="top" />
                    {/* One line per trace; nulls (timeouts) break it */}
                    {series.map((s, idx) => (
                        <Line
                            key={s.sample}
                            type="linear"
                            dataKey={seriesKey(s.sample)}
                            name={`Trace ${s.sample} (${s.timestamp})`}
                            stroke={COLORS[idx % COLORS.length]}
                            connectNulls={false}
                            dot
                        />
                    ))}
                </LineChart>
            </ResponsiveContainer>
        </div>
    );
}
