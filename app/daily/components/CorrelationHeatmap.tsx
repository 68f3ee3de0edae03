'use client';

import React from 'react';
import { interpolateRgb } from 'd3-interpolate';
import { Tooltip } from 'react-tooltip';
import { CorrelationMatrix } from '@/lib/logAnalysis';

interface CorrelationHeatmapProps {
    matrix: CorrelationMatrix;
}

// -1 rose, 0 zinc, +1 emerald
const toNegative = interpolateRgb('#27272a', '#f43f5e');
const toPositive = interpolateRgb('#27272a', '#10b981');

const cellColor = (value: number | null): string => {
    if (value === null) return '#18181b';
    return value < 0 ? toNegative(-value) : toPositive(value);
};

export default function CorrelationHeatmap({ matrix }: CorrelationHeatmapProps) {
    const { labels, values } = matrix;

    if (labels.length === 0) {
        return <div className="text-zinc-500 text-center py-10">No numeric data to show correlation.</div>;
    }

    return (
        <div className="w-full">
            <div
                className="grid gap-1"
                style={{ gridTemplateColumns: `minmax(5rem, auto) repeat(${labels.length}, minmax(0, 1fr))` }}
            >
                <div />
                {labels.map(label => (
                    <div key={`col-${label}`} className="text-[9px] uppercase tracking-wider text-zinc-500 text-center pb-1 truncate" title={label}>
                        {label}
                    </div>
                ))}

                {labels.map((rowLabel, i) => (
                    <React.Fragment key={`row-${rowLabel}`}>
                        <div className="text-[10px] text-zinc-400 flex items-center pr-2 truncate" title={rowLabel}>
                            {rowLabel}
                        </div>
                        {values[i].map((value, j) => (
                            <div
                                key={`${rowLabel}-${labels[j]}`}
                                data-tooltip-id="correlation-tooltip"
                                data-tooltip-content={`${rowLabel} × ${labels[j]}: ${value === null ? 'undefined' : value.toFixed(2)}`}
                                className="aspect-square rounded-md flex items-center justify-center text-[10px] font-mono text-white/90 transition-colors duration-300"
                                style={{ backgroundColor: cellColor(value) }}
                            >
                                {value === null ? '' : value.toFixed(2)}
                            </div>
                        ))}
                    </React.Fragment>
                ))}
            </div>
            <Tooltip id="correlation-tooltip" />
        </div>
    );
}
