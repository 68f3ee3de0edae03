'use client';

import React, { useEffect, useMemo } from 'react';
import { FaChartLine, FaHistory, FaPen } from 'react-icons/fa';
import { format } from 'date-fns';
import { useDailyLogStore } from '@/store/useDailyLogStore';
import { getTodayDateString } from '@/utils/date';
import {
    correlationMatrix,
    dateBounds,
    filterByDateRange,
    recentEntries,
    timeSeries,
} from '@/lib/logAnalysis';
import EntryForm from './components/EntryForm';
import DateRangeFilter from './components/DateRangeFilter';
import RecentLogsTable from './components/RecentLogsTable';
import TimeSeriesChart from './components/TimeSeriesChart';
import CorrelationHeatmap from './components/CorrelationHeatmap';
import StatusNotice from './components/StatusNotice';

export default function DailyLogPage() {
    const { entries, status, notice, range, loadTable, setRange, dismissNotice } = useDailyLogStore();

    useEffect(() => {
        void loadTable();
    }, [loadTable]);

    const bounds = useMemo(() => dateBounds(entries, getTodayDateString()), [entries]);
    const activeRange = range ?? bounds;
    const filtered = useMemo(() => filterByDateRange(entries, activeRange), [entries, activeRange]);
    const recent = useMemo(() => recentEntries(entries), [entries]);
    const matrix = useMemo(() => correlationMatrix(filtered), [filtered]);

    return (
        <div className="p-6 space-y-8 min-h-screen pb-24">
            {/* Header */}
            <header className="space-y-1">
                <h1 className="text-2xl font-bold bg-gradient-to-r from-emerald-400 to-teal-500 bg-clip-text text-transparent">
                    Daily Log
                </h1>
                <p className="text-zinc-500" suppressHydrationWarning>{format(new Date(), 'EEEE, MMM d, yyyy')}</p>
            </header>

            <StatusNotice notice={notice} onDismiss={dismissNotice} />

            {/* New Entry */}
            <section className="space-y-4">
                <h3 className="flex items-center gap-2 text-lg font-medium text-emerald-100/90">
                    <FaPen className="text-sm text-emerald-500" /> Add New Entry
                </h3>
                <EntryForm />
            </section>

            {status !== 'ready' ? (
                <div className="text-zinc-600 text-center py-8 border border-dashed border-zinc-800 rounded-2xl">
                    Loading log...
                </div>
            ) : (
                <>
                    <DateRangeFilter range={activeRange} onChange={setRange} onReset={() => setRange(null)} />

                    {/* Recent Logs */}
                    <section className="bg-zinc-900/30 p-4 rounded-3xl border border-zinc-800/50 backdrop-blur-sm">
                        <h3 className="flex items-center gap-2 text-sm font-medium text-zinc-400 mb-4">
                            <FaHistory /> Recent Logs
                        </h3>
                        <RecentLogsTable entries={recent} />
                    </section>

                    {/* Time-Based Charts */}
                    {filtered.length > 0 && (
                        <section className="bg-zinc-900/30 p-4 rounded-3xl border border-zinc-800/50 backdrop-blur-sm space-y-6">
                            <h3 className="flex items-center gap-2 text-sm font-medium text-zinc-400">
                                <FaChartLine /> Time-Based Charts
                            </h3>
                            <TimeSeriesChart title="Screen Time" data={timeSeries(filtered, 'screenTime')} color="#818cf8" />
                            <TimeSeriesChart title="Study Time" data={timeSeries(filtered, 'studyTime')} color="#fbbf24" />
                        </section>
                    )}

                    {/* Correlation Heatmap */}
                    {filtered.length > 1 && (
                        <section className="space-y-4">
                            <div className="flex items-end justify-between px-2">
                                <h3 className="text-lg font-medium text-emerald-100/90">Correlation Heatmap</h3>
                                <span className="text-xs text-zinc-500">{filtered.length} days</span>
                            </div>
                            <div className="bg-zinc-900/40 p-4 rounded-3xl border border-zinc-800/50 backdrop-blur-sm">
                                <CorrelationHeatmap matrix={matrix} />
                            </div>
                        </section>
                    )}
                </>
            )}
        </div>
    );
}
