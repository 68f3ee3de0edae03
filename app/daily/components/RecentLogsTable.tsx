'use client';

import React from 'react';
import { clsx } from 'clsx';
import { HABIT_FLAGS, LogEntry } from '@/types/dailyLog';
import { formatDatePretty } from '@/utils/date';
import { formatHours } from '@/utils/time';

interface RecentLogsTableProps {
    entries: LogEntry[];
}

const HabitChips = ({ entry }: { entry: LogEntry }) => (
    <div className="flex flex-wrap gap-1 max-w-[14rem]">
        {HABIT_FLAGS.map(({ field, label }) => {
            const value = entry[field];
            return (
                <span
                    key={field}
                    title={`${label}: ${value || '-'}`}
                    className={clsx(
                        "px-1.5 py-0.5 rounded text-[10px] whitespace-nowrap",
                        value === 'Yes' && "bg-emerald-500/15 text-emerald-300",
                        value === 'No' && "bg-zinc-800 text-zinc-500",
                        value !== 'Yes' && value !== 'No' && "bg-amber-500/15 text-amber-300"
                    )}
                >
                    {label}{value !== 'Yes' && value !== 'No' ? `: ${value || '-'}` : ''}
                </span>
            );
        })}
    </div>
);

export default function RecentLogsTable({ entries }: RecentLogsTableProps) {
    if (entries.length === 0) {
        return (
            <div className="text-center py-8 text-zinc-600 italic">
                No entries yet!
            </div>
        );
    }

    return (
        <div className="overflow-x-auto">
            <table className="w-full text-left text-sm">
                <thead className="text-xs text-zinc-500 uppercase border-b border-zinc-800">
                    <tr>
                        <th className="pb-3 pl-2 font-medium">Day</th>
                        <th className="pb-3 font-medium text-right">Screen</th>
                        <th className="pb-3 font-medium text-right">Study</th>
                        <th className="pb-3 font-medium text-right">Wake</th>
                        <th className="pb-3 font-medium text-right">Quality</th>
                        <th className="pb-3 pl-4 pr-2 font-medium">Habits</th>
                    </tr>
                </thead>
                <tbody className="divide-y divide-zinc-800/50">
                    {entries.map((entry, i) => (
                        <tr key={`${entry.date}-${i}`} className="group hover:bg-white/5 transition-colors">
                            <td className="py-3 pl-2">
                                <div className="flex items-center gap-3">
                                    <div
                                        className={clsx(
                                            "w-2 h-2 rounded-full",
                                            entry.ordinaryDay === 'Yes' ? "bg-emerald-500 shadow-[0_0_8px_rgba(16,185,129,0.4)]" : "bg-amber-500"
                                        )}
                                    />
                                    <div className="flex flex-col">
                                        <span className="text-zinc-200 font-medium group-hover:text-white transition-colors">{formatDatePretty(entry.date)}</span>
                                        {entry.notes && (
                                            <span className="text-[10px] text-zinc-500 truncate max-w-[10rem]" title={entry.notes}>{entry.notes}</span>
                                        )}
                                        {entry.planStrategies && (
                                            <span className="text-[10px] text-teal-500/80 truncate max-w-[10rem]" title={entry.planStrategies}>
                                                Plan: {entry.planStrategies}
                                            </span>
                                        )}
                                    </div>
                                </div>
                            </td>
                            <td className="py-3 text-right text-zinc-400 font-mono text-xs">{formatHours(entry.screenTime)}</td>
                            <td className="py-3 text-right text-zinc-400 font-mono text-xs">{formatHours(entry.studyTime)}</td>
                            <td className="py-3 text-right text-zinc-400 font-mono text-xs">{formatHours(entry.morningWakeUpHour)}</td>
                            <td className="py-3 text-right text-zinc-400 font-mono text-xs">{entry.studyQuality}</td>
                            <td className="py-3 pl-4 pr-2"><HabitChips entry={entry} /></td>
                        </tr>
                    ))}
                </tbody>
            </table>
        </div>
    );
}
