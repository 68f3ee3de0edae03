import React from 'react';
import { DateRange } from '@/types/dailyLog';

interface DateRangeFilterProps {
    range: DateRange;
    onChange: (range: DateRange) => void;
    onReset: () => void;
}

export default function DateRangeFilter({ range, onChange, onReset }: DateRangeFilterProps) {
    return (
        <div className="flex items-end gap-2">
            <label className="flex-1 space-y-1">
                <span className="text-[10px] uppercase tracking-wider text-zinc-500 font-bold">Start Date</span>
                <input
                    type="date"
                    value={range.start}
                    max={range.end}
                    onChange={(e) => e.target.value && onChange({ ...range, start: e.target.value })}
                    className="w-full bg-zinc-900 border border-zinc-800 rounded-xl px-3 py-2 text-sm text-white focus:outline-none focus:border-emerald-500 [color-scheme:dark]"
                />
            </label>
            <label className="flex-1 space-y-1">
                <span className="text-[10px] uppercase tracking-wider text-zinc-500 font-bold">End Date</span>
                <input
                    type="date"
                    value={range.end}
                    min={range.start}
                    onChange={(e) => e.target.value && onChange({ ...range, end: e.target.value })}
                    className="w-full bg-zinc-900 border border-zinc-800 rounded-xl px-3 py-2 text-sm text-white focus:outline-none focus:border-emerald-500 [color-scheme:dark]"
                />
            </label>
            <button
                type="button"
                onClick={onReset}
                className="text-[10px] font-bold uppercase tracking-wider bg-emerald-900/30 text-emerald-400 border border-emerald-500/30 px-3 py-2 rounded-full hover:bg-emerald-900/50 transition-colors"
            >
                All
            </button>
        </div>
    );
}
