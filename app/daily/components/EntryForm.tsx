'use client';

import React, { useState } from 'react';
import { FaBed, FaBook, FaMobileAlt, FaRegFrown, FaRegSmile } from 'react-icons/fa';
import { useDailyLogStore } from '@/store/useDailyLogStore';
import { ClockTime, HABIT_FLAGS, HabitFlag, YesNo } from '@/types/dailyLog';
import { getTodayDateString } from '@/utils/date';
import { formatClock, parseClockInput } from '@/utils/time';
import QualitySlider from './QualitySlider';
import YesNoToggle from './YesNoToggle';

const DEFAULT_FLAGS: Record<HabitFlag, YesNo> = {
    ordinaryDay: 'Yes',
    meditation: 'Yes',
    morningStudy: 'Yes',
    morningPhone: 'Yes',
    lunchPhone: 'Yes',
    dinnerPhone: 'Yes',
    running: 'Yes',
    p: 'Yes',
};

const MIDNIGHT: ClockTime = { hour: 0, minute: 0 };
const DEFAULT_WAKE_UP: ClockTime = { hour: 8, minute: 0 };

interface TimeFieldProps {
    label: string;
    icon: React.ReactNode;
    value: ClockTime;
    onChange: (value: ClockTime) => void;
}

function TimeField({ label, icon, value, onChange }: TimeFieldProps) {
    return (
        <label className="flex flex-col gap-2 bg-zinc-950 border border-zinc-800 rounded-xl p-3">
            <span className="flex items-center gap-2 text-[10px] uppercase tracking-wider text-zinc-500 font-bold">
                {icon} {label}
            </span>
            <input
                type="time"
                required
                value={formatClock(value)}
                onChange={(e) => {
                    const parsed = parseClockInput(e.target.value);
                    if (parsed) onChange(parsed);
                }}
                className="bg-transparent text-xl text-white font-mono focus:outline-none [color-scheme:dark]"
            />
        </label>
    );
}

export default function EntryForm() {
    const [date, setDate] = useState(getTodayDateString);
    const [screenTime, setScreenTime] = useState<ClockTime>(MIDNIGHT);
    const [studyTime, setStudyTime] = useState<ClockTime>(MIDNIGHT);
    const [wakeUp, setWakeUp] = useState<ClockTime>(DEFAULT_WAKE_UP);
    const [studyQuality, setStudyQuality] = useState(1);
    const [flags, setFlags] = useState<Record<HabitFlag, YesNo>>(DEFAULT_FLAGS);
    const [notes, setNotes] = useState('');
    const [planStrategies, setPlanStrategies] = useState('');

    const submitEntry = useDailyLogStore((state) => state.submitEntry);
    const saving = useDailyLogStore((state) => state.saving);
    const writable = useDailyLogStore((state) => state.writable);

    const reset = () => {
        setDate(getTodayDateString());
        setScreenTime(MIDNIGHT);
        setStudyTime(MIDNIGHT);
        setWakeUp(DEFAULT_WAKE_UP);
        setStudyQuality(1);
        setFlags(DEFAULT_FLAGS);
        setNotes('');
        setPlanStrategies('');
    };

    const handleSubmit = async (e: React.FormEvent) => {
        e.preventDefault();
        if (!date) return;

        const saved = await submitEntry({ date, screenTime, studyTime, wakeUp, studyQuality, flags, notes, planStrategies });
        if (saved) reset();
    };

    return (
        <form onSubmit={handleSubmit} className="bg-zinc-900/40 p-6 rounded-2xl border border-zinc-800 space-y-6">
            <div className="space-y-2">
                <label htmlFor="entry-date" className="text-xs uppercase tracking-wider text-zinc-500 font-bold">Date</label>
                <input
                    id="entry-date"
                    type="date"
                    required
                    value={date}
                    onChange={(e) => setDate(e.target.value)}
                    className="w-full bg-transparent border-b border-zinc-700 py-2 text-xl text-white focus:outline-none focus:border-emerald-500 transition-colors [color-scheme:dark]"
                />
            </div>

            <div className="grid grid-cols-3 gap-2">
                <TimeField label="Screen" icon={<FaMobileAlt />} value={screenTime} onChange={setScreenTime} />
                <TimeField label="Study" icon={<FaBook />} value={studyTime} onChange={setStudyTime} />
                <TimeField label="Wake up" icon={<FaBed />} value={wakeUp} onChange={setWakeUp} />
            </div>

            <QualitySlider
                label="Study Quality"
                value={studyQuality}
                onChange={setStudyQuality}
                leftIcon={<FaRegFrown />}
                rightIcon={<FaRegSmile />}
            />

            <div className="divide-y divide-zinc-800/60">
                {HABIT_FLAGS.map(({ field, label }) => (
                    <YesNoToggle
                        key={field}
                        label={label}
                        value={flags[field]}
                        onChange={(value) => setFlags((prev) => ({ ...prev, [field]: value }))}
                    />
                ))}
            </div>

            <div className="space-y-2">
                <label htmlFor="entry-notes" className="text-xs uppercase tracking-wider text-zinc-500 font-bold">Notes</label>
                <textarea
                    id="entry-notes"
                    rows={3}
                    value={notes}
                    onChange={(e) => setNotes(e.target.value)}
                    className="w-full bg-zinc-950 border border-zinc-800 rounded-xl px-4 py-3 text-white focus:outline-none focus:border-emerald-500"
                />
            </div>

            <div className="space-y-2">
                <label htmlFor="entry-plan" className="text-xs uppercase tracking-wider text-zinc-500 font-bold">Plan / Strategies</label>
                <textarea
                    id="entry-plan"
                    rows={3}
                    value={planStrategies}
                    onChange={(e) => setPlanStrategies(e.target.value)}
                    className="w-full bg-zinc-950 border border-zinc-800 rounded-xl px-4 py-3 text-white focus:outline-none focus:border-emerald-500"
                />
            </div>

            <button
                type="submit"
                disabled={saving || !writable}
                className="w-full py-4 bg-emerald-500 hover:bg-emerald-400 text-black font-bold rounded-xl transition-all active:scale-95 disabled:opacity-50 disabled:cursor-not-allowed"
            >
                {saving ? 'Saving...' : 'Add Entry'}
            </button>
        </form>
    );
}
