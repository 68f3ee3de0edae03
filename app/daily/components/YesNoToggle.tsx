import React from 'react';
import { motion } from 'framer-motion';
import { twMerge } from 'tailwind-merge';
import { YES_NO_OPTIONS, YesNo } from '@/types/dailyLog';

interface YesNoToggleProps {
    label: string;
    value: YesNo;
    onChange: (value: YesNo) => void;
}

export default function YesNoToggle({ label, value, onChange }: YesNoToggleProps) {
    return (
        <div className="flex items-center justify-between gap-3 py-1">
            <span className="text-sm text-zinc-300">{label}</span>
            <div className="flex gap-1 bg-zinc-900 p-1 rounded-full border border-zinc-800" role="radiogroup" aria-label={label}>
                {YES_NO_OPTIONS.map(option => (
                    <motion.button
                        key={option}
                        type="button"
                        role="radio"
                        aria-checked={value === option}
                        whileTap={{ scale: 0.9 }}
                        animate={{
                            backgroundColor: value === option ? (option === 'Yes' ? '#10B981' : '#3f3f46') : 'rgba(0,0,0,0)'
                        }}
                        onClick={() => onChange(option)}
                        className={twMerge(
                            "px-3 py-1 rounded-full text-xs font-bold uppercase tracking-wider transition-colors",
                            value === option ? "text-white" : "text-zinc-500 hover:text-zinc-300"
                        )}
                    >
                        {option}
                    </motion.button>
                ))}
            </div>
        </div>
    );
}
