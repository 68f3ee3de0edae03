'use client';

import React from 'react';
import { motion } from 'framer-motion';

interface QualitySliderProps {
    value: number;
    onChange: (val: number) => void;
    min?: number;
    max?: number;
    label: string;
    leftIcon?: React.ReactNode;
    rightIcon?: React.ReactNode;
}

export default function QualitySlider({
    value,
    onChange,
    min = 1,
    max = 10,
    label,
    leftIcon,
    rightIcon
}: QualitySliderProps) {
    const percentage = ((value - min) / (max - min)) * 100;

    const handleInteraction = (e: React.MouseEvent<HTMLDivElement> | React.TouchEvent<HTMLDivElement>) => {
        const rect = e.currentTarget.getBoundingClientRect();
        const clientX = 'touches' in e ? e.touches[0].clientX : e.clientX;
        const x = Math.max(0, Math.min(clientX - rect.left, rect.width));
        onChange(Math.round((x / rect.width) * (max - min) + min));
    };

    const handleKeyDown = (e: React.KeyboardEvent<HTMLDivElement>) => {
        if (e.key === 'ArrowLeft' || e.key === 'ArrowDown') onChange(Math.max(min, value - 1));
        if (e.key === 'ArrowRight' || e.key === 'ArrowUp') onChange(Math.min(max, value + 1));
    };

    return (
        <div className="w-full">
            <div className="flex justify-between mb-1.5 px-1">
                <span className="text-xs uppercase tracking-wider text-zinc-500 font-bold">{label}</span>
                <span className="text-xs text-zinc-500 font-mono self-end pb-0.5">{value}/{max}</span>
            </div>
            <div className="flex items-center gap-4 w-full">
                {leftIcon && (
                    <motion.div
                        animate={{ scale: percentage < 30 ? 1.2 : 1, opacity: percentage < 30 ? 1 : 0.5 }}
                        className="text-xl text-zinc-400"
                    >
                        {leftIcon}
                    </motion.div>
                )}

                {/* Slider Track */}
                <div
                    role="slider"
                    tabIndex={0}
                    aria-label={label}
                    aria-valuemin={min}
                    aria-valuemax={max}
                    aria-valuenow={value}
                    className="relative h-10 flex-1 bg-zinc-800/50 rounded-full overflow-hidden border border-white/5 cursor-pointer touch-none focus:outline-none focus:ring-1 focus:ring-emerald-500"
                    onClick={handleInteraction}
                    onMouseMove={(e) => e.buttons === 1 && handleInteraction(e)}
                    onTouchMove={handleInteraction}
                    onKeyDown={handleKeyDown}
                >
                    <motion.div
                        className="absolute top-0 left-0 h-full bg-gradient-to-r from-emerald-500 to-teal-500"
                        animate={{ width: `${percentage}%` }}
                        transition={{ type: 'spring', damping: 20, stiffness: 300 }}
                    />
                    <span className="absolute inset-0 flex items-center justify-center font-bold text-sm text-white mix-blend-overlay pointer-events-none">
                        {value}
                    </span>
                </div>

                {rightIcon && (
                    <motion.div
                        animate={{ scale: percentage > 70 ? 1.2 : 1, opacity: percentage > 70 ? 1 : 0.5 }}
                        className="text-xl text-zinc-400"
                    >
                        {rightIcon}
                    </motion.div>
                )}
            </div>
        </div>
    );
}
