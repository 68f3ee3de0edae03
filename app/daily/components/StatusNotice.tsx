'use client';

import React from 'react';
import { AnimatePresence, motion } from 'framer-motion';
import { clsx } from 'clsx';
import { FaCheckCircle, FaExclamationTriangle, FaInfoCircle, FaTimes } from 'react-icons/fa';
import { Notice } from '@/store/useDailyLogStore';

interface StatusNoticeProps {
    notice: Notice | null;
    onDismiss: () => void;
}

const ICONS = {
    success: <FaCheckCircle />,
    error: <FaExclamationTriangle />,
    info: <FaInfoCircle />,
};

export default function StatusNotice({ notice, onDismiss }: StatusNoticeProps) {
    return (
        <AnimatePresence>
            {notice && (
                <motion.div
                    key={notice.message}
                    initial={{ opacity: 0, y: -10 }}
                    animate={{ opacity: 1, y: 0 }}
                    exit={{ opacity: 0, y: -10 }}
                    role={notice.tone === 'error' ? 'alert' : 'status'}
                    className={clsx(
                        "flex items-start gap-3 p-4 rounded-2xl border text-sm",
                        notice.tone === 'success' && "bg-emerald-500/10 border-emerald-500/30 text-emerald-300",
                        notice.tone === 'error' && "bg-rose-500/10 border-rose-500/30 text-rose-300",
                        notice.tone === 'info' && "bg-zinc-800/50 border-zinc-700 text-zinc-300"
                    )}
                >
                    <span className="pt-0.5">{ICONS[notice.tone]}</span>
                    <p className="flex-1">{notice.message}</p>
                    <button type="button" onClick={onDismiss} className="text-zinc-500 hover:text-zinc-300" aria-label="Dismiss">
                        <FaTimes />
                    </button>
                </motion.div>
            )}
        </AnimatePresence>
    );
}
