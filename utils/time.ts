import { ClockTime } from '@/types/dailyLog';

export type TimeNormalization<T> =
    | { kind: 'normalized'; hours: number }
    | { kind: 'unchanged'; original: T };

const INTEGER = /^\s*[+-]?\d+\s*$/;
const DECIMAL = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

const roundHours = (hours: number): number => Math.round(hours * 100) / 100;

export const timeToDecimal = ({ hour, minute }: ClockTime): number => {
    return roundHours(hour + minute / 60);
};

/**
 * Reads a stored time cell as decimal hours.
 *
 * "H:MM" / "HH:MM" text becomes `hour + minute / 60` rounded to two places;
 * anything without a colon goes through a plain numeric conversion. Values
 * that fail either path come back untouched as `unchanged`, so legacy cells
 * survive a load exactly as they were written.
 */
export function normalizeTimeValue<T extends string | number>(value: T): TimeNormalization<T> {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? { kind: 'normalized', hours: value } : { kind: 'unchanged', original: value };
    }

    if (value.includes(':')) {
        const parts = value.split(':');
        if (parts.length !== 2 || !parts.every(p => INTEGER.test(p))) {
            return { kind: 'unchanged', original: value };
        }
        const [hour, minute] = parts.map(p => parseInt(p, 10));
        return { kind: 'normalized', hours: timeToDecimal({ hour, minute }) };
    }

    if (!DECIMAL.test(value)) return { kind: 'unchanged', original: value };
    return { kind: 'normalized', hours: Number(value) };
}

export function hhmmToDecimal<T extends string | number>(value: T): number | T {
    const result = normalizeTimeValue(value);
    return result.kind === 'normalized' ? result.hours : result.original;
}

// <input type="time"> gives "HH:mm"; an empty or partial value reads as null.
export const parseClockInput = (value: string): ClockTime | null => {
    const match = /^(\d{1,2}):(\d{2})$/.exec(value);
    if (!match) return null;
    const hour = Number(match[1]);
    const minute = Number(match[2]);
    if (hour > 23 || minute > 59) return null;
    return { hour, minute };
};

export const formatClock = ({ hour, minute }: ClockTime): string => {
    return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
};

export const formatHours = (value: number | string): string => {
    if (typeof value === 'string') return value;
    const hour = Math.floor(value);
    const minute = Math.round((value - hour) * 60);
    return `${hour}h ${String(minute).padStart(2, '0')}m`;
};
