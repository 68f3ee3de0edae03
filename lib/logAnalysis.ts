import { DateRange, LogEntry } from '@/types/dailyLog';
import { toTimestamp } from '@/utils/date';

export type NumericField = 'screenTime' | 'studyTime' | 'studyQuality' | 'morningWakeUpHour';

export const NUMERIC_FIELDS: readonly { field: NumericField; label: string }[] = [
    { field: 'screenTime', label: 'Screen Time' },
    { field: 'studyTime', label: 'Study Time' },
    { field: 'studyQuality', label: 'Study Quality (1-10)' },
    { field: 'morningWakeUpHour', label: 'Morning Wake Up Hour' },
];

export interface SeriesPoint {
    date: string;
    timestamp: number; // local midnight of date, for a time axis
    hours: number;
}

export interface CorrelationMatrix {
    labels: string[];
    values: (number | null)[][]; // null where a column has no variance
}

// Earliest and latest logged dates; an empty log collapses to today.
export const dateBounds = (entries: readonly LogEntry[], today: string): DateRange => {
    if (entries.length === 0) return { start: today, end: today };
    let start = entries[0].date;
    let end = entries[0].date;
    for (const { date } of entries) {
        if (date < start) start = date;
        if (date > end) end = date;
    }
    return { start, end };
};

export const filterByDateRange = (entries: readonly LogEntry[], { start, end }: DateRange): LogEntry[] => {
    return entries.filter(e => e.date >= start && e.date <= end);
};

// Latest dates first; entries sharing a date keep their append order.
export const recentEntries = (entries: readonly LogEntry[], count = 3): LogEntry[] => {
    return [...entries].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0)).slice(0, count);
};

// Points in date order; entries sharing a date keep their append order and
// share one x position.
export const timeSeries = (entries: readonly LogEntry[], field: 'screenTime' | 'studyTime'): SeriesPoint[] => {
    const points: SeriesPoint[] = [];
    for (const entry of entries) {
        const value = entry[field];
        if (typeof value === 'number') points.push({ date: entry.date, timestamp: toTimestamp(entry.date), hours: value });
    }
    return points.sort((a, b) => a.timestamp - b.timestamp);
};

const columnValues = (entries: readonly LogEntry[], field: NumericField): number[] | null => {
    const values: number[] = [];
    for (const entry of entries) {
        const value = entry[field];
        if (typeof value !== 'number' || !Number.isFinite(value)) return null;
        values.push(value);
    }
    return values;
};

export const pearson = (xs: readonly number[], ys: readonly number[]): number | null => {
    const n = xs.length;
    if (n < 2 || ys.length !== n) return null;

    const meanX = xs.reduce((sum, x) => sum + x, 0) / n;
    const meanY = ys.reduce((sum, y) => sum + y, 0) / n;

    let cov = 0;
    let varX = 0;
    let varY = 0;
    for (let i = 0; i < n; i++) {
        const dx = xs[i] - meanX;
        const dy = ys[i] - meanY;
        cov += dx * dy;
        varX += dx * dx;
        varY += dy * dy;
    }

    if (varX === 0 || varY === 0) return null;
    return Math.max(-1, Math.min(1, cov / Math.sqrt(varX * varY)));
};

/**
 * Pairwise Pearson correlation over the numeric columns of the given rows.
 * A column joins the matrix only when every row holds a number in it, so a
 * single legacy text cell drops that column from the view.
 */
export const correlationMatrix = (entries: readonly LogEntry[]): CorrelationMatrix => {
    const columns = NUMERIC_FIELDS
        .map(({ field, label }) => ({ label, values: columnValues(entries, field) }))
        .filter((c): c is { label: string; values: number[] } => c.values !== null);

    return {
        labels: columns.map(c => c.label),
        values: columns.map((row, i) =>
            columns.map((col, j) => {
                const r = pearson(row.values, col.values);
                return i === j && r !== null ? 1 : r;
            })
        ),
    };
};
