import { format, isValid, parse, parseISO } from 'date-fns';

// Returns consistent YYYY-MM-DD for the current user's local time
export const getTodayDateString = (): string => {
    return format(new Date(), 'yyyy-MM-dd');
};

// Non-ISO spellings found in hand-edited or spreadsheet-exported logs.
// Two-digit years come before four-digit ones so "3/4/24" reads as 2024.
const DATE_FORMATS = [
    'M/d/yy',
    'M/d/yyyy',
    'M/d/yyyy H:mm',
    'M/d/yyyy H:mm:ss',
    'yyyy/M/d',
    'yyyy/M/d H:mm:ss',
    'd MMM yyyy',
    'd MMMM yyyy',
    'MMM d, yyyy',
    'MMMM d, yyyy',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Accepts yyyy-MM-dd, optionally followed by a time ("2024-03-01 00:00:00"),
 * plus the month-first and written-out forms in DATE_FORMATS.
 * Returns null when the text is not a calendar date.
 */
export const toDateKey = (value: string): string | null => {
    const text = value.trim();
    if (text === '') return null;

    const iso = parseISO(text);
    if (isValid(iso)) return format(iso, 'yyyy-MM-dd');

    for (const pattern of DATE_FORMATS) {
        const parsed = parse(text, pattern, REFERENCE_DATE);
        if (isValid(parsed)) return format(parsed, 'yyyy-MM-dd');
    }
    return null;
};

export const toTimestamp = (dateKey: string): number => parseISO(dateKey).getTime();

export const getWeekdayName = (dateKey: string): string => {
    return format(parseISO(dateKey), 'EEEE');
};

export const formatDatePretty = (dateKey: string): string => {
    return format(parseISO(dateKey), 'EEE, MMM d');
};

export const formatTimestampShort = (timestamp: number): string => {
    return format(timestamp, 'MMM d');
};
