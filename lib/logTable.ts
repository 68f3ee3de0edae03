import {
    CellValue,
    EntryInput,
    LOG_COLUMNS,
    LOG_HEADERS,
    LogEntry,
} from '@/types/dailyLog';
import { buildCsv, parseCsv } from '@/utils/csv';
import { getWeekdayName, toDateKey } from '@/utils/date';
import { hhmmToDecimal, timeToDecimal } from '@/utils/time';

export class TableParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TableParseError';
    }
}

// The only column an older file may lack.
const OPTIONAL_HEADERS = new Set(['Morning Wake Up Hour']);

const NUMBER = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

export const emptyTable = (): LogEntry[] => [];

export const createEntry = (input: EntryInput): LogEntry => ({
    date: input.date,
    weekday: getWeekdayName(input.date),
    ordinaryDay: input.flags.ordinaryDay,
    screenTime: timeToDecimal(input.screenTime),
    studyTime: timeToDecimal(input.studyTime),
    studyQuality: input.studyQuality,
    meditation: input.flags.meditation,
    morningStudy: input.flags.morningStudy,
    morningPhone: input.flags.morningPhone,
    lunchPhone: input.flags.lunchPhone,
    dinnerPhone: input.flags.dinnerPhone,
    running: input.flags.running,
    p: input.flags.p,
    morningWakeUpHour: timeToDecimal(input.wakeUp),
    notes: input.notes,
    planStrategies: input.planStrategies,
});

// Entries are only ever appended; the same date may appear more than once.
export const appendEntry = (entries: readonly LogEntry[], entry: LogEntry): LogEntry[] => [...entries, entry];

const formatCell = (value: string | number): string => (typeof value === 'number' ? String(value) : value);

export function serializeTable(entries: readonly LogEntry[]): string {
    const rows = entries.map(entry => LOG_COLUMNS.map(({ field }) => formatCell(entry[field])));
    return buildCsv(LOG_HEADERS, rows);
}

const readNumber = (raw: string): CellValue => (NUMBER.test(raw) ? Number(raw) : raw);

/**
 * Parses the persisted CSV into log entries.
 *
 * Wake-up hours pass through the time normalizer, so legacy "8:15" cells load
 * as 8.25. Weekdays are recomputed from the date. Other cells are kept as
 * read: numbers where they parse, text otherwise. Throws TableParseError only
 * when a required column is missing or a date cannot be read.
 */
export function parseTable(text: string): LogEntry[] {
    const [header, ...records] = parseCsv(text);
    if (!header) return emptyTable();

    const index = new Map(header.map((name, i) => [name.trim(), i] as const));
    const missing = LOG_HEADERS.filter(h => !index.has(h) && !OPTIONAL_HEADERS.has(h));
    if (missing.length > 0) {
        throw new TableParseError(`Missing columns: ${missing.join(', ')}`);
    }

    return records.map((record, i) => {
        const row = i + 2;
        const cell = (name: string): string => {
            const at = index.get(name);
            return at === undefined ? '' : record[at] ?? '';
        };

        const date = toDateKey(cell('Date'));
        if (!date) throw new TableParseError(`Row ${row}: invalid date "${cell('Date')}"`);

        return {
            date,
            weekday: getWeekdayName(date),
            ordinaryDay: cell('Ordinary Day'),
            screenTime: readNumber(cell('Screen Time')),
            studyTime: readNumber(cell('Study Time')),
            studyQuality: readNumber(cell('Study Quality (1-10)')),
            meditation: cell('Meditation'),
            morningStudy: cell('Morning Study'),
            morningPhone: cell('Morning Phone'),
            lunchPhone: cell('Lunch Phone'),
            dinnerPhone: cell('Dinner Phone'),
            running: cell('Running'),
            p: cell('P'),
            morningWakeUpHour: hhmmToDecimal(cell('Morning Wake Up Hour')),
            notes: cell('Notes'),
            planStrategies: cell('Plan/Strategies'),
        };
    });
}
