export type YesNo = 'Yes' | 'No';

export const YES_NO_OPTIONS: readonly YesNo[] = ['Yes', 'No'];

// Decimal hours, or a legacy cell the time normalizer could not read.
export type HoursValue = number | string;

// The form writes a number; older rows may hold text, kept as read.
export type CellValue = number | string;

// The form writes Yes or No; older rows may hold other text, kept as read.
export type FlagValue = string;

export interface LogEntry {
    date: string; // yyyy-MM-dd
    weekday: string; // Monday..Sunday, always derived from date
    ordinaryDay: FlagValue;
    screenTime: HoursValue;
    studyTime: HoursValue;
    studyQuality: CellValue; // 1-10
    meditation: FlagValue;
    morningStudy: FlagValue;
    morningPhone: FlagValue;
    lunchPhone: FlagValue;
    dinnerPhone: FlagValue;
    running: FlagValue;
    p: FlagValue;
    morningWakeUpHour: HoursValue;
    notes: string;
    planStrategies: string;
}

export type LogField = keyof LogEntry;

export type HabitFlag =
    | 'ordinaryDay'
    | 'meditation'
    | 'morningStudy'
    | 'morningPhone'
    | 'lunchPhone'
    | 'dinnerPhone'
    | 'running'
    | 'p';

// Column order of the persisted CSV file.
export const LOG_COLUMNS = [
    { field: 'date', header: 'Date' },
    { field: 'weekday', header: 'Weekday' },
    { field: 'ordinaryDay', header: 'Ordinary Day' },
    { field: 'screenTime', header: 'Screen Time' },
    { field: 'studyTime', header: 'Study Time' },
    { field: 'studyQuality', header: 'Study Quality (1-10)' },
    { field: 'meditation', header: 'Meditation' },
    { field: 'morningStudy', header: 'Morning Study' },
    { field: 'morningPhone', header: 'Morning Phone' },
    { field: 'lunchPhone', header: 'Lunch Phone' },
    { field: 'dinnerPhone', header: 'Dinner Phone' },
    { field: 'running', header: 'Running' },
    { field: 'p', header: 'P' },
    { field: 'morningWakeUpHour', header: 'Morning Wake Up Hour' },
    { field: 'notes', header: 'Notes' },
    { field: 'planStrategies', header: 'Plan/Strategies' },
] as const satisfies readonly { field: LogField; header: string }[];

export const LOG_HEADERS: readonly string[] = LOG_COLUMNS.map(c => c.header);

export const HABIT_FLAGS: readonly { field: HabitFlag; label: string }[] = [
    { field: 'ordinaryDay', label: 'Ordinary Day' },
    { field: 'meditation', label: 'Meditation' },
    { field: 'morningStudy', label: 'Morning Study' },
    { field: 'morningPhone', label: 'Morning Phone' },
    { field: 'lunchPhone', label: 'Lunch Phone' },
    { field: 'dinnerPhone', label: 'Dinner Phone' },
    { field: 'running', label: 'Running' },
    { field: 'p', label: 'P' },
];

export interface ClockTime {
    hour: number;
    minute: number;
}

// What the entry form hands over on submit.
export interface EntryInput {
    date: string;
    screenTime: ClockTime;
    studyTime: ClockTime;
    wakeUp: ClockTime;
    studyQuality: number;
    flags: Record<HabitFlag, YesNo>;
    notes: string;
    planStrategies: string;
}

export interface DateRange {
    start: string; // yyyy-MM-dd, inclusive
    end: string; // yyyy-MM-dd, inclusive
}

// missing: no file at the path. unreadable: the file exists but its content
// could not be parsed. unavailable: the request itself failed.
export type LoadFailure = 'missing' | 'unreadable' | 'unavailable';

export type ReadTableResult =
    | { entries: LogEntry[]; loaded: true }
    | { entries: LogEntry[]; loaded: false; reason: LoadFailure };
