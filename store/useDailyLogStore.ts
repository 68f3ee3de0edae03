import { create } from 'zustand';
import { DateRange, EntryInput, LoadFailure, LogEntry } from '../types/dailyLog';
import { DailyLogApi, httpDailyLogApi } from '../lib/dailyLogApi';
import { appendEntry, createEntry, emptyTable } from '../lib/logTable';

export type NoticeTone = 'success' | 'error' | 'info';

export interface Notice {
    tone: NoticeTone;
    message: string;
}

export interface DailyLogState {
    entries: LogEntry[];
    status: 'idle' | 'loading' | 'ready';
    saving: boolean;
    // False when a log file exists but could not be read; saving the session
    // table would replace it.
    writable: boolean;
    notice: Notice | null;
    range: DateRange | null; // null = span of the whole log

    // Actions
    loadTable: () => Promise<void>;
    submitEntry: (input: EntryInput) => Promise<boolean>;
    setRange: (range: DateRange | null) => void;
    dismissNotice: () => void;
}

const LOAD_NOTICES: Record<LoadFailure, Notice> = {
    missing: { tone: 'info', message: 'No saved log found. Starting with an empty table.' },
    unavailable: { tone: 'info', message: 'Could not load the saved log. Starting with an empty table.' },
    unreadable: {
        tone: 'error',
        message: 'The saved log exists but could not be read. Saving is disabled so it is not overwritten.',
    },
};

// One store per browser session; the log table lives here and nowhere else.
export const createDailyLogStore = (api: DailyLogApi) => create<DailyLogState>((set, get) => ({
    entries: [],
    status: 'idle',
    saving: false,
    writable: true,
    notice: null,
    range: null,

    loadTable: async () => {
        if (get().status !== 'idle') return;
        set({ status: 'loading' });

        try {
            const result = await api.loadTable();
            if (result.loaded) {
                set({ entries: result.entries, status: 'ready', notice: null });
                return;
            }
            set({
                entries: result.entries,
                status: 'ready',
                writable: result.reason !== 'unreadable',
                notice: LOAD_NOTICES[result.reason],
            });
        } catch (error) {
            console.error('[Daily Log] Failed to load the log:', error);
            set({
                entries: emptyTable(),
                status: 'ready',
                notice: LOAD_NOTICES.unavailable,
            });
        }
    },

    submitEntry: async (input) => {
        if (get().saving) return false;
        if (!get().writable) {
            set({ notice: LOAD_NOTICES.unreadable });
            return false;
        }

        const entry = createEntry(input);
        // The local append stays even if the save fails.
        const entries = appendEntry(get().entries, entry);
        set({ entries, saving: true, notice: null });

        try {
            const result = await api.saveTable(entries, `Add daily log entry for ${entry.date}`);
            if (result.ok) {
                set({ saving: false, notice: { tone: 'success', message: `Entry for ${entry.date} saved to GitHub!` } });
                return true;
            }
            set({ saving: false, notice: { tone: 'error', message: result.error } });
            return false;
        } catch (error) {
            console.error('[Daily Log] Save request failed:', error);
            set({ saving: false, notice: { tone: 'error', message: 'Could not reach the server. The entry was not saved.' } });
            return false;
        }
    },

    setRange: (range) => set({ range }),
    dismissNotice: () => set({ notice: null }),
}));

export const useDailyLogStore = createDailyLogStore(httpDailyLogApi);
