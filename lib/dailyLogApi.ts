import { LoadFailure, LogEntry, ReadTableResult } from '@/types/dailyLog';

export type SaveResult = { ok: true } | { ok: false; error: string };

export interface DailyLogApi {
    loadTable: () => Promise<ReadTableResult>;
    saveTable: (entries: readonly LogEntry[], message: string) => Promise<SaveResult>;
}

const ENDPOINT = '/api/daily-log';

const readError = async (response: Response): Promise<string> => {
    const body: unknown = await response.json().catch(() => null);
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
        return body.error;
    }
    return `Request failed with status ${response.status}`;
};

const LOAD_FAILURES: readonly unknown[] = ['missing', 'unreadable', 'unavailable'] satisfies LoadFailure[];

const isReadTableResult = (body: unknown): body is ReadTableResult =>
    typeof body === 'object' &&
    body !== null &&
    'entries' in body &&
    Array.isArray(body.entries) &&
    'loaded' in body &&
    (body.loaded === true || (body.loaded === false && 'reason' in body && LOAD_FAILURES.includes(body.reason)));

export const httpDailyLogApi: DailyLogApi = {
    loadTable: async () => {
        const response = await fetch(ENDPOINT, { cache: 'no-store' });
        if (!response.ok) throw new Error(await readError(response));
        const body: unknown = await response.json();
        if (!isReadTableResult(body)) throw new Error('Unexpected response from the log endpoint');
        return body;
    },

    saveTable: async (entries, message) => {
        const response = await fetch(ENDPOINT, {
            method: 'PUT',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ entries, message }),
        });
        if (response.ok) return { ok: true };
        return { ok: false, error: await readError(response) };
    },
};
