import { vi } from 'vitest';
import { DailyLogConfig } from './lib/config';
import { LogEntry } from './types/dailyLog';

export const TEST_CONFIG: DailyLogConfig = {
    token: 'test-token',
    owner: 'octo',
    repo: 'logs',
    path: 'data/daily_log.csv',
    branch: 'main',
};

export const CONTENTS_URL = 'https://api.github.com/repos/octo/logs/contents/data/daily_log.csv';
export const RAW_URL = 'https://raw.githubusercontent.com/octo/logs/main/data/daily_log.csv';

export function makeEntry(overrides: Partial<LogEntry> = {}): LogEntry {
    return {
        date: '2024-03-04',
        weekday: 'Monday',
        ordinaryDay: 'Yes',
        screenTime: 2.5,
        studyTime: 3.25,
        studyQuality: 7,
        meditation: 'Yes',
        morningStudy: 'No',
        morningPhone: 'No',
        lunchPhone: 'Yes',
        dinnerPhone: 'No',
        running: 'Yes',
        p: 'No',
        morningWakeUpHour: 7.5,
        notes: '',
        planStrategies: '',
        ...overrides,
    };
}

interface PutBody {
    message: string;
    content: string;
    sha?: string;
    branch: string;
}

const isPutBody = (body: unknown): body is PutBody =>
    typeof body === 'object' &&
    body !== null &&
    'message' in body &&
    typeof body.message === 'string' &&
    'content' in body &&
    typeof body.content === 'string';

const json = (body: unknown, status: number) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/**
 * In-process stand-in for the two GitHub hosts the store talks to.
 * Updates must carry the current sha, as on GitHub.
 */
export function createFakeGitHub(initialContent: string | null) {
    const state: { content: string | null; sha: string | null; version: number; commits: string[] } = {
        content: initialContent,
        sha: initialContent === null ? null : 'sha-0',
        version: 0,
        commits: [],
    };

    const fetch = vi.fn(async (input: string, init?: RequestInit): Promise<Response> => {
        const method = init?.method ?? 'GET';

        if (input === RAW_URL && method === 'GET') {
            return state.content === null ? new Response('404: Not Found', { status: 404 }) : new Response(state.content);
        }

        if (input.startsWith(CONTENTS_URL) && method === 'GET') {
            if (state.content === null) return json({ message: 'Not Found' }, 404);
            return json({ sha: state.sha, content: Buffer.from(state.content).toString('base64') }, 200);
        }

        if (input === CONTENTS_URL && method === 'PUT') {
            const body: unknown = JSON.parse(String(init?.body));
            if (!isPutBody(body)) return json({ message: 'Invalid request' }, 422);
            if (state.sha !== null && body.sha !== state.sha) {
                return json({ message: `${TEST_CONFIG.path} does not match ${body.sha ?? 'nothing'}` }, 409);
            }
            const created = state.content === null;
            state.content = Buffer.from(body.content, 'base64').toString('utf8');
            state.version += 1;
            state.sha = `sha-${state.version}`;
            state.commits.push(body.message);
            return json({ content: { sha: state.sha } }, created ? 201 : 200);
        }

        return json({ message: 'Not Found' }, 404);
    });

    return { state, fetch };
}
