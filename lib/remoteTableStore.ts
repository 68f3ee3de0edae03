import CryptoJS from 'crypto-js';
import { LogEntry, ReadTableResult } from '@/types/dailyLog';
import { DailyLogConfig } from './config';
import { emptyTable, parseTable, serializeTable } from './logTable';

export const DEFAULT_COMMIT_MESSAGE = 'Update daily_log.csv';

const GITHUB_API_URL = 'https://api.github.com';
const GITHUB_RAW_URL = 'https://raw.githubusercontent.com';

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const encodePath = (path: string) => path.split('/').map(encodeURIComponent).join('/');

const errorMessage = (body: unknown): string | null => {
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
        return body.message;
    }
    return null;
};

/**
 * The log file as it lives in a GitHub repository.
 *
 * Reads go through the raw content host; the revision lookup and the write go
 * through the contents API with the bearer token. Every call is a fresh
 * request and the store holds nothing between calls.
 */
export class RemoteTableStore {
    private readonly fetchImpl: FetchLike;

    constructor(private readonly config: DailyLogConfig, fetchImpl?: FetchLike) {
        this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    }

    get contentsUrl(): string {
        const { owner, repo, path } = this.config;
        return `${GITHUB_API_URL}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/contents/${encodePath(path)}`;
    }

    get rawUrl(): string {
        const { owner, repo, branch, path } = this.config;
        return `${GITHUB_RAW_URL}/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/${encodeURIComponent(branch)}/${encodePath(path)}`;
    }

    private get authHeaders(): Record<string, string> {
        return {
            Authorization: `Bearer ${this.config.token}`,
            Accept: 'application/vnd.github+json',
            'X-GitHub-Api-Version': '2022-11-28',
        };
    }

    // Current blob sha of the file, or null when it cannot be determined.
    async fetchRevision(): Promise<string | null> {
        const url = `${this.contentsUrl}?ref=${encodeURIComponent(this.config.branch)}`;
        try {
            const response = await this.fetchImpl(url, { headers: this.authHeaders, cache: 'no-store' });
            if (response.status !== 200) {
                console.warn('[Remote Store] Revision lookup failed with status', response.status);
                return null;
            }
            const body: unknown = await response.json();
            if (typeof body === 'object' && body !== null && 'sha' in body && typeof body.sha === 'string') {
                return body.sha;
            }
            console.warn('[Remote Store] Revision lookup returned no sha');
            return null;
        } catch (error) {
            console.error('[Remote Store] Revision lookup error:', error);
            return null;
        }
    }

    async readTable(): Promise<ReadTableResult> {
        let text: string;
        try {
            const response = await this.fetchImpl(this.rawUrl, { cache: 'no-store' });
            if (!response.ok) {
                console.warn('[Remote Store] Read failed with status', response.status);
                return { entries: emptyTable(), loaded: false, reason: response.status === 404 ? 'missing' : 'unavailable' };
            }
            text = await response.text();
        } catch (error) {
            console.error('[Remote Store] Read error, starting from an empty table:', error);
            return { entries: emptyTable(), loaded: false, reason: 'unavailable' };
        }

        try {
            const entries = parseTable(text);
            console.log(`[Remote Store] Loaded ${entries.length} entries`);
            return { entries, loaded: true };
        } catch (error) {
            console.error('[Remote Store] The log file exists but could not be parsed:', error);
            return { entries: emptyTable(), loaded: false, reason: 'unreadable' };
        }
    }

    /**
     * Replaces the whole file. GitHub rejects the update unless `revisionId`
     * is the file's current sha.
     */
    async writeTable(
        entries: readonly LogEntry[],
        revisionId: string,
        commitMessage: string = DEFAULT_COMMIT_MESSAGE
    ): Promise<boolean> {
        const content = CryptoJS.enc.Base64.stringify(CryptoJS.enc.Utf8.parse(serializeTable(entries)));

        try {
            const response = await this.fetchImpl(this.contentsUrl, {
                method: 'PUT',
                headers: { ...this.authHeaders, 'Content-Type': 'application/json' },
                body: JSON.stringify({
                    message: commitMessage,
                    content,
                    sha: revisionId,
                    branch: this.config.branch,
                }),
            });

            if (response.status === 200 || response.status === 201) {
                console.log(`[Remote Store] Committed "${commitMessage}" (${entries.length} entries)`);
                return true;
            }

            const body: unknown = await response.json().catch(() => null);
            console.error('[Remote Store] Write rejected:', response.status, errorMessage(body) ?? 'no error message');
            return false;
        } catch (error) {
            console.error('[Remote Store] Write error:', error);
            return false;
        }
    }
}
