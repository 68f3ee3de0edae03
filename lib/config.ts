import { z } from 'zod';

const configSchema = z.object({
    GITHUB_TOKEN: z.string().trim().min(1),
    REPO_OWNER: z.string().trim().min(1),
    REPO_NAME: z.string().trim().min(1),
    FILE_PATH: z.string().trim().min(1),
    BRANCH: z.string().trim().min(1),
});

export interface DailyLogConfig {
    token: string;
    owner: string;
    repo: string;
    path: string;
    branch: string;
}

export class ConfigError extends Error {
    constructor(readonly missing: string[]) {
        super(`Missing required environment variables: ${missing.join(', ')}`);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: Record<string, string | undefined>): DailyLogConfig {
    const parsed = configSchema.safeParse(env);
    if (!parsed.success) {
        const missing = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
        throw new ConfigError(missing);
    }

    const { GITHUB_TOKEN, REPO_OWNER, REPO_NAME, FILE_PATH, BRANCH } = parsed.data;
    return {
        token: GITHUB_TOKEN,
        owner: REPO_OWNER,
        repo: REPO_NAME,
        path: FILE_PATH.replace(/^\/+/, ''),
        branch: BRANCH,
    };
}

let cached: DailyLogConfig | null = null;

export function getConfig(): DailyLogConfig {
    if (!cached) cached = loadConfig(process.env);
    return cached;
}
