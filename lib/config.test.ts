import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from './config';

const ENV = {
    GITHUB_TOKEN: 'test-token',
    REPO_OWNER: 'octo',
    REPO_NAME: 'logs',
    FILE_PATH: '/data/daily_log.csv',
    BRANCH: 'main',
};

describe('loadConfig', () => {
    it('maps the environment to store settings', () => {
        expect(loadConfig(ENV)).toEqual({
            token: 'test-token',
            owner: 'octo',
            repo: 'logs',
            path: 'data/daily_log.csv',
            branch: 'main',
        });
    });

    it('lists every missing variable', () => {
        const { GITHUB_TOKEN, BRANCH, ...partial } = ENV;

        expect(() => loadConfig(partial)).toThrow(
            'Missing required environment variables: GITHUB_TOKEN, BRANCH'
        );
    });

    it('treats blank values as missing', () => {
        try {
            loadConfig({ ...ENV, REPO_OWNER: '   ' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            expect(error instanceof ConfigError && error.missing).toEqual(['REPO_OWNER']);
        }
    });
});
