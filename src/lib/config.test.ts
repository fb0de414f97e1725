import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config';

describe('loadConfig', () => {
    it('returns the defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('reads SMHI_* variables', () => {
        const config = loadConfig({
            SMHI_BASE_URL: 'https://example.test/api/',
            SMHI_TIMEOUT_MS: '2500',
            SMHI_RETRIES: '2',
            SMHI_BACKOFF_MS: '100',
            SMHI_LOG_LEVEL: 'debug'
        });

        expect(config).toEqual({
            baseUrl: 'https://example.test/api',
            timeoutMs: 2500,
            retries: 2,
            backoffMs: 100,
            logLevel: 'debug'
        });
    });

    it('falls back on invalid values', () => {
        const config = loadConfig({
            SMHI_TIMEOUT_MS: 'soon',
            SMHI_RETRIES: '-1',
            SMHI_BACKOFF_MS: '0',
            SMHI_LOG_LEVEL: 'verbose'
        });

        expect(config.timeoutMs).toBe(DEFAULT_CONFIG.timeoutMs);
        expect(config.retries).toBe(0);
        expect(config.backoffMs).toBe(DEFAULT_CONFIG.backoffMs);
        expect(config.logLevel).toBe('info');
    });

    it('accepts zero retries from the environment', () => {
        expect(loadConfig({ SMHI_RETRIES: '0' }).retries).toBe(0);
    });

    it('lets explicit overrides win over the environment', () => {
        const config = loadConfig({ SMHI_TIMEOUT_MS: '2500' }, { timeoutMs: 100, logLevel: 'silent' });
        expect(config.timeoutMs).toBe(100);
        expect(config.logLevel).toBe('silent');
    });

    it('ignores overrides that are undefined', () => {
        const config = loadConfig(
            { SMHI_TIMEOUT_MS: '2500' },
            { baseUrl: undefined, timeoutMs: undefined, logLevel: undefined }
        );

        expect(config.baseUrl).toBe(DEFAULT_CONFIG.baseUrl);
        expect(config.timeoutMs).toBe(2500);
        expect(config.logLevel).toBe('info');
    });

    it('strips trailing slashes from an overridden base URL', () => {
        expect(loadConfig({}, { baseUrl: 'https://example.test/api//' }).baseUrl).toBe('https://example.test/api');
    });
});
