import { isLogLevel, type LogLevel } from '../services/logger';

export interface ForecastConfig {
    baseUrl: string;
    timeoutMs: number;
    retries: number;
    backoffMs: number;
    logLevel: LogLevel;
}

export const DEFAULT_CONFIG: ForecastConfig = {
    baseUrl: 'https://opendata-download-metfcst.smhi.se/api/category/pmp3g/version/2',
    timeoutMs: 10000,
    // The fetch is never retried unless a caller opts in.
    retries: 0,
    backoffMs: 500,
    logLevel: 'info'
};

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string): string | undefined {
    const value = env[name];
    if (value && value.trim().length > 0) {
        return value.trim();
    }
    return undefined;
}

function getIntVar(env: Env, name: string, fallback: number, allowZero = false): number {
    const raw = getEnvVar(env, name);
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed)) return fallback;
    return parsed > 0 || (allowZero && parsed === 0) ? parsed : fallback;
}

export function loadConfig(env: Env = process.env, overrides: Partial<ForecastConfig> = {}): ForecastConfig {
    const logLevel = getEnvVar(env, 'SMHI_LOG_LEVEL');

    const fromEnv: ForecastConfig = {
        baseUrl: getEnvVar(env, 'SMHI_BASE_URL') ?? DEFAULT_CONFIG.baseUrl,
        timeoutMs: getIntVar(env, 'SMHI_TIMEOUT_MS', DEFAULT_CONFIG.timeoutMs),
        retries: getIntVar(env, 'SMHI_RETRIES', DEFAULT_CONFIG.retries, true),
        backoffMs: getIntVar(env, 'SMHI_BACKOFF_MS', DEFAULT_CONFIG.backoffMs),
        logLevel: logLevel && isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel
    };

    // An override left undefined keeps the environment/default value.
    const baseUrl = overrides.baseUrl ?? fromEnv.baseUrl;
    return {
        baseUrl: baseUrl.replace(/\/+$/, ''),
        timeoutMs: overrides.timeoutMs ?? fromEnv.timeoutMs,
        retries: overrides.retries ?? fromEnv.retries,
        backoffMs: overrides.backoffMs ?? fromEnv.backoffMs,
        logLevel: overrides.logLevel ?? fromEnv.logLevel
    };
}
