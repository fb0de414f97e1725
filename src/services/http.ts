import axios, { type AxiosError, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { DEFAULT_CONFIG } from '../lib/config';
import { ForecastFetchError } from './errors';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

export type HttpClient = Pick<AxiosInstance, 'get'>;

export function createHttpClient(timeoutMs = DEFAULT_CONFIG.timeoutMs): AxiosInstance {
    return axios.create({
        timeout: timeoutMs,
        headers: { Accept: 'application/json' }
    });
}

const isRetryableStatus = (status?: number) => {
    if (!status) return true;
    return status === 408 || status === 429 || status >= 500;
};

const shouldRetry = (error: AxiosError) => {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return true;
    return isRetryableStatus(error.response?.status);
};

export const formatAxiosError = (error: unknown, context: string) => {
    if (!axios.isAxiosError(error)) {
        return `${context}: Unexpected error.`;
    }
    const status = error.response?.status;
    const statusText = error.response?.statusText || 'Unknown error';
    return `${context}: ${status ? `${status} ${statusText}` : 'Network/timeout error'}.`;
};

export interface GetJsonOptions {
    client?: HttpClient;
    retries?: number;
    backoffMs?: number;
}

/**
 * GETs `url` and resolves with the parsed body. Any axios failure is
 * rethrown as a ForecastFetchError carrying the response status, if any.
 * Nothing is retried unless `retries` is above zero.
 */
export async function getJson<T>(
    url: string,
    config: AxiosRequestConfig = {},
    options: GetJsonOptions = {}
): Promise<T> {
    const client = options.client ?? createHttpClient();
    const retries = options.retries ?? 0;
    const backoffMs = options.backoffMs ?? DEFAULT_CONFIG.backoffMs;
    let attempt = 0;

    for (;;) {
        try {
            const response = await client.get<T>(url, config);
            return response.data;
        } catch (error) {
            if (!axios.isAxiosError(error)) {
                throw error;
            }
            if (!shouldRetry(error) || attempt >= retries) {
                throw new ForecastFetchError(url, error.response?.status ?? null, { cause: error });
            }
            await sleep(backoffMs * Math.pow(2, attempt));
        }
        attempt += 1;
    }
}
