import type { ForecastApi } from '../types';
import { DEFAULT_CONFIG, type ForecastConfig } from '../lib/config';
import { createHttpClient, getJson, type HttpClient } from './http';

export function buildForecastUrl(baseUrl: string, longitude: string, latitude: string): string {
    return `${baseUrl}/geotype/point/lon/${longitude}/lat/${latitude}/data.json`;
}

/**
 * Default fetcher: a single GET against the SMHI point-forecast endpoint.
 */
export class SmhiApi implements ForecastApi {
    private readonly config: ForecastConfig;
    private readonly http: HttpClient;

    constructor(config: ForecastConfig = DEFAULT_CONFIG, http?: HttpClient) {
        this.config = config;
        this.http = http ?? createHttpClient(config.timeoutMs);
    }

    async getForecastApi(longitude: string, latitude: string): Promise<unknown> {
        const url = buildForecastUrl(this.config.baseUrl, longitude, latitude);
        return getJson<unknown>(url, {}, {
            client: this.http,
            retries: this.config.retries,
            backoffMs: this.config.backoffMs
        });
    }
}
