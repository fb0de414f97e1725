import type { HttpClient } from '../services/http';
import type { Logger } from '../services/logger';
import type { ForecastConfig } from '../lib/config';
import type { Coordinates, Forecast } from './index';

export interface ForecastSourceCapabilities {
    id: string;
    name: string;
    supportsHourlySamples: boolean;
    supportsDailyAggregation: boolean;
    requiresApiKey: boolean;
    maxForecastDays?: number;
    description?: string;
}

/**
 * The fetcher collaborator: one GET against the forecast endpoint,
 * resolving with the parsed JSON body.
 */
export interface ForecastApi {
    getForecastApi(longitude: string, latitude: string): Promise<unknown>;
}

export interface ForecastSourceOptions extends Coordinates {
    config?: Partial<ForecastConfig>;
    logger?: Logger;
    /**
     * Reuse an existing axios instance instead of creating one per service.
     */
    http?: HttpClient;
    api?: ForecastApi;
}

export interface ForecastSource {
    readonly id: string;
    readonly name: string;
    readonly capabilities: ForecastSourceCapabilities;

    getForecast(): Promise<Forecast[]>;
    getForecastFromPayload(payload: unknown): Forecast[];
    close(): void;
}
