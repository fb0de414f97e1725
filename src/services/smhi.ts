import type { Forecast, ForecastApi, ForecastSource, ForecastSourceCapabilities, ForecastSourceOptions } from '../types';
import { loadConfig, type ForecastConfig } from '../lib/config';
import { buildForecasts } from '../lib/forecast';
import { roundHalfEven } from '../lib/units';
import { ForecastError, ForecastFetchError } from './errors';
import { formatAxiosError } from './http';
import { createConsoleLogger, silentLogger, type Logger } from './logger';
import { SmhiApi } from './smhi-api';

export const SMHI_CAPABILITIES: ForecastSourceCapabilities = {
    id: 'smhi',
    name: 'SMHI Open Data',
    supportsHourlySamples: true,
    supportsDailyAggregation: true,
    requiresApiKey: false,
    maxForecastDays: 10,
    description: 'Swedish Meteorological and Hydrological Institute point forecasts (pmp3g)'
};

// SMHI accepts at most six decimals in the point path.
const COORDINATE_DECIMALS = 6;

export function formatCoordinate(value: number): string {
    if (!Number.isFinite(value)) {
        throw new RangeError(`Invalid coordinate: ${value}`);
    }
    return String(roundHalfEven(value, COORDINATE_DECIMALS));
}

export class SmhiService implements ForecastSource {
    static readonly ID = SMHI_CAPABILITIES.id;
    static readonly NAME = SMHI_CAPABILITIES.name;

    readonly id = SmhiService.ID;
    readonly name = SmhiService.NAME;
    readonly capabilities = SMHI_CAPABILITIES;

    readonly longitude: string;
    readonly latitude: string;

    private readonly config: ForecastConfig;
    private readonly api: ForecastApi;
    private logger: Logger;
    private closed = false;

    constructor(options: ForecastSourceOptions) {
        this.longitude = formatCoordinate(options.longitude);
        this.latitude = formatCoordinate(options.latitude);
        this.config = loadConfig(process.env, options.config);
        this.logger = options.logger ?? createConsoleLogger('[SmhiForecast]', this.config.logLevel);
        this.api = options.api ?? new SmhiApi(this.config, options.http);
        this.logger.debug(`Service initialised for ${this.latitude},${this.longitude}`);
    }

    /**
     * Returns a list of forecasts. The first in the list is the current one,
     * followed by one aggregated record per day.
     */
    async getForecast(): Promise<Forecast[]> {
        if (this.closed) {
            throw new ForecastError('SmhiService has been closed');
        }
        this.logger.info(`Fetching forecast for ${this.latitude},${this.longitude}`);

        let payload: unknown;
        try {
            payload = await this.api.getForecastApi(this.longitude, this.latitude);
        } catch (error) {
            const cause = error instanceof ForecastFetchError ? error.cause : error;
            this.logger.warn(formatAxiosError(cause, 'Forecast fetch failed'), error);
            throw error;
        }
        return this.getForecastFromPayload(payload);
    }

    /**
     * Same result as getForecast, for a payload the caller already holds.
     */
    getForecastFromPayload(payload: unknown): Forecast[] {
        try {
            const forecasts = buildForecasts(payload);
            this.logger.debug(`Built ${forecasts.length} forecast records`);
            return forecasts;
        } catch (error) {
            this.logger.warn('Forecast payload rejected', error);
            throw error;
        }
    }

    /**
     * Detaches the logger and rejects any later fetch. Safe to call twice.
     */
    close(): void {
        if (this.closed) return;
        this.logger.debug('Service closed');
        this.logger = silentLogger;
        this.closed = true;
    }
}
