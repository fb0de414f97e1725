export type {
    Coordinates,
    Forecast,
    ForecastApi,
    ForecastSource,
    ForecastSourceCapabilities,
    ForecastSourceOptions,
    ProviderId,
    SmhiApiResponse,
    SmhiParameter,
    SmhiTimeSeriesEntry
} from './types';
export { SmhiService, SMHI_CAPABILITIES, formatCoordinate } from './services/smhi';
export { SmhiApi, buildForecastUrl } from './services/smhi-api';
export { ForecastError, ForecastFetchError, MalformedForecastError } from './services/errors';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './services/logger';
export { formatAxiosError, getJson } from './services/http';
export { createProvider, getProviderCapabilities, listProviders } from './services/providers';
export { SMHI_PARAMETER_OPTIONS } from './services/providers/smhi-params';
export { DEFAULT_CONFIG, loadConfig, type ForecastConfig } from './lib/config';
export { aggregateDay, buildForecasts, groupByDay, parseForecastEntry, parseForecastSamples } from './lib/forecast';
export { octasToCloudiness, roundHalfEven } from './lib/units';
