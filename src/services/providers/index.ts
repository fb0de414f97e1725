import { SmhiService, SMHI_CAPABILITIES } from '../smhi';
import type { ForecastSource, ForecastSourceCapabilities, ForecastSourceOptions, ProviderId } from '../../types';

export interface ProviderDefinition {
    id: ProviderId;
    name: string;
    description?: string;
    capabilities: ForecastSourceCapabilities;
    create: (options: ForecastSourceOptions) => ForecastSource;
}

const providers: Record<ProviderId, ProviderDefinition> = {
    smhi: {
        id: 'smhi',
        name: 'SMHI Open Data Meteorological Forecasts',
        description: 'Point forecasts for Scandinavia from the pmp3g model',
        capabilities: SMHI_CAPABILITIES,
        create: options => new SmhiService(options)
    }
};

export function isProviderId(id: string): id is ProviderId {
    return Object.prototype.hasOwnProperty.call(providers, id);
}

export function createProvider(id: string, options: ForecastSourceOptions): ForecastSource | null {
    if (!isProviderId(id)) return null;
    return providers[id].create(options);
}

export function listProviders(): ProviderDefinition[] {
    return Object.values(providers);
}

export function getProviderCapabilities(id: string): ForecastSourceCapabilities | null {
    return isProviderId(id) ? providers[id].capabilities : null;
}
