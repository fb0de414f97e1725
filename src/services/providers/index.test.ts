import { describe, expect, it } from 'vitest';
import { silentLogger } from '../logger';
import { SMHI_CAPABILITIES, SmhiService } from '../smhi';
import { createProvider, getProviderCapabilities, listProviders } from './index';

describe('provider registry', () => {
    it('creates the SMHI provider', () => {
        const source = createProvider('smhi', { longitude: 18.0686, latitude: 59.3293, logger: silentLogger });

        expect(source).toBeInstanceOf(SmhiService);
        expect(source?.id).toBe('smhi');
        source?.close();
    });

    it('returns null for an unknown provider', () => {
        expect(createProvider('yr', { longitude: 0, latitude: 0 })).toBeNull();
        expect(getProviderCapabilities('yr')).toBeNull();
    });

    it('lists providers with their capabilities', () => {
        expect(listProviders().map(p => p.id)).toEqual(['smhi']);
        expect(getProviderCapabilities('smhi')).toBe(SMHI_CAPABILITIES);
    });
});
