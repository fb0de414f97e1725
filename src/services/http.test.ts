import { describe, expect, it, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { ForecastFetchError } from './errors';
import { formatAxiosError, getJson } from './http';

const TARGET_URL = 'https://example.test/data.json';

function httpError(status: number, statusText: string): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
        data: {},
        status,
        statusText,
        headers: {},
        config
    });
}

const networkError = () => new AxiosError('socket hang up', 'ECONNRESET');

describe('getJson', () => {
    it('resolves with the response body', async () => {
        const client = { get: vi.fn().mockResolvedValue({ data: { timeSeries: [] } }) };

        await expect(getJson(TARGET_URL, {}, { client })).resolves.toEqual({ timeSeries: [] });
        expect(client.get).toHaveBeenCalledWith(TARGET_URL, {});
    });

    it('maps an error status to ForecastFetchError without retrying', async () => {
        const client = { get: vi.fn().mockRejectedValue(httpError(503, 'Service Unavailable')) };

        const error = await getJson(TARGET_URL, {}, { client }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ForecastFetchError);
        expect(error).toMatchObject({ status: 503, url: TARGET_URL, message: 'Failed to access SMHI API - Code: 503' });
        expect(client.get).toHaveBeenCalledTimes(1);
    });

    it('reports a null status when no response arrived', async () => {
        const client = { get: vi.fn().mockRejectedValue(networkError()) };

        await expect(getJson(TARGET_URL, {}, { client })).rejects.toMatchObject({ status: null });
    });

    it('retries retryable failures when asked to', async () => {
        const client = {
            get: vi.fn()
                .mockRejectedValueOnce(httpError(503, 'Service Unavailable'))
                .mockResolvedValueOnce({ data: { ok: true } })
        };

        await expect(getJson(TARGET_URL, {}, { client, retries: 2, backoffMs: 0 })).resolves.toEqual({ ok: true });
        expect(client.get).toHaveBeenCalledTimes(2);
    });

    it('does not retry a client error', async () => {
        const client = { get: vi.fn().mockRejectedValue(httpError(404, 'Not Found')) };

        await expect(getJson(TARGET_URL, {}, { client, retries: 2, backoffMs: 0 })).rejects.toMatchObject({ status: 404 });
        expect(client.get).toHaveBeenCalledTimes(1);
    });

    it('rethrows errors that did not come from axios', async () => {
        const boom = new TypeError('boom');
        const client = { get: vi.fn().mockRejectedValue(boom) };

        await expect(getJson(TARGET_URL, {}, { client })).rejects.toBe(boom);
    });
});

describe('formatAxiosError', () => {
    it('describes an HTTP failure', () => {
        expect(formatAxiosError(httpError(404, 'Not Found'), 'SMHI fetch')).toBe('SMHI fetch: 404 Not Found.');
    });

    it('describes a network failure', () => {
        expect(formatAxiosError(networkError(), 'SMHI fetch')).toBe('SMHI fetch: Network/timeout error.');
    });

    it('describes anything else', () => {
        expect(formatAxiosError(new Error('x'), 'SMHI fetch')).toBe('SMHI fetch: Unexpected error.');
    });
});
