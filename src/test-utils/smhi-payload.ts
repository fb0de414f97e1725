import type { SmhiApiResponse, SmhiTimeSeriesEntry } from '../types';

export const BASE_PARAMS: Record<string, number> = {
    t: 10.4,
    r: 80,
    msl: 1013,
    tstm: 2,
    tcc_mean: 4,
    Wsymb2: 3,
    pcat: 0,
    pmean: 0,
    ws: 3.5,
    wd: 180,
    vis: 40.5,
    gust: 7.2
};

export function makeEntry(validTime: string, overrides: Record<string, number> = {}): SmhiTimeSeriesEntry {
    const params = { ...BASE_PARAMS, ...overrides };
    return {
        validTime,
        parameters: Object.entries(params).map(([name, value]) => ({
            name,
            levelType: 'hl',
            level: 0,
            values: [value]
        }))
    };
}

const pad = (n: number) => n.toString().padStart(2, '0');

/**
 * One entry per listed hour of `date` (YYYY-MM-DD), all UTC.
 */
export function hourlyEntries(
    date: string,
    hours: number[],
    paramsForHour: (hour: number) => Record<string, number> = () => ({})
): SmhiTimeSeriesEntry[] {
    return hours.map(hour => makeEntry(`${date}T${pad(hour)}:00:00Z`, paramsForHour(hour)));
}

export const range = (from: number, to: number) =>
    Array.from({ length: to - from + 1 }, (_, i) => from + i);

export function makePayload(timeSeries: SmhiTimeSeriesEntry[]): SmhiApiResponse {
    return {
        approvedTime: '2024-06-01T00:00:00Z',
        referenceTime: '2024-06-01T00:00:00Z',
        geometry: { type: 'Point', coordinates: [[18.0686, 59.3293]] },
        timeSeries
    };
}

// Two full days, pmean 1.0 throughout; t is hour+0.4 on day one, hour-4.6 on day two.
export function twoDayPayload(): SmhiApiResponse {
    return makePayload([
        ...hourlyEntries('2024-06-01', range(0, 23), hour => ({ t: hour + 0.4, pmean: 1.0 })),
        ...hourlyEntries('2024-06-02', range(0, 23), hour => ({ t: hour - 4.6, pmean: 1.0 }))
    ]);
}
