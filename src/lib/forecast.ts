import type { Forecast, SmhiParameter, SmhiTimeSeriesEntry } from '../types';
import {
    getParameterOption,
    isSmhiParameterName,
    type SmhiParameterName,
    type SmhiParameterValues
} from '../services/providers/smhi-params';
import { MalformedForecastError } from '../services/errors';
import { dayOfMonthUtc, formatValidTime, hourOfDayUtc, hoursBetween, parseValidTime } from './dateUtils';
import { octasToCloudiness, roundHalfEven } from './units';

// Precipitation window assumed for the first entry, which has no predecessor.
const FIRST_ENTRY_HOURS = 1.0;
const REPRESENTATIVE_HOUR = 12;
const HOURS_PER_DAY = 24;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

function toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

function readTimeSeries(payload: unknown): unknown[] {
    if (!isRecord(payload)) {
        throw new MalformedForecastError('Forecast payload is not a JSON object');
    }
    const series = payload.timeSeries;
    if (!Array.isArray(series)) {
        throw new MalformedForecastError('Forecast payload has no timeSeries array');
    }
    if (series.length === 0) {
        throw new MalformedForecastError('Forecast timeSeries is empty');
    }
    return series;
}

function readEntry(entry: unknown, index: number): SmhiTimeSeriesEntry {
    if (!isRecord(entry)) {
        throw new MalformedForecastError(`timeSeries[${index}] is not an object`);
    }
    const { validTime, parameters } = entry;
    if (typeof validTime !== 'string') {
        throw new MalformedForecastError(`timeSeries[${index}] has no validTime`);
    }
    if (!Array.isArray(parameters)) {
        throw new MalformedForecastError('Entry has no parameters array', validTime);
    }

    const parsed: SmhiParameter[] = parameters.map(param => {
        if (!isRecord(param) || typeof param.name !== 'string' || !Array.isArray(param.values)) {
            throw new MalformedForecastError('Entry has a malformed parameter', validTime);
        }
        return { name: param.name, values: param.values };
    });

    return { validTime, parameters: parsed };
}

function readParameterValues(entry: SmhiTimeSeriesEntry): SmhiParameterValues {
    const found: Partial<SmhiParameterValues> = {};

    entry.parameters.forEach(param => {
        // Parameters this client does not model (spp, lcc_mean, ...) are skipped.
        if (!isSmhiParameterName(param.name)) return;

        if (param.values.length === 0) {
            throw new MalformedForecastError(`Parameter ${param.name} has no values`, entry.validTime);
        }
        const value = toNumber(param.values[0]);
        if (value === null) {
            throw new MalformedForecastError(`Parameter ${param.name} is not numeric`, entry.validTime);
        }
        found[param.name] = getParameterOption(param.name).kind === 'int' ? Math.trunc(value) : value;
    });

    const get = (name: SmhiParameterName): number => {
        const value = found[name];
        if (value === undefined) {
            throw new MalformedForecastError(`Missing parameter ${name}`, entry.validTime);
        }
        return value;
    };

    return {
        t: get('t'),
        r: get('r'),
        msl: get('msl'),
        tstm: get('tstm'),
        tcc_mean: get('tcc_mean'),
        Wsymb2: get('Wsymb2'),
        pcat: get('pcat'),
        pmean: get('pmean'),
        ws: get('ws'),
        wd: get('wd'),
        vis: get('vis'),
        gust: get('gust')
    };
}

/**
 * Turns one time-series entry into a Forecast sample. `previousTime` is the
 * validTime of the entry before it, or null for the first entry.
 *
 * Throws MalformedForecastError when the entry's validTime is not later than
 * `previousTime`, as well as for a bad timestamp or a missing parameter.
 */
export function parseForecastEntry(entry: SmhiTimeSeriesEntry, previousTime: Date | null): Forecast {
    const validTime = parseValidTime(entry.validTime);
    if (!validTime) {
        throw new MalformedForecastError('Unparseable validTime', entry.validTime);
    }

    let hours = FIRST_ENTRY_HOURS;
    if (previousTime) {
        hours = hoursBetween(validTime, previousTime);
        if (hours <= 0) {
            throw new MalformedForecastError(
                `validTime does not advance past ${formatValidTime(previousTime)}`,
                entry.validTime
            );
        }
    }

    const p = readParameterValues(entry);
    const temperature = roundHalfEven(p.t);

    return {
        validTime,
        temperature,
        temperatureMax: temperature,
        temperatureMin: temperature,
        humidity: p.r,
        pressure: p.msl,
        thunderProbability: p.tstm,
        cloudiness: octasToCloudiness(p.tcc_mean),
        symbol: p.Wsymb2,
        precipitationCategory: p.pcat,
        meanPrecipitation: roundHalfEven(p.pmean, 1),
        totalPrecipitation: roundHalfEven(p.pmean * hours, 2),
        windDirection: p.wd,
        windSpeed: p.ws,
        windGust: p.gust,
        horizontalVisibility: p.vis
    };
}

export function parseForecastSamples(payload: unknown): Forecast[] {
    const series = readTimeSeries(payload);
    const samples: Forecast[] = [];
    let previousTime: Date | null = null;

    for (let index = 0; index < series.length; index++) {
        const sample = parseForecastEntry(readEntry(series[index], index), previousTime);
        samples.push(sample);
        previousTime = sample.validTime;
    }

    return samples;
}

/**
 * Buckets samples by UTC day-of-month, in the order each day first appears.
 * The key is the day number alone, so a series that wraps past a month end
 * onto the same day number lands in the earlier bucket.
 */
export function groupByDay(samples: Forecast[]): Forecast[][] {
    const days = new Map<number, Forecast[]>();
    samples.forEach(sample => {
        const key = dayOfMonthUtc(sample.validTime);
        const existing = days.get(key) ?? [];
        existing.push(sample);
        days.set(key, existing);
    });
    return Array.from(days.values());
}

export function cloneForecast(forecast: Forecast): Forecast {
    return { ...forecast, validTime: new Date(forecast.validTime.getTime()) };
}

/**
 * Builds the daily record: the noon sample (or the day's first sample)
 * with its extremes and precipitation replaced by the whole day's.
 */
export function aggregateDay(samples: Forecast[]): Forecast {
    if (samples.length === 0) {
        throw new MalformedForecastError('Cannot aggregate a day without samples');
    }

    let representative: Forecast | null = null;
    let temperatureMax = samples[0].temperatureMax;
    let temperatureMin = samples[0].temperatureMin;
    let totalPrecipitation = 0;

    for (const sample of samples) {
        temperatureMax = Math.max(temperatureMax, sample.temperature);
        temperatureMin = Math.min(temperatureMin, sample.temperature);
        totalPrecipitation += sample.totalPrecipitation;
        if (!representative && hourOfDayUtc(sample.validTime) === REPRESENTATIVE_HOUR) {
            representative = sample;
        }
    }

    const base = representative ?? samples[0];
    return {
        ...cloneForecast(base),
        temperatureMax,
        temperatureMin,
        totalPrecipitation,
        meanPrecipitation: totalPrecipitation / HOURS_PER_DAY
    };
}

/**
 * Converts an SMHI point-forecast payload into forecast records. The first
 * record is the current conditions (the earliest sample, unaggregated);
 * every following record summarises one day.
 */
export function buildForecasts(payload: unknown): Forecast[] {
    const days = groupByDay(parseForecastSamples(payload));
    const forecasts: Forecast[] = [cloneForecast(days[0][0])];
    days.forEach(day => forecasts.push(aggregateDay(day)));
    return forecasts;
}
