export * from './data-source';
export * from './providers';

/**
 * One `{ name, values }` pair inside a time-series entry.
 * SMHI always sends `values` as a single-element array.
 */
export interface SmhiParameter {
    name: string;
    levelType?: string;
    level?: number;
    unit?: string;
    values: Array<number | string>;
}

export interface SmhiTimeSeriesEntry {
    validTime: string; // YYYY-MM-DDTHH:MM:SSZ
    parameters: SmhiParameter[];
}

export interface SmhiApiResponse {
    approvedTime?: string;
    referenceTime?: string;
    geometry?: {
        type: string;
        coordinates: number[][];
    };
    timeSeries: SmhiTimeSeriesEntry[];
}

export interface Coordinates {
    latitude: number;
    longitude: number;
}

export interface Forecast {
    validTime: Date;
    temperature: number; // °C, rounded
    temperatureMax: number;
    temperatureMin: number;
    humidity: number; // %
    pressure: number; // hPa
    thunderProbability: number; // %
    cloudiness: number; // %
    symbol: number; // Wsymb2
    precipitationCategory: number; // pcat
    /**
     * mm/h on a single sample. On an aggregated day it is `totalPrecipitation / 24`.
     */
    meanPrecipitation: number;
    totalPrecipitation: number; // mm
    windDirection: number; // degrees
    windSpeed: number; // m/s
    windGust: number; // m/s
    horizontalVisibility: number; // km
}
