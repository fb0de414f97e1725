export type SmhiParameterKind = 'int' | 'float';

export type SmhiParameterName =
    | 't'
    | 'r'
    | 'msl'
    | 'tstm'
    | 'tcc_mean'
    | 'Wsymb2'
    | 'pcat'
    | 'pmean'
    | 'ws'
    | 'wd'
    | 'vis'
    | 'gust';

export interface SmhiParameterOption {
    name: SmhiParameterName;
    label: string;
    units: string;
    kind: SmhiParameterKind;
}

export const SMHI_PARAMETER_OPTIONS: SmhiParameterOption[] = [
    { name: 't', label: 'Temperature', units: '°C', kind: 'float' },
    { name: 'r', label: 'Relative Humidity', units: '%', kind: 'int' },
    { name: 'msl', label: 'Air Pressure', units: 'hPa', kind: 'int' },
    { name: 'tstm', label: 'Thunder Probability', units: '%', kind: 'int' },
    { name: 'tcc_mean', label: 'Mean Total Cloud Cover', units: 'octas', kind: 'int' },
    { name: 'Wsymb2', label: 'Weather Symbol', units: 'code', kind: 'int' },
    { name: 'pcat', label: 'Precipitation Category', units: 'code', kind: 'int' },
    { name: 'pmean', label: 'Mean Precipitation Intensity', units: 'mm/h', kind: 'float' },
    { name: 'ws', label: 'Wind Speed', units: 'm/s', kind: 'float' },
    { name: 'wd', label: 'Wind Direction', units: 'degrees', kind: 'int' },
    { name: 'vis', label: 'Horizontal Visibility', units: 'km', kind: 'float' },
    { name: 'gust', label: 'Wind Gust', units: 'm/s', kind: 'float' }
];

export type SmhiParameterValues = Record<SmhiParameterName, number>;

export function isSmhiParameterName(name: string): name is SmhiParameterName {
    return SMHI_PARAMETER_OPTIONS.some(option => option.name === name);
}

export function getParameterOption(name: SmhiParameterName): SmhiParameterOption {
    const option = SMHI_PARAMETER_OPTIONS.find(o => o.name === name);
    if (!option) {
        throw new Error(`Unknown SMHI parameter: ${name}`);
    }
    return option;
}
