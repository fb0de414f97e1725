import { differenceInSeconds, isValid, parseISO } from 'date-fns';

const VALID_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T([01]\d|2[0-3]):[0-5]\d:[0-5]\dZ$/;

/**
 * Parses an SMHI `validTime` (YYYY-MM-DDTHH:MM:SSZ). Anything else,
 * including calendar-invalid dates such as Feb 30, yields null.
 */
export function parseValidTime(value: string): Date | null {
    if (!VALID_TIME_PATTERN.test(value)) return null;
    const date = parseISO(value);
    return isValid(date) ? date : null;
}

export function hoursBetween(later: Date, earlier: Date): number {
    return differenceInSeconds(later, earlier) / 3600;
}

// Grouping and noon selection run on UTC, the zone SMHI reports in.
export function dayOfMonthUtc(date: Date): number {
    return date.getUTCDate();
}

export function hourOfDayUtc(date: Date): number {
    return date.getUTCHours();
}

/**
 * Formats back to the wire form, e.g. `2024-06-01T12:00:00Z`.
 */
export function formatValidTime(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
