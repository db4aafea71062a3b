/**
 * Date helpers. Ledger dates are ISO YYYY-MM-DD strings with no time zone;
 * Date objects built here are UTC midnight.
 */

import { LIMITS } from '@tally/shared';

const SHORT_MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Build an ISO date from parts, or undefined for dates that do not exist
 * (e.g. February 30) and years without four digits.
 */
export function makeIsoDate(year: number, month: number, day: number): string | undefined {
    if (year < LIMITS.YEAR_MIN || year > LIMITS.YEAR_MAX) return undefined;
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return undefined;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return undefined;
    }
    return formatIsoDate(date);
}

/**
 * Parse YYYY-MM-DD (or YYYY/MM/DD) to an ISO string.
 */
export function parseIsoDate(value: string): string | undefined {
    const match = value.trim().match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/);
    if (!match) return undefined;
    return makeIsoDate(parseInt(match[1]), parseInt(match[2]), parseInt(match[3]));
}

/**
 * Parse MM/DD/YYYY to an ISO string.
 */
export function parseMdyDate(value: string): string | undefined {
    const match = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return undefined;
    return makeIsoDate(parseInt(match[3]), parseInt(match[1]), parseInt(match[2]));
}

/**
 * Convert an Excel serial date to an ISO string.
 */
export function excelSerialToIsoDate(serial: number): string {
    // Excel serial: days since 1899-12-30
    const days = Math.round(serial);
    const utcDays = days - 25569;
    return formatIsoDate(new Date(utcDays * 86400 * 1000));
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * The calendar date of a local Date, as ISO.
 */
export function localIsoDate(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * "2024-03-05" -> "Mar 05".
 */
export function shortDate(iso: string): string {
    const [, month, day] = iso.split('-');
    return `${SHORT_MONTHS[parseInt(month) - 1]} ${day}`;
}

export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
