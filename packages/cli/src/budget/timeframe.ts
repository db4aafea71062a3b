import { MONTH_NAMES } from '@tally/shared';

/**
 * A year, or one month of it. Month 0 means the whole year.
 */
export interface TimeFrame {
    year: number;
    month: number;
}

export function timeframeOf(date: Date): TimeFrame {
    return { year: date.getFullYear(), month: date.getMonth() + 1 };
}

export function isWholeYear(timeframe: TimeFrame): boolean {
    return timeframe.month === 0;
}

/**
 * Whether an ISO date falls inside the timeframe.
 */
export function containsDate(timeframe: TimeFrame, isoDate: string): boolean {
    const prefix = isWholeYear(timeframe)
        ? `${timeframe.year}-`
        : `${timeframe.year}-${String(timeframe.month).padStart(2, '0')}-`;
    return isoDate.startsWith(prefix);
}

/**
 * The month an ISO date falls in.
 */
export function timeframeOfIso(isoDate: string): TimeFrame {
    const [year, month] = isoDate.split('-');
    return { year: parseInt(year), month: parseInt(month) };
}

export function monthName(month: number): string {
    return MONTH_NAMES[month] ?? String(month);
}

export function describeTimeframe(timeframe: TimeFrame): string {
    return `${monthName(timeframe.month)} of ${timeframe.year}`;
}
