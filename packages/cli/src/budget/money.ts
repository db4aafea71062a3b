/**
 * Dollar amounts as typed and shown, integer cents as stored.
 */

import { Decimal } from 'decimal.js';
import { LIMITS } from '@tally/shared';

const SIGNED_AMOUNT = /^[+-]\d+(\.\d{1,2})?$/;
const PLAIN_AMOUNT = /^[+-]?\d+(\.\d{1,2})?$/;

export function dollarsToCents(dollars: string): number {
    return new Decimal(dollars).times(100).toNumber();
}

export function centsToDollars(cents: number): number {
    return new Decimal(cents).dividedBy(100).toNumber();
}

function withinLimit(cents: number): boolean {
    return Math.abs(cents) < LIMITS.AMOUNT_MAX_CENTS;
}

/**
 * Parse an amount typed by the user: an explicit sign and at most two
 * decimals, e.g. "+12.50" or "-3".
 */
export function parseAmount(text: string): number | undefined {
    const trimmed = text.trim();
    if (!SIGNED_AMOUNT.test(trimmed)) return undefined;
    const cents = dollarsToCents(trimmed);
    return withinLimit(cents) ? cents : undefined;
}

export function hasSign(text: string): boolean {
    return /^[+-]/.test(text.trim());
}

/**
 * Parse an amount from an imported file, where the sign is optional and
 * "$" and thousands separators may appear.
 */
export function parseImportedAmount(text: string): number | undefined {
    const cleaned = text.trim().replace(/[$,]/g, '');
    if (!PLAIN_AMOUNT.test(cleaned)) return undefined;
    const cents = dollarsToCents(cleaned);
    return withinLimit(cents) ? cents : undefined;
}

/**
 * "+$12.50", "-$3.00". Zero shows as "+$0.00".
 */
export function formatCents(cents: number): string {
    const dollars = new Decimal(cents).abs().dividedBy(100).toFixed(2);
    return `${cents < 0 ? '-' : '+'}$${dollars}`;
}
