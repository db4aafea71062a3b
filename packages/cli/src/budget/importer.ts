/**
 * Reads entries from a CSV file.
 *
 * Columns (header row, any order, case-insensitive): date, amount, target
 * (or category), note. Rows that cannot be read are counted and skipped.
 */

import * as XLSX from 'xlsx';
import { LIMITS } from '@tally/shared';
import { excelSerialToIsoDate, parseIsoDate, parseMdyDate } from './dates.js';
import { parseImportedAmount } from './money.js';
import { isValidTargetName } from './validators.js';

export interface ImportedRow {
    date: string;
    amount: number;
    target: string;
    note: string;
}

export interface ImportResult {
    rows: ImportedRow[];
    skippedRows: number;
}

const REQUIRED_COLUMNS = ['date', 'amount'];

function readDate(value: unknown): string | undefined {
    if (typeof value === 'number') {
        return excelSerialToIsoDate(value);
    }
    const text = String(value ?? '');
    return parseIsoDate(text) ?? parseMdyDate(text);
}

function lowerKeys(row: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(row).map(([key, value]) => [key.trim().toLowerCase(), value]));
}

export function parseEntriesCsv(data: Buffer): ImportResult {
    const workbook = XLSX.read(data, { type: 'buffer', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' }).map(lowerKeys);

    const result: ImportResult = { rows: [], skippedRows: 0 };
    if (rows.length === 0) {
        return result;
    }

    const missingColumns = REQUIRED_COLUMNS.filter(col => !(col in rows[0]));
    if (!('target' in rows[0]) && !('category' in rows[0])) {
        missingColumns.push('target');
    }
    if (missingColumns.length > 0) {
        throw new Error(
            `Missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${Object.keys(rows[0]).join(', ')}`
        );
    }

    for (const row of rows) {
        const date = readDate(row['date']);
        const amount = parseImportedAmount(String(row['amount'] ?? ''));
        const target = String(row['target'] ?? row['category'] ?? '').trim().toLowerCase();
        if (!date || !amount || !isValidTargetName(target)) {
            result.skippedRows++;
            continue;
        }

        const note = String(row['note'] ?? '').trim().slice(0, LIMITS.NOTE_MAX);
        result.rows.push({ date, amount, target, note: note || LIMITS.DEFAULT_NOTE });
    }

    return result;
}
