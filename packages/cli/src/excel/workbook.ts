import exceljs from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import { Decimal } from 'decimal.js';
import type { Entry, Target } from '@tally/shared';
import { centsToDollars } from '../budget/money.js';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Tally';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold header row on a dark fill, frozen in place.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF2F5597' }
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Widen columns to their longest value, between 10 and 60 characters.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined) {
                maxLen = Math.max(maxLen, cell.value.toString().length);
            }
        });
        column.width = Math.min(maxLen + 2, 60);
    });
}

export function formatCurrencyColumn(worksheet: Worksheet, key: string): void {
    const column = worksheet.getColumn(key);
    column.numFmt = '+#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}

/**
 * One sheet of entries, in the order given, with a totals row.
 */
export function buildEntriesWorkbook(entries: readonly Entry[], targets: readonly Target[]): Workbook {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet('Entries');
    const names = new Map(targets.map(t => [t.id, t.name]));

    sheet.columns = [
        { header: 'date', key: 'date' },
        { header: 'amount', key: 'amount' },
        { header: 'target', key: 'target' },
        { header: 'note', key: 'note' },
    ];

    let total = new Decimal(0);
    for (const entry of entries) {
        total = total.plus(entry.amount);
        sheet.addRow({
            date: entry.date,
            amount: centsToDollars(entry.amount),
            target: names.get(entry.target) ?? '',
            note: entry.note,
        });
    }

    const totalRow = sheet.addRow({
        target: 'TOTAL',
        amount: total.dividedBy(100).toNumber(),
    });
    totalRow.font = { bold: true };

    formatHeaderRow(sheet);
    formatCurrencyColumn(sheet, 'amount');
    autoFitColumns(sheet);

    return workbook;
}
