import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import exceljs from 'exceljs';
import { createTestApp } from '../support/app.js';

const HINT = "Try 'help' if you're having trouble.";

describe('import and export', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'tally-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should import rows and create missing targets', async () => {
        writeFileSync(join(dir, 'bank.csv'), [
            'date,amount,target,note',
            '2024-03-01,-12.50,food,Lunch',
            '2024-03-02,+1500,pay,',
            'nope,-5,food,x',
        ].join('\n') + '\n');
        const app = createTestApp({ root: dir });
        await app.run('add target food -400');

        await app.run('import bank.csv');

        expect(app.message()).toBe('Imported 2 entries (1 skipped).');
        expect(app.store.targets.select()).toEqual([
            { id: 1, name: 'food', default_amount: -40000 },
            { id: 2, name: 'pay', default_amount: 0 },
        ]);
        expect(app.store.entries.select().map(e => [e.date, e.amount, e.target, e.note])).toEqual([
            ['2024-03-01', -1250, 1, 'Lunch'],
            ['2024-03-02', 150000, 2, '...'],
        ]);
    });

    it('should undo and redo an import', async () => {
        writeFileSync(join(dir, 'bank.csv'), 'date,amount,target\n2024-03-02,+1500,pay\n');
        const app = createTestApp({ root: dir });
        await app.run('import bank.csv');

        await app.run('undo');
        expect(app.store.entries.size).toBe(0);
        expect(app.store.targets.size).toBe(0);
        expect(app.store.targetInstances.size).toBe(0);

        await app.run('redo');
        expect(app.store.targets.get(1)?.name).toBe('pay');
        expect(app.store.entries.get(1)?.amount).toBe(150000);
        expect(app.store.targetInstances.get(1)?.target).toBe(1);
    });

    it('should report a file it cannot read', async () => {
        const app = createTestApp({ root: dir });

        await app.run('import missing.csv');

        expect(app.message()).toMatch(/^Cannot read missing\.csv: ENOENT/);
        expect(app.commands.undoDepth).toBe(0);
    });

    it('should export the listed entries to a workbook', async () => {
        const app = createTestApp({ root: dir });
        await app.run('add target food -400');
        await app.run('add today -5 food tea');

        await app.run('export out.xlsx');

        expect(app.message()).toBe('Exported 1 entry to out.xlsx.');
        const wb = new exceljs.Workbook();
        await wb.xlsx.readFile(join(dir, 'out.xlsx'));
        const row = wb.worksheets[0].getRow(2);
        expect([1, 2, 3, 4].map(col => row.getCell(col).value)).toEqual(['2024-03-15', -5, 'food', 'tea']);
    });

    it('should only export to xlsx files', async () => {
        const app = createTestApp({ root: dir });

        await app.run('export out.txt');

        expect(app.message()).toBe(`Missing required input: file; ${HINT}`);
    });
});
