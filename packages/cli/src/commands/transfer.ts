import { readFile } from 'node:fs/promises';
import type { Target } from '@tally/shared';
import {
    Command,
    CommandError,
    PredicateValidator,
    ReversibleCommand,
    defineCommand,
    type CommandDefinition,
} from '@tally/core';
import { insertEntry, reinsert, removeInserted, selectEntries, type InsertedEntry } from '../budget/entries.js';
import { parseEntriesCsv, type ImportResult } from '../budget/importer.js';
import type { BudgetState } from '../budget/state.js';
import { findTarget } from '../budget/targets.js';
import { buildEntriesWorkbook } from '../excel/workbook.js';
import { resolveInWorkspace } from '../workspace/paths.js';

function hasExtension(extension: string): (token: string) => boolean {
    return token => token.toLowerCase().endsWith(extension) && token.length > extension.length;
}

function reason(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

class ExportCommand extends Command<BudgetState> {
    readonly file = this.param('file', new PredicateValidator(hasExtension('.xlsx')), { required: true });

    async execute(): Promise<void> {
        const { store, entryFilter } = this.state;
        const entries = selectEntries(store, entryFilter);
        const workbook = buildEntriesWorkbook(entries, store.targets.select());
        const path = resolveInWorkspace(this.state.root, this.file);

        try {
            await workbook.xlsx.writeFile(path);
        } catch (err) {
            throw new CommandError(`Cannot write ${this.file}: ${reason(err)}`);
        }
        this.session.screens.message(`Exported ${entries.length} ${entries.length === 1 ? 'entry' : 'entries'} to ${this.file}.`);
    }
}

class ImportCommand extends ReversibleCommand<BudgetState> {
    readonly file = this.param('file', new PredicateValidator(hasExtension('.csv')), { required: true });
    private createdTargets: Target[] = [];
    private inserted: InsertedEntry[] = [];

    async execute(): Promise<void> {
        let data: Buffer;
        try {
            data = await readFile(resolveInWorkspace(this.state.root, this.file));
        } catch (err) {
            throw new CommandError(`Cannot read ${this.file}: ${reason(err)}`);
        }

        let parsed: ImportResult;
        try {
            parsed = parseEntriesCsv(data);
        } catch (err) {
            throw new CommandError(`Cannot import ${this.file}: ${reason(err)}`);
        }

        const { store } = this.state;
        for (const row of parsed.rows) {
            let target = findTarget(store, row.target);
            if (!target) {
                target = store.targets.insert({ name: row.target, default_amount: 0 });
                this.createdTargets.push(target);
            }
            this.inserted.push(insertEntry(store, {
                date: row.date,
                amount: row.amount,
                target: target.id,
                note: row.note,
            }));
        }

        this.session.screens.message(`Imported ${parsed.rows.length} entries (${parsed.skippedRows} skipped).`);
    }

    undo(): void {
        const { store } = this.state;
        for (const inserted of [...this.inserted].reverse()) {
            removeInserted(store, inserted);
        }
        for (const target of this.createdTargets) {
            store.targets.delete(target.id);
        }
    }

    redo(): void {
        const { store } = this.state;
        for (const { id, ...values } of this.createdTargets) {
            store.targets.insert(values, id);
        }
        for (const inserted of this.inserted) {
            reinsert(store, inserted);
        }
    }
}

export function transferCommands(): CommandDefinition<BudgetState>[] {
    return [
        defineCommand<BudgetState>(ExportCommand, {
            names: ['export'],
            description: 'Write the entries of the current list to an Excel workbook.',
            usage: 'export <file.xlsx>',
            examples: [{ text: 'export march.xlsx', subtext: 'Save the listed entries to march.xlsx in the workspace.' }],
        }),
        defineCommand<BudgetState>(ImportCommand, {
            names: ['import'],
            description: 'Add entries from a CSV file with date, amount, target and note columns.',
            usage: 'import <file.csv>',
            examples: [{ text: 'import bank.csv', subtext: 'Add every readable row; missing targets are created.' }],
        }),
    ];
}
